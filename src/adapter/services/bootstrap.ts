import type { Branding } from "../../lib/branding.ts";
import { BootstrapError, ConfigurationError, errorMessage } from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import { credentialRef } from "../lib/id.ts";
import type { AdapterState, FederatedLoginSettings } from "../types.ts";
import type { DashboardApi } from "./homarr.ts";
import {
  assignPermanentCredential,
  isRemoved,
  recordDiscovered,
  type StateStore,
} from "./state.ts";
import { provisionTile } from "./tiles.ts";

const MAX_STEPS = 10;

const log = logger("bootstrap");

export type BootstrapStep =
  | { kind: "rotate-credential" }
  | { kind: "probe" }
  | { kind: "revoke-bootstrap-credential" }
  | { kind: "complete-onboarding" }
  | { kind: "apply-board" }
  | { kind: "sync-federated-login" }
  | { kind: "mark-complete" }
  | { kind: "done" };

export type BootstrapStepKind = BootstrapStep["kind"];

/** Live dashboard facts gathered with the permanent credential. */
export interface DashboardProbe {
  bootstrapCredentialLive: boolean;
  onboardingComplete: boolean;
  boardApplied: boolean;
  federatedLoginSynced: boolean;
}

export interface BootstrapResult {
  performed: BootstrapStepKind[];
}

/**
 * Decides what the bootstrap has to do next from the persisted state and,
 * once a permanent credential exists, a fresh probe of the dashboard.
 */
export function nextBootstrapStep(state: AdapterState, probe?: DashboardProbe): BootstrapStep {
  if (!state.permanentCredential) return { kind: "rotate-credential" };
  if (state.firstBootCompleted) return { kind: "done" };
  if (!probe) return { kind: "probe" };
  if (probe.bootstrapCredentialLive) return { kind: "revoke-bootstrap-credential" };
  if (!probe.onboardingComplete) return { kind: "complete-onboarding" };
  if (!probe.boardApplied) return { kind: "apply-board" };
  if (!probe.federatedLoginSynced) return { kind: "sync-federated-login" };
  return { kind: "mark-complete" };
}

function federatedLoginMatches(
  current: FederatedLoginSettings | null,
  wanted: FederatedLoginSettings,
): boolean {
  return (
    current !== null &&
    current.enabled === wanted.enabled &&
    current.issuer === wanted.issuer &&
    current.clientId === wanted.clientId
  );
}

export class BootstrapController {
  constructor(
    private store: StateStore,
    private client: DashboardApi,
    private branding: Branding,
  ) {}

  async run(): Promise<BootstrapResult> {
    const state = this.store.load();
    const performed: BootstrapStepKind[] = [];
    let probe: DashboardProbe | undefined;

    for (;;) {
      const step = nextBootstrapStep(state, probe);
      if (step.kind === "done") {
        return { performed };
      }
      if (step.kind === "probe") {
        probe = await this.probe(state);
        continue;
      }

      if (performed.at(-1) === step.kind) {
        throw new BootstrapError(`Bootstrap step ${step.kind} did not take effect`);
      }
      if (performed.length >= MAX_STEPS) {
        throw new BootstrapError(`Bootstrap did not complete within ${MAX_STEPS} steps`);
      }

      log.info("Bootstrap step: {step}", { step: step.kind });
      try {
        await this.perform(step.kind, state);
      } catch (err) {
        log.error("Bootstrap step {step} failed: {message}", {
          step: step.kind,
          message: errorMessage(err),
        });
        throw err;
      }
      performed.push(step.kind);
      probe = undefined;
    }
  }

  private authed(state: AdapterState): DashboardApi {
    if (!state.permanentCredential) {
      throw new BootstrapError("No permanent credential available");
    }
    return this.client.withCredential(state.permanentCredential);
  }

  private async probe(state: AdapterState): Promise<DashboardProbe> {
    const permanent = state.permanentCredential;
    if (!permanent) {
      throw new BootstrapError("No permanent credential available");
    }
    const client = this.client.withCredential(permanent);
    const bootstrapRef = this.branding.bootstrapCredential
      ? credentialRef(this.branding.bootstrapCredential)
      : undefined;

    let bootstrapCredentialLive = false;
    if (bootstrapRef && bootstrapRef !== credentialRef(permanent)) {
      bootstrapCredentialLive = (await client.listCredentialRefs()).includes(bootstrapRef);
    }

    const onboarding = await client.getOnboardingStatus();
    const home = await client.getHomeBoard();
    const wanted = this.branding.federatedLogin;

    return {
      bootstrapCredentialLive,
      onboardingComplete: onboarding.complete,
      boardApplied: home?.name === this.branding.board.name,
      federatedLoginSynced: wanted
        ? federatedLoginMatches(await client.getFederatedLogin(), wanted)
        : true,
    };
  }

  private async perform(kind: BootstrapStepKind, state: AdapterState): Promise<void> {
    switch (kind) {
      case "rotate-credential":
        return this.rotateCredential(state);
      case "revoke-bootstrap-credential":
        return this.revokeBootstrapCredential(state);
      case "complete-onboarding":
        return this.authed(state).completeOnboarding(this.branding.onboarding);
      case "apply-board":
        return this.applyBoard(state);
      case "sync-federated-login": {
        const settings = this.branding.federatedLogin;
        if (settings) await this.authed(state).saveFederatedLogin(settings);
        return;
      }
      case "mark-complete":
        state.firstBootCompleted = true;
        this.store.save(state);
        log.info("First-boot setup complete");
        return;
      case "probe":
      case "done":
        return;
    }
  }

  // The permanent credential is saved before the bootstrap key is revoked,
  // so an interrupted run resumes at revocation instead of minting again.
  private async rotateCredential(state: AdapterState): Promise<void> {
    const bootstrap = this.branding.bootstrapCredential;
    if (!bootstrap) {
      throw new ConfigurationError(
        "credentials.bootstrap_api_key is required in the branding file to mint the permanent credential",
      );
    }
    const permanent = await this.client.mintPermanentCredential(bootstrap);
    assignPermanentCredential(state, permanent);
    this.store.save(state);
    log.info("Permanent credential minted and saved");
  }

  private async revokeBootstrapCredential(state: AdapterState): Promise<void> {
    const bootstrap = this.branding.bootstrapCredential;
    if (!bootstrap) return;
    const result = await this.authed(state).deleteCredential(credentialRef(bootstrap));
    log.info("Bootstrap credential revoked ({result})", { result });
  }

  private async applyBoard(state: AdapterState): Promise<void> {
    const client = this.authed(state);
    const board = await client.upsertBoard(this.branding.board);
    await client.saveBoardAppearance(board.id, this.branding.appearance);

    for (const tile of this.branding.pinnedTiles) {
      if (isRemoved(state, tile.id) || state.discoveredApps.has(tile.id)) continue;
      const { tileId } = await provisionTile(client, board, {
        id: tile.id,
        app: {
          name: tile.name,
          href: tile.href,
          iconUrl: tile.iconUrl,
          description: tile.description,
        },
        placement: { width: tile.width, height: tile.height },
      });
      recordDiscovered(state, { id: tile.id, name: tile.name, url: tile.href }, tileId);
      this.store.save(state);
    }

    await client.setColorScheme(this.branding.colorScheme);
    // Home board last: the probe treats it as "board applied".
    await client.setHomeBoard(board.id);
  }
}
