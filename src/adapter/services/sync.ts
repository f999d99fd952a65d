import {
  ApiError,
  BootstrapError,
  ConnectionError,
  errorMessage,
} from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import type { AdapterState } from "../types.ts";
import type { AppDiscovery } from "./docker.ts";
import type { DashboardApi } from "./homarr.ts";
import {
  isRemoved,
  markRemoved,
  recordDiscovered,
  touchSync,
  type StateStore,
} from "./state.ts";
import { provisionTile } from "./tiles.ts";

const log = logger("sync");

export interface SyncReport {
  created: string[];
  skipped: { id: string; reason: "excluded" | "present" }[];
  failed: { id: string; reason: string }[];
  /** Apps whose tile was deleted in Homarr since the last run; now excluded. */
  evicted: string[];
}

function isRemoteFailure(err: unknown): err is ApiError | ConnectionError {
  return err instanceof ApiError || err instanceof ConnectionError;
}

export class SyncController {
  constructor(
    private store: StateStore,
    private client: DashboardApi,
    private discovery: AppDiscovery,
    private boardName: string,
  ) {}

  async run(): Promise<SyncReport> {
    const state = this.store.load();
    if (!state.permanentCredential) {
      throw new BootstrapError("No permanent credential in state; run setup first");
    }
    const client = this.client.withCredential(state.permanentCredential);

    const { apps, failures } = await this.discovery.discover();

    const board = await client.getBoardByName(this.boardName);
    if (!board) {
      throw new ApiError("not-found", `Board "${this.boardName}" does not exist; run setup first`, 404);
    }
    const boardRef = { id: board.id, name: board.name };

    const report: SyncReport = {
      created: [],
      skipped: [],
      failed: failures.map((f) => ({ id: f.containerName, reason: f.reason })),
      evicted: await this.detectDashboardRemovals(client, state),
    };

    for (const app of apps) {
      if (isRemoved(state, app.id)) {
        report.skipped.push({ id: app.id, reason: "excluded" });
        continue;
      }
      if (state.discoveredApps.has(app.id)) {
        report.skipped.push({ id: app.id, reason: "present" });
        continue;
      }

      try {
        const { tileId } = await provisionTile(client, boardRef, {
          id: app.id,
          app: {
            name: app.name,
            href: app.url,
            iconUrl: app.iconUrl,
            description: app.description,
          },
          placement: { width: 1, height: 1, category: app.category },
        });
        recordDiscovered(state, app, tileId);
        report.created.push(app.id);
        log.info("Added {id} to board as app {tileId}", { id: app.id, tileId });
      } catch (err) {
        if (!isRemoteFailure(err)) throw err;
        log.warn("Failed to add {id}: {message}", { id: app.id, message: err.message });
        report.failed.push({ id: app.id, reason: err.message });
      }
    }

    touchSync(state);
    this.store.save(state);
    return report;
  }

  // A recorded tile that no longer exists in Homarr was deleted there on
  // purpose; excluding its app keeps sync from putting it back.
  private async detectDashboardRemovals(
    client: DashboardApi,
    state: AdapterState,
  ): Promise<string[]> {
    if (state.discoveredApps.size === 0) return [];

    let liveIds: Set<string>;
    try {
      liveIds = new Set((await client.listApps()).map((a) => a.id));
    } catch (err) {
      if (!isRemoteFailure(err)) throw err;
      log.warn("Could not list Homarr apps, skipping removal detection: {message}", {
        message: errorMessage(err),
      });
      return [];
    }

    const evicted = [...state.discoveredApps]
      .filter(([, entry]) => !liveIds.has(entry.tileId))
      .map(([id]) => id);
    for (const id of evicted) {
      markRemoved(state, id);
      log.info("App {id} was removed from Homarr and will not be re-added", { id });
    }
    return evicted;
  }
}
