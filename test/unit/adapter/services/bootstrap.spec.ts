import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  BootstrapController,
  nextBootstrapStep,
  type DashboardProbe,
} from "../../../../src/adapter/services/bootstrap.ts";
import { StateStore, emptyState } from "../../../../src/adapter/services/state.ts";
import { ApiError, BootstrapError, ConfigurationError } from "../../../../src/lib/errors.ts";
import { FakeDashboard, createWorld } from "../../../helpers/fake-dashboard.ts";
import { tempDir, testBranding } from "../../../helpers/fixtures.ts";

const settled: DashboardProbe = {
  bootstrapCredentialLive: false,
  onboardingComplete: true,
  boardApplied: true,
  federatedLoginSynced: true,
};

describe("nextBootstrapStep", () => {
  it("rotates the credential first", () => {
    expect(nextBootstrapStep(emptyState())).toEqual({ kind: "rotate-credential" });
  });

  it("is done once first boot completed, without probing", () => {
    const state = { ...emptyState(), permanentCredential: "key-1.test-secret", firstBootCompleted: true };
    expect(nextBootstrapStep(state)).toEqual({ kind: "done" });
  });

  it("asks for a probe when the credential exists", () => {
    const state = { ...emptyState(), permanentCredential: "key-1.test-secret" };
    expect(nextBootstrapStep(state)).toEqual({ kind: "probe" });
  });

  it("walks the remaining steps in order", () => {
    const state = { ...emptyState(), permanentCredential: "key-1.test-secret" };
    expect(nextBootstrapStep(state, { ...settled, bootstrapCredentialLive: true, onboardingComplete: false }).kind)
      .toBe("revoke-bootstrap-credential");
    expect(nextBootstrapStep(state, { ...settled, onboardingComplete: false, boardApplied: false }).kind)
      .toBe("complete-onboarding");
    expect(nextBootstrapStep(state, { ...settled, boardApplied: false }).kind).toBe("apply-board");
    expect(nextBootstrapStep(state, { ...settled, federatedLoginSynced: false }).kind)
      .toBe("sync-federated-login");
    expect(nextBootstrapStep(state, settled).kind).toBe("mark-complete");
  });
});

describe("BootstrapController", () => {
  let cleanup: () => void;
  let store: StateStore;
  let dashboard: FakeDashboard;

  beforeEach(() => {
    const tmp = tempDir();
    cleanup = tmp.cleanup;
    store = new StateStore(`${tmp.dir}/state.json`);
    dashboard = new FakeDashboard(createWorld({ keys: new Set(["boot"]) }));
  });

  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it("runs a fresh Homarr through the whole first boot", async () => {
    const result = await new BootstrapController(store, dashboard, testBranding()).run();

    expect(result.performed).toEqual([
      "rotate-credential",
      "revoke-bootstrap-credential",
      "complete-onboarding",
      "apply-board",
      "mark-complete",
    ]);

    const state = store.load();
    expect(state.permanentCredential).toBe("key-1.test-secret");
    expect(state.firstBootCompleted).toBe(true);

    const world = dashboard.world;
    expect([...world.keys]).toEqual(["key-1"]);
    expect(world.onboardingStep).toBe("finish");
    expect(world.onboardingSettings?.admin.username).toBe("admin");
    expect(world.boards.get("Home")?.id).toBe(world.homeBoardId);
    expect(world.boards.get("Home")?.appearance).toEqual({ pageTitle: "Test Lab" });
    expect(world.colorScheme).toBe("dark");
  });

  it("never mints a second permanent credential", async () => {
    await new BootstrapController(store, dashboard, testBranding()).run();
    const before = store.load().permanentCredential;
    dashboard.world.calls.length = 0;

    const again = await new BootstrapController(store, dashboard, testBranding()).run();

    expect(again.performed).toEqual([]);
    expect(dashboard.world.calls).toEqual([]);
    expect(store.load().permanentCredential).toBe(before);
  });

  it("resumes at revocation after a crash between mint and revoke", async () => {
    const state = emptyState();
    state.permanentCredential = "key-7.test-secret";
    store.save(state);
    dashboard.world.keys.add("key-7");

    const result = await new BootstrapController(store, dashboard, testBranding()).run();

    expect(dashboard.callCount("mintPermanentCredential")).toBe(0);
    expect(result.performed[0]).toBe("revoke-bootstrap-credential");
    expect([...dashboard.world.keys]).toEqual(["key-7"]);
    expect(store.load().permanentCredential).toBe("key-7.test-secret");
  });

  it("keeps the minted credential when a later step fails", async () => {
    dashboard.fail("completeOnboarding", new ApiError("server", "onboarding exploded", 500));

    await expect(
      new BootstrapController(store, dashboard, testBranding()).run(),
    ).rejects.toThrow("onboarding exploded");

    const state = store.load();
    expect(state.permanentCredential).toBe("key-1.test-secret");
    expect(state.firstBootCompleted).toBe(false);

    const retry = await new BootstrapController(store, dashboard, testBranding()).run();
    expect(retry.performed).toEqual(["complete-onboarding", "apply-board", "mark-complete"]);
    expect(dashboard.callCount("mintPermanentCredential")).toBe(1);
  });

  it("requires a bootstrap key to mint the permanent credential", async () => {
    const branding = testBranding({ bootstrapCredential: undefined });

    await expect(new BootstrapController(store, dashboard, branding).run()).rejects.toThrow(
      ConfigurationError,
    );
    expect(dashboard.world.calls).toEqual([]);
  });

  it("places the pinned tile and records it as discovered", async () => {
    const branding = testBranding({
      pinnedTiles: [{ id: "cockpit", name: "Cockpit", href: "https://cockpit.lan", width: 2, height: 1 }],
    });

    await new BootstrapController(store, dashboard, branding).run();

    const tileId = store.load().discoveredApps.get("cockpit")?.tileId;
    expect(tileId).toBeDefined();
    expect(dashboard.world.apps.get(tileId ?? "")?.href).toBe("https://cockpit.lan");
    expect(dashboard.world.boards.get("Home")?.appIds).toEqual([tileId]);
  });

  it("skips a pinned tile the operator removed", async () => {
    const state = emptyState();
    state.removedApps.add("cockpit");
    store.save(state);
    const branding = testBranding({
      pinnedTiles: [{ id: "cockpit", name: "Cockpit", href: "https://cockpit.lan", width: 1, height: 1 }],
    });

    await new BootstrapController(store, dashboard, branding).run();

    expect(dashboard.callCount("createApp")).toBe(0);
    expect(store.load().discoveredApps.has("cockpit")).toBe(false);
  });

  it("syncs federated login when branding configures it", async () => {
    const federatedLogin = {
      enabled: true,
      issuer: "https://sso.lan",
      clientId: "homarr",
      clientSecret: "test-secret",
    };

    const result = await new BootstrapController(
      store,
      dashboard,
      testBranding({ federatedLogin }),
    ).run();

    expect(result.performed).toContain("sync-federated-login");
    expect(dashboard.world.federatedLogin).toEqual(federatedLogin);
  });

  it("fails when a step does not take effect", async () => {
    vi.spyOn(FakeDashboard.prototype, "setHomeBoard").mockResolvedValue(undefined);

    await expect(
      new BootstrapController(store, dashboard, testBranding()).run(),
    ).rejects.toThrow(BootstrapError);
    expect(store.load().firstBootCompleted).toBe(false);
  });
});
