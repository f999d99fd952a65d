import { credentialRef } from "../../src/adapter/lib/id.ts";
import { onboardingStatus, type DashboardApi } from "../../src/adapter/services/homarr.ts";
import type { Board } from "../../src/adapter/schemas.ts";
import type {
  AppDefinition,
  BoardAppearance,
  BoardDefinition,
  BoardRef,
  ColorScheme,
  CreateAppResult,
  DashboardApp,
  FederatedLoginSettings,
  OnboardingSettings,
  OnboardingStatus,
  TilePlacement,
} from "../../src/adapter/types.ts";
import { ApiError } from "../../src/lib/errors.ts";

interface FakeBoard {
  id: string;
  name: string;
  appIds: string[];
  appearance?: BoardAppearance;
}

/** Everything the fake Homarr instance knows, shared by all credential views. */
export interface FakeWorld {
  keys: Set<string>;
  onboardingStep: string;
  onboardingSettings?: OnboardingSettings;
  boards: Map<string, FakeBoard>;
  homeBoardId?: string;
  colorScheme?: ColorScheme;
  federatedLogin: FederatedLoginSettings | null;
  apps: Map<string, DashboardApp>;
  calls: string[];
  failures: Map<string, Error[]>;
  createAppFailures: Map<string, Error>;
  nextId: number;
}

export function createWorld(init: Partial<FakeWorld> = {}): FakeWorld {
  return {
    keys: new Set(),
    onboardingStep: "start",
    boards: new Map(),
    federatedLogin: null,
    apps: new Map(),
    calls: [],
    failures: new Map(),
    createAppFailures: new Map(),
    nextId: 1,
    ...init,
  };
}

export class FakeDashboard implements DashboardApi {
  constructor(
    readonly world: FakeWorld = createWorld(),
    readonly credential?: string,
  ) {}

  /** Makes the next `times` calls to `method` throw `err`. */
  fail(method: keyof DashboardApi, err: Error, times = 1): void {
    const queue = this.world.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(err);
    this.world.failures.set(method, queue);
  }

  callCount(method: keyof DashboardApi): number {
    return this.world.calls.filter((c) => c === method).length;
  }

  addBoard(name: string): FakeBoard {
    const board = { id: this.id("board"), name, appIds: [] };
    this.world.boards.set(name, board);
    return board;
  }

  addApp(app: { name: string; href: string | null }): DashboardApp {
    const created = { id: this.id("app"), ...app };
    this.world.apps.set(created.id, created);
    return created;
  }

  withCredential(credential: string): FakeDashboard {
    return new FakeDashboard(this.world, credential);
  }

  async mintPermanentCredential(bootstrapCredential: string): Promise<string> {
    this.enter("mintPermanentCredential");
    if (!this.world.keys.has(credentialRef(bootstrapCredential))) {
      throw new ApiError("auth", "apiKeys.create failed (401): Unauthorized", 401);
    }
    const ref = this.id("key");
    this.world.keys.add(ref);
    return `${ref}.test-secret`;
  }

  async listCredentialRefs(): Promise<string[]> {
    this.authed("listCredentialRefs");
    return [...this.world.keys];
  }

  async deleteCredential(ref: string): Promise<"deleted" | "not-found"> {
    this.authed("deleteCredential");
    return this.world.keys.delete(ref) ? "deleted" : "not-found";
  }

  async getOnboardingStatus(): Promise<OnboardingStatus> {
    this.enter("getOnboardingStatus");
    return onboardingStatus(this.world.onboardingStep);
  }

  async completeOnboarding(settings: OnboardingSettings): Promise<void> {
    this.authed("completeOnboarding");
    this.world.onboardingSettings = settings;
    this.world.onboardingStep = "finish";
  }

  async upsertBoard(definition: BoardDefinition): Promise<BoardRef> {
    this.authed("upsertBoard");
    const board = this.world.boards.get(definition.name) ?? this.addBoard(definition.name);
    return { id: board.id, name: board.name };
  }

  async getBoardByName(name: string): Promise<Board | null> {
    this.authed("getBoardByName");
    const board = this.world.boards.get(name);
    if (!board) return null;
    return {
      id: board.id,
      name: board.name,
      sections: [],
      layouts: [],
      items: board.appIds.map((appId) => ({
        id: `item-${appId}`,
        kind: "app",
        options: { appId },
        layouts: [],
      })),
      integrations: [],
    };
  }

  async getHomeBoard(): Promise<BoardRef | null> {
    this.authed("getHomeBoard");
    const home = [...this.world.boards.values()].find((b) => b.id === this.world.homeBoardId);
    return home ? { id: home.id, name: home.name } : null;
  }

  async setHomeBoard(boardId: string): Promise<void> {
    this.authed("setHomeBoard");
    this.world.homeBoardId = boardId;
  }

  async saveBoardAppearance(boardId: string, appearance: BoardAppearance): Promise<void> {
    this.authed("saveBoardAppearance");
    const board = [...this.world.boards.values()].find((b) => b.id === boardId);
    if (!board) throw new ApiError("not-found", `Board ${boardId} not found`, 404);
    board.appearance = appearance;
  }

  async setColorScheme(scheme: ColorScheme): Promise<void> {
    this.authed("setColorScheme");
    this.world.colorScheme = scheme;
  }

  async getFederatedLogin(): Promise<FederatedLoginSettings | null> {
    this.authed("getFederatedLogin");
    return this.world.federatedLogin;
  }

  async saveFederatedLogin(settings: FederatedLoginSettings): Promise<void> {
    this.authed("saveFederatedLogin");
    this.world.federatedLogin = settings;
  }

  async createApp(app: AppDefinition): Promise<CreateAppResult> {
    this.authed("createApp");
    const failure = this.world.createAppFailures.get(app.name);
    if (failure) throw failure;
    if ([...this.world.apps.values()].some((a) => a.name === app.name)) {
      return { status: "conflict" };
    }
    return { status: "created", appId: this.addApp({ name: app.name, href: app.href }).id };
  }

  async listApps(): Promise<DashboardApp[]> {
    this.authed("listApps");
    return [...this.world.apps.values()];
  }

  async deleteApp(appId: string): Promise<"deleted" | "not-found"> {
    this.authed("deleteApp");
    for (const board of this.world.boards.values()) {
      board.appIds = board.appIds.filter((id) => id !== appId);
    }
    return this.world.apps.delete(appId) ? "deleted" : "not-found";
  }

  async attachAppToBoard(
    appId: string,
    board: BoardRef,
    _placement: TilePlacement,
  ): Promise<"attached" | "already-attached"> {
    this.authed("attachAppToBoard");
    const target = this.world.boards.get(board.name);
    if (!target) throw new ApiError("not-found", `Board "${board.name}" not found`, 404);
    if (target.appIds.includes(appId)) return "already-attached";
    target.appIds.push(appId);
    return "attached";
  }

  private id(prefix: string): string {
    return `${prefix}-${this.world.nextId++}`;
  }

  private enter(method: keyof DashboardApi): void {
    this.world.calls.push(method);
    const err = this.world.failures.get(method)?.shift();
    if (err) throw err;
  }

  private authed(method: keyof DashboardApi): void {
    this.enter(method);
    if (!this.credential || !this.world.keys.has(credentialRef(this.credential))) {
      throw new ApiError("auth", `${method} failed (401): Unauthorized`, 401);
    }
  }
}
