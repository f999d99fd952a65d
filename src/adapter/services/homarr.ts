import { z } from "zod";
import { describeIssues } from "../../lib/config.ts";
import {
  ApiError,
  ConnectionError,
  errorMessage,
  type ApiFailureKind,
} from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import { generateBoardItemId } from "../lib/id.ts";
import { withRetry, type RetryOptions } from "../lib/retry.ts";
import {
  ApiKeyListSchema,
  AppListSchema,
  BoardRefSchema,
  BoardSchema,
  CreateApiKeySchema,
  CreateAppSchema,
  CreateBoardSchema,
  OnboardingStepSchema,
  ServerSettingsSchema,
  TrpcErrorSchema,
  type Board,
  type BoardItem,
} from "../schemas.ts";
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
} from "../types.ts";

export const ONBOARDING_STEPS: readonly string[] = ["start", "user", "settings", "finish"];
const MAX_ONBOARDING_TRANSITIONS = 10;
const TRANSIENT_STATUSES = new Set([502, 503, 504]);
export const DEFAULT_ICON_URL =
  "https://cdn.jsdelivr.net/gh/walkxcode/dashboard-icons/svg/docker.svg";

const TrpcResultSchema = z.object({
  result: z.object({
    data: z.object({ json: z.unknown() }).optional(),
  }),
});
const Void = z.unknown();

const log = logger("homarr");

/** Typed boundary to the Homarr dashboard. */
export interface DashboardApi {
  withCredential(credential: string): DashboardApi;

  mintPermanentCredential(bootstrapCredential: string): Promise<string>;
  listCredentialRefs(): Promise<string[]>;
  deleteCredential(credentialRef: string): Promise<"deleted" | "not-found">;

  getOnboardingStatus(): Promise<OnboardingStatus>;
  completeOnboarding(settings: OnboardingSettings): Promise<void>;

  upsertBoard(definition: BoardDefinition): Promise<BoardRef>;
  getBoardByName(name: string): Promise<Board | null>;
  getHomeBoard(): Promise<BoardRef | null>;
  setHomeBoard(boardId: string): Promise<void>;
  saveBoardAppearance(boardId: string, appearance: BoardAppearance): Promise<void>;
  setColorScheme(scheme: ColorScheme): Promise<void>;

  getFederatedLogin(): Promise<FederatedLoginSettings | null>;
  saveFederatedLogin(settings: FederatedLoginSettings): Promise<void>;

  createApp(app: AppDefinition): Promise<CreateAppResult>;
  listApps(): Promise<DashboardApp[]>;
  deleteApp(appId: string): Promise<"deleted" | "not-found">;
  attachAppToBoard(
    appId: string,
    board: BoardRef,
    placement: TilePlacement,
  ): Promise<"attached" | "already-attached">;
}

export interface HomarrClientOptions {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryOptions;
  credential?: string;
}

export function classifyStatus(status: number): ApiFailureKind {
  switch (status) {
    case 400:
    case 422:
      return "validation";
    case 401:
    case 403:
      return "auth";
    case 404:
      return "not-found";
    case 409:
      return "conflict";
    default:
      return "server";
  }
}

function extractMessage(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.slice(0, 200) || "empty response";
  }
  const parsed = TrpcErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.error.json.message : text.slice(0, 200);
}

export function onboardingStatus(currentStep: string): OnboardingStatus {
  const index = ONBOARDING_STEPS.indexOf(currentStep);
  const pendingSteps =
    index === -1 ? [currentStep] : ONBOARDING_STEPS.slice(index, ONBOARDING_STEPS.length - 1);
  return { complete: currentStep === "finish", currentStep, pendingSteps };
}

export function pickSection(
  sections: Board["sections"],
  category?: string,
): Board["sections"][number] | undefined {
  const ordered = [...sections].sort((a, b) => a.yOffset - b.yOffset);
  if (category) {
    const wanted = category.toLowerCase();
    const match = ordered.find(
      (s) => s.kind === "category" && s.name?.toLowerCase() === wanted,
    );
    if (match) return match;
  }
  return ordered.find((s) => s.kind === "empty") ?? ordered[0];
}

export function nextFreeRow(items: BoardItem[], layoutId: string, sectionId: string): number {
  let row = 0;
  for (const item of items) {
    for (const l of item.layouts) {
      if (l.layoutId === layoutId && l.sectionId === sectionId) {
        row = Math.max(row, l.yOffset + l.height);
      }
    }
  }
  return row;
}

export class HomarrClient implements DashboardApi {
  constructor(private opts: HomarrClientOptions) {}

  withCredential(credential: string): HomarrClient {
    return new HomarrClient({ ...this.opts, credential });
  }

  // --- credentials ---

  async mintPermanentCredential(bootstrapCredential: string): Promise<string> {
    const created = await this.mutate("apiKeys.create", {}, CreateApiKeySchema, bootstrapCredential);
    return created.apiKey;
  }

  async listCredentialRefs(): Promise<string[]> {
    const keys = await this.query("apiKeys.getAll", undefined, ApiKeyListSchema);
    return keys.map((k) => k.id);
  }

  async deleteCredential(credentialRef: string): Promise<"deleted" | "not-found"> {
    try {
      await this.mutate("apiKeys.delete", { apiKeyId: credentialRef }, Void);
      return "deleted";
    } catch (err) {
      if (err instanceof ApiError && err.kind === "not-found") return "not-found";
      throw err;
    }
  }

  // --- onboarding ---

  async getOnboardingStatus(): Promise<OnboardingStatus> {
    const step = await this.query("onboard.currentStep", undefined, OnboardingStepSchema);
    return onboardingStatus(step.current);
  }

  async completeOnboarding(settings: OnboardingSettings): Promise<void> {
    for (let i = 0; i < MAX_ONBOARDING_TRANSITIONS; i++) {
      const { currentStep } = await this.getOnboardingStatus();
      log.info("Onboarding step: {step}", { step: currentStep });

      switch (currentStep) {
        case "finish":
          return;
        case "user":
          await this.mutate(
            "user.initUser",
            {
              username: settings.admin.username,
              password: settings.admin.password,
              confirmPassword: settings.admin.password,
            },
            Void,
          );
          break;
        case "settings":
          await this.mutate(
            "serverSettings.initSettings",
            {
              analytics: settings.analytics,
              crawlingAndIndexing: settings.crawlingAndIndexing,
            },
            Void,
          );
          break;
        default:
          await this.mutate("onboard.nextStep", {}, Void);
      }
    }
    throw new ApiError(
      "server",
      `Onboarding did not reach the finish step after ${MAX_ONBOARDING_TRANSITIONS} transitions`,
    );
  }

  // --- boards ---

  async getBoardByName(name: string): Promise<Board | null> {
    try {
      return await this.query("board.getBoardByName", { name }, BoardSchema);
    } catch (err) {
      if (err instanceof ApiError && err.kind === "not-found") return null;
      throw err;
    }
  }

  async upsertBoard(definition: BoardDefinition): Promise<BoardRef> {
    const existing = await this.getBoardByName(definition.name);
    if (existing) {
      log.info("Board {name} already exists", { name: definition.name });
      if (existing.isPublic !== undefined && existing.isPublic !== definition.isPublic) {
        await this.mutate(
          "board.changeBoardVisibility",
          { id: existing.id, visibility: definition.isPublic ? "public" : "private" },
          Void,
        );
      }
      // Column count belongs to the board's layouts and is only set at creation.
      return { id: existing.id, name: existing.name };
    }

    log.info("Creating board {name}", { name: definition.name });
    const created = await this.mutate(
      "board.createBoard",
      {
        name: definition.name,
        columnCount: definition.columnCount,
        isPublic: definition.isPublic,
      },
      CreateBoardSchema,
    );
    return { id: created.boardId, name: definition.name };
  }

  async getHomeBoard(): Promise<BoardRef | null> {
    try {
      const board = await this.query("board.getHomeBoard", undefined, BoardRefSchema);
      return { id: board.id, name: board.name };
    } catch (err) {
      if (err instanceof ApiError && err.kind === "not-found") return null;
      throw err;
    }
  }

  async setHomeBoard(boardId: string): Promise<void> {
    await this.mutate("board.setHomeBoard", { id: boardId }, Void);
  }

  async saveBoardAppearance(boardId: string, appearance: BoardAppearance): Promise<void> {
    await this.mutate(
      "board.savePartialBoardSettings",
      {
        id: boardId,
        pageTitle: appearance.pageTitle,
        metaTitle: appearance.pageTitle,
        logoImageUrl: appearance.logoImageUrl,
        primaryColor: appearance.primaryColor,
      },
      Void,
    );
  }

  async setColorScheme(scheme: ColorScheme): Promise<void> {
    await this.mutate("user.changeColorScheme", { colorScheme: scheme }, Void);
  }

  // --- federated login ---

  async getFederatedLogin(): Promise<FederatedLoginSettings | null> {
    const settings = await this.query("serverSettings.getAll", undefined, ServerSettingsSchema);
    return settings.federatedLogin ?? null;
  }

  async saveFederatedLogin(settings: FederatedLoginSettings): Promise<void> {
    await this.mutate(
      "serverSettings.saveSettings",
      { settingsKey: "federatedLogin", value: settings },
      Void,
    );
  }

  // --- apps ---

  async createApp(app: AppDefinition): Promise<CreateAppResult> {
    try {
      const created = await this.mutate(
        "app.create",
        {
          name: app.name,
          description: app.description ?? "",
          iconUrl: app.iconUrl ?? DEFAULT_ICON_URL,
          href: app.href,
          pingUrl: null,
        },
        CreateAppSchema,
      );
      return { status: "created", appId: created.appId };
    } catch (err) {
      if (err instanceof ApiError && err.kind === "conflict") return { status: "conflict" };
      throw err;
    }
  }

  async listApps(): Promise<DashboardApp[]> {
    const apps = await this.query("app.all", undefined, AppListSchema);
    return apps.map((a) => ({ id: a.id, name: a.name, href: a.href ?? null }));
  }

  async deleteApp(appId: string): Promise<"deleted" | "not-found"> {
    try {
      await this.mutate("app.delete", { id: appId }, Void);
      return "deleted";
    } catch (err) {
      if (err instanceof ApiError && err.kind === "not-found") return "not-found";
      throw err;
    }
  }

  /** Appends one app item to the board; items already on the board are kept. */
  async attachAppToBoard(
    appId: string,
    board: BoardRef,
    placement: TilePlacement,
  ): Promise<"attached" | "already-attached"> {
    const current = await this.getBoardByName(board.name);
    if (!current) {
      throw new ApiError("not-found", `Board "${board.name}" not found`, 404);
    }
    if (current.items.some((item) => item.kind === "app" && item.options.appId === appId)) {
      return "already-attached";
    }

    const layout = current.layouts[0];
    const section = pickSection(current.sections, placement.category);
    if (!layout || !section) {
      throw new ApiError("validation", `Board "${board.name}" has no layout or section to place apps in`);
    }

    const item = {
      id: generateBoardItemId(),
      kind: "app",
      options: { appId },
      layouts: [
        {
          layoutId: layout.id,
          sectionId: section.id,
          width: placement.width,
          height: placement.height,
          xOffset: 0,
          yOffset: nextFreeRow(current.items, layout.id, section.id),
        },
      ],
      integrationIds: [],
      advancedOptions: { customCssClasses: [] },
    };

    await this.mutate(
      "board.saveBoard",
      {
        id: current.id,
        sections: current.sections,
        items: [...current.items, item],
        integrations: current.integrations,
      },
      Void,
    );
    return "attached";
  }

  // --- transport ---

  private query<T>(
    procedure: string,
    input: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    credential = this.opts.credential,
  ): Promise<T> {
    const encoded = encodeURIComponent(JSON.stringify({ json: input ?? null }));
    return this.call(
      procedure,
      `${this.opts.baseUrl}/api/trpc/${procedure}?input=${encoded}`,
      { method: "GET" },
      schema,
      credential,
    );
  }

  private mutate<T>(
    procedure: string,
    input: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    credential = this.opts.credential,
  ): Promise<T> {
    return this.call(
      procedure,
      `${this.opts.baseUrl}/api/trpc/${procedure}`,
      { method: "POST", body: JSON.stringify({ json: input }) },
      schema,
      credential,
    );
  }

  private async call<T>(
    procedure: string,
    url: string,
    init: { method: "GET" | "POST"; body?: string },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    credential: string | undefined,
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (init.body !== undefined) headers["Content-Type"] = "application/json";
    if (credential) headers.Authorization = `Bearer ${credential}`;

    const body = await withRetry(() => this.send(procedure, url, { ...init, headers }), {
      ...this.opts.retry,
      shouldRetry: (err) => err instanceof ConnectionError,
      onRetry: (err, attempt, delayMs) => {
        log.warn("{procedure}: {message}; retrying in {delayMs}ms (attempt {attempt})", {
          procedure,
          message: errorMessage(err),
          delayMs,
          attempt,
        });
      },
    });

    const envelope = TrpcResultSchema.safeParse(body);
    if (!envelope.success) {
      throw new ApiError("server", `Unexpected response from ${procedure}: missing result`);
    }
    const parsed = schema.safeParse(envelope.data.result.data?.json);
    if (!parsed.success) {
      throw new ApiError(
        "server",
        `Unexpected response from ${procedure}: ${describeIssues(parsed.error)}`,
      );
    }
    return parsed.data;
  }

  private async send(
    procedure: string,
    url: string,
    init: { method: "GET" | "POST"; body?: string; headers: Record<string, string> },
  ): Promise<unknown> {
    let res: Response;
    let text: string;
    try {
      res = await fetch(url, { ...init, signal: AbortSignal.timeout(this.opts.timeoutMs) });
      text = await res.text();
    } catch (err) {
      throw new ConnectionError(
        `${procedure}: Homarr unreachable at ${this.opts.baseUrl}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (TRANSIENT_STATUSES.has(res.status)) {
      throw new ConnectionError(`${procedure}: Homarr returned ${res.status}`);
    }
    if (!res.ok) {
      throw new ApiError(
        classifyStatus(res.status),
        `${procedure} failed (${res.status}): ${extractMessage(text)}`,
        res.status,
      );
    }

    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      throw new ApiError("server", `${procedure}: response is not JSON`, res.status);
    }
  }
}
