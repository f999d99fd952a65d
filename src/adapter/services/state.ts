import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { describeIssues } from "../../lib/config.ts";
import { StateError, errorMessage } from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import { tempSuffix } from "../lib/id.ts";
import { StateFileSchema, type StateFile } from "../schemas.ts";
import type { AdapterState, DiscoveredApp } from "../types.ts";

export const STATE_VERSION = "1.0";

const log = logger("state");

export function emptyState(): AdapterState {
  return {
    version: STATE_VERSION,
    firstBootCompleted: false,
    discoveredApps: new Map(),
    removedApps: new Set(),
  };
}

/** The permanent credential is write-once for the lifetime of a state file. */
export function assignPermanentCredential(state: AdapterState, credential: string): void {
  if (state.permanentCredential) {
    throw new StateError("Permanent credential is already set and cannot be replaced");
  }
  if (!credential) {
    throw new StateError("Permanent credential must not be empty");
  }
  state.permanentCredential = credential;
}

export function isRemoved(state: AdapterState, appId: string): boolean {
  return state.removedApps.has(appId);
}

export function recordDiscovered(
  state: AdapterState,
  app: { id: string; name: string; url: string },
  tileId: string,
  now: Date = new Date(),
): void {
  if (state.removedApps.has(app.id)) {
    throw new StateError(`App "${app.id}" is excluded and cannot be recorded as discovered`);
  }
  state.discoveredApps.set(app.id, {
    tileId,
    name: app.name,
    url: app.url,
    addedAt: now.toISOString(),
  });
}

/** Excludes an app from future syncs. Returns false if it was already excluded. */
export function markRemoved(state: AdapterState, appId: string): boolean {
  state.discoveredApps.delete(appId);
  if (state.removedApps.has(appId)) return false;
  state.removedApps.add(appId);
  return true;
}

export function touchSync(state: AdapterState, now: Date = new Date()): void {
  state.lastSyncAt = now.toISOString();
}

export function toStateFile(state: AdapterState): StateFile {
  const discovered: Record<string, { tile_id: string; name?: string; url?: string; added_at?: string }> = {};
  for (const id of [...state.discoveredApps.keys()].sort()) {
    const app = state.discoveredApps.get(id);
    if (!app) continue;
    discovered[id] = {
      tile_id: app.tileId,
      name: app.name,
      url: app.url,
      added_at: app.addedAt,
    };
  }

  return {
    version: state.version,
    permanent_credential: state.permanentCredential,
    first_boot_completed: state.firstBootCompleted,
    discovered_apps: discovered,
    removed_apps: [...state.removedApps].sort(),
    last_sync_at: state.lastSyncAt,
  };
}

export function fromStateFile(raw: unknown): { state: AdapterState; overlapping: string[] } {
  const result = StateFileSchema.safeParse(raw);
  if (!result.success) {
    throw new StateError(
      `State file does not match the expected schema: ${describeIssues(result.error)}`,
    );
  }
  const file = result.data;

  const removedApps = new Set(file.removed_apps);
  const discoveredApps = new Map<string, DiscoveredApp>();
  const overlapping: string[] = [];
  for (const [id, record] of Object.entries(file.discovered_apps)) {
    if (removedApps.has(id)) {
      overlapping.push(id);
      continue;
    }
    discoveredApps.set(id, {
      tileId: record.tile_id,
      name: record.name,
      url: record.url,
      addedAt: record.added_at,
    });
  }

  return {
    state: {
      version: file.version,
      permanentCredential: file.permanent_credential,
      firstBootCompleted: file.first_boot_completed,
      discoveredApps,
      removedApps,
      lastSyncAt: file.last_sync_at,
    },
    overlapping,
  };
}

export interface StateInspection {
  state: AdapterState;
  exists: boolean;
  error?: StateError;
}

export class StateStore {
  constructor(readonly path: string) {}

  /**
   * Reads the state file. A missing file is an empty state; an unreadable or
   * corrupt one is reported as `error` alongside an empty state.
   */
  inspect(): StateInspection {
    if (!existsSync(this.path)) {
      return { state: emptyState(), exists: false };
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      const { state, overlapping } = fromStateFile(raw);
      if (overlapping.length > 0) {
        log.warn("Apps listed as both discovered and removed, keeping them removed: {ids}", {
          ids: overlapping.join(", "),
        });
      }
      return { state, exists: true };
    } catch (err) {
      const error =
        err instanceof StateError
          ? err
          : new StateError(`Failed to read state file: ${errorMessage(err)}`, { cause: err });
      log.warn("Ignoring state file {path}, starting from empty state: {message}", {
        path: this.path,
        message: error.message,
      });
      return { state: emptyState(), exists: true, error };
    }
  }

  load(): AdapterState {
    return this.inspect().state;
  }

  /** Writes a complete snapshot to a temp file, then renames it over the state file. */
  save(state: AdapterState): void {
    const dir = dirname(this.path);
    const tmp = join(dir, `.${basename(this.path)}.${tempSuffix()}.tmp`);

    try {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
      writeFileSync(tmp, JSON.stringify(toStateFile(state), null, 2) + "\n", {
        mode: 0o600,
      });
      renameSync(tmp, this.path);
    } catch (err) {
      if (existsSync(tmp)) rmSync(tmp);
      throw new StateError(`Failed to write state file ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    log.debug("Saved state to {path}", { path: this.path });
  }
}
