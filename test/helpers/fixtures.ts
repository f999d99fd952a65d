import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Branding } from "../../src/lib/branding.ts";
import type { AdapterConfig } from "../../src/lib/config.ts";
import type { ApplicationDescriptor } from "../../src/adapter/types.ts";

export function tempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "homarr-adapter-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function testBranding(overrides: Partial<Branding> = {}): Branding {
  return {
    productName: "Test Lab",
    bootstrapCredential: "boot.test-secret",
    colorScheme: "dark",
    board: { name: "Home", columnCount: 10, isPublic: true },
    appearance: { pageTitle: "Test Lab" },
    onboarding: {
      admin: { username: "admin", password: "test-password" },
      analytics: {
        enableGeneral: false,
        enableWidgetData: false,
        enableIntegrationData: false,
        enableUserData: false,
      },
      crawlingAndIndexing: {
        noIndex: true,
        noFollow: true,
        noTranslate: true,
        noSiteLinksSearchBox: true,
      },
    },
    pinnedTiles: [],
    ...overrides,
  };
}

export function testConfig(dir: string): AdapterConfig {
  return {
    configPath: join(dir, "config.toml"),
    homarrUrl: "http://homarr.test:7575",
    stateFile: join(dir, "state.json"),
    brandingFile: join(dir, "branding.toml"),
    dockerSocket: join(dir, "docker.sock"),
    requestTimeoutMs: 1000,
    retry: { attempts: 1, initialDelayMs: 0, maxDelayMs: 0 },
  };
}

export function descriptor(id: string, overrides: Partial<ApplicationDescriptor> = {}): ApplicationDescriptor {
  return {
    id,
    containerId: `${id}-container-id`,
    containerName: id,
    name: id.charAt(0).toUpperCase() + id.slice(1),
    url: `http://${id}.lan`,
    ...overrides,
  };
}
