export interface DiscoveredApp {
  tileId: string;
  name?: string;
  url?: string;
  addedAt?: string;
}

export interface AdapterState {
  version: string;
  permanentCredential?: string;
  firstBootCompleted: boolean;
  discoveredApps: Map<string, DiscoveredApp>;
  removedApps: Set<string>;
  lastSyncAt?: string;
}

export interface ApplicationDescriptor {
  id: string;
  containerId: string;
  containerName: string;
  name: string;
  url: string;
  iconUrl?: string;
  description?: string;
  category?: string;
}

export interface DiscoveryFailure {
  containerId: string;
  containerName: string;
  reason: string;
}

export interface DiscoveryResult {
  apps: ApplicationDescriptor[];
  failures: DiscoveryFailure[];
}

export interface OnboardingStatus {
  complete: boolean;
  currentStep: string;
  pendingSteps: string[];
}

export interface OnboardingSettings {
  admin: { username: string; password: string };
  analytics: {
    enableGeneral: boolean;
    enableWidgetData: boolean;
    enableIntegrationData: boolean;
    enableUserData: boolean;
  };
  crawlingAndIndexing: {
    noIndex: boolean;
    noFollow: boolean;
    noTranslate: boolean;
    noSiteLinksSearchBox: boolean;
  };
}

export interface BoardRef {
  id: string;
  name: string;
}

export interface BoardDefinition {
  name: string;
  columnCount: number;
  isPublic: boolean;
}

export interface BoardAppearance {
  pageTitle: string;
  logoImageUrl?: string;
  primaryColor?: string;
}

export type ColorScheme = "light" | "dark";

export interface TilePlacement {
  width: number;
  height: number;
  category?: string;
}

export interface AppDefinition {
  name: string;
  href: string;
  iconUrl?: string;
  description?: string;
}

export interface DashboardApp {
  id: string;
  name: string;
  href: string | null;
}

export type CreateAppResult =
  | { status: "created"; appId: string }
  | { status: "conflict" };

export interface FederatedLoginSettings {
  enabled: boolean;
  issuer: string;
  clientId: string;
  clientSecret?: string;
  displayName?: string;
}
