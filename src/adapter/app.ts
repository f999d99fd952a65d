import type { AdapterConfig } from "../lib/config.ts";
import { DockerDiscovery, type AppDiscovery } from "./services/docker.ts";
import { HomarrClient, type DashboardApi } from "./services/homarr.ts";
import { StateStore } from "./services/state.ts";

export interface Adapter {
  store: StateStore;
  client: DashboardApi;
  discovery: AppDiscovery;
}

export function createAdapter(config: AdapterConfig): Adapter {
  return {
    store: new StateStore(config.stateFile),
    client: new HomarrClient({
      baseUrl: config.homarrUrl,
      timeoutMs: config.requestTimeoutMs,
      retry: config.retry,
    }),
    discovery: DockerDiscovery.fromSocket(config.dockerSocket),
  };
}
