import Docker from "dockerode";
import { describeIssues } from "../../lib/config.ts";
import { ConnectionError, errorMessage } from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import { slugifyAppId } from "../lib/id.ts";
import { AppLabelsSchema } from "../schemas.ts";
import type {
  ApplicationDescriptor,
  DiscoveryFailure,
  DiscoveryResult,
} from "../types.ts";

export const ENABLE_LABEL = "homarr.enable";
const COMPOSE_SERVICE_LABEL = "com.docker.compose.service";
const TRUTHY = new Set(["true", "1", "yes", "on"]);

const log = logger("docker");

export type ContainerSummary = Pick<Docker.ContainerInfo, "Id" | "Names" | "Labels">;

export type ContainerParseResult =
  | { ok: true; app: ApplicationDescriptor }
  | { ok: false; failure: DiscoveryFailure };

export interface AppDiscovery {
  discover(): Promise<DiscoveryResult>;
}

export function isEnabled(labels: Record<string, string> | undefined): boolean {
  const value = labels?.[ENABLE_LABEL];
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

function containerName(c: ContainerSummary): string {
  const name = c.Names?.[0]?.replace(/^\//, "");
  return name || c.Id.slice(0, 12);
}

export function parseContainer(c: ContainerSummary): ContainerParseResult {
  const labels = c.Labels ?? {};
  const name = containerName(c);
  const fail = (reason: string): ContainerParseResult => ({
    ok: false,
    failure: { containerId: c.Id, containerName: name, reason },
  });

  const parsed = AppLabelsSchema.safeParse(labels);
  if (!parsed.success) {
    return fail(describeIssues(parsed.error));
  }
  const l = parsed.data;

  const id = slugifyAppId(l["homarr.id"] ?? labels[COMPOSE_SERVICE_LABEL] ?? name);
  if (!id) {
    return fail("cannot derive an app id from homarr.id, compose service or container name");
  }

  return {
    ok: true,
    app: {
      id,
      containerId: c.Id,
      containerName: name,
      name: l["homarr.name"],
      url: l["homarr.url"],
      iconUrl: l["homarr.icon"],
      description: l["homarr.description"],
      category: l["homarr.category"],
    },
  };
}

export class DockerDiscovery implements AppDiscovery {
  constructor(private docker: Pick<Docker, "listContainers">) {}

  static fromSocket(socketPath: string): DockerDiscovery {
    return new DockerDiscovery(new Docker({ socketPath }));
  }

  async discover(): Promise<DiscoveryResult> {
    let containers: Docker.ContainerInfo[];
    try {
      containers = await this.docker.listContainers({
        all: false,
        filters: { label: [ENABLE_LABEL] },
      });
    } catch (err) {
      throw new ConnectionError(`Failed to list Docker containers: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const result: DiscoveryResult = { apps: [], failures: [] };
    for (const c of containers) {
      if (!isEnabled(c.Labels)) continue;

      const parsed = parseContainer(c);
      if (parsed.ok) {
        log.debug("Discovered app {id} from container {container}", {
          id: parsed.app.id,
          container: parsed.app.containerName,
        });
        result.apps.push(parsed.app);
      } else {
        log.warn("Skipping container {container}: {reason}", {
          container: parsed.failure.containerName,
          reason: parsed.failure.reason,
        });
        result.failures.push(parsed.failure);
      }
    }

    log.info("Discovered {count} app(s) from Docker containers", {
      count: result.apps.length,
    });
    return result;
  }
}
