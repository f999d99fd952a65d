import { createAdapter } from "../adapter/app.ts";
import { slugifyAppId } from "../adapter/lib/id.ts";
import { markRemoved } from "../adapter/services/state.ts";
import type { AdapterConfig } from "../lib/config.ts";
import { BootstrapError } from "../lib/errors.ts";
import { ExitCode } from "../lib/exit-codes.ts";
import { logger } from "../lib/logger.ts";

const log = logger("remove");

export async function run(args: string[], config: AdapterConfig): Promise<ExitCode> {
  const id = args.length === 1 ? slugifyAppId(args[0] ?? "") : "";
  if (!id) {
    console.error("Usage: homarr-container-adapter remove <app-id>");
    return ExitCode.Fatal;
  }

  const { store, client } = createAdapter(config);
  const state = store.load();

  const entry = state.discoveredApps.get(id);
  if (entry) {
    if (!state.permanentCredential) {
      throw new BootstrapError("No permanent credential in state; run setup first");
    }
    const result = await client.withCredential(state.permanentCredential).deleteApp(entry.tileId);
    log.info("Deleted app {tileId} for {id} from Homarr ({result})", {
      tileId: entry.tileId,
      id,
      result,
    });
  }

  if (!markRemoved(state, id)) {
    console.log(`Remove: ${id} is already excluded`);
    return ExitCode.Success;
  }
  store.save(state);

  console.log(`Remove: ${id} excluded from sync`);
  return ExitCode.Success;
}
