import { BootstrapController } from "../adapter/services/bootstrap.ts";
import { SyncController } from "../adapter/services/sync.ts";
import { createAdapter } from "../adapter/app.ts";
import { loadBranding } from "../lib/branding.ts";
import type { AdapterConfig } from "../lib/config.ts";
import { ExitCode } from "../lib/exit-codes.ts";
import { logger } from "../lib/logger.ts";

export async function run(_args: string[], config: AdapterConfig): Promise<ExitCode> {
  const branding = loadBranding(config.brandingFile);
  const { store, client, discovery } = createAdapter(config);

  if (!store.load().firstBootCompleted) {
    logger("sync").info("First-boot setup has not completed, running it first");
    await new BootstrapController(store, client, branding).run();
  }

  const report = await new SyncController(store, client, discovery, branding.board.name).run();

  console.log(
    `Sync: ${report.created.length} created, ${report.skipped.length} skipped, ${report.failed.length} failed`,
  );
  for (const id of report.evicted) {
    console.log(`  removed in Homarr, now excluded: ${id}`);
  }
  for (const { id, reason } of report.failed) {
    console.log(`  failed: ${id}: ${reason}`);
  }
  return report.failed.length > 0 ? ExitCode.Partial : ExitCode.Success;
}
