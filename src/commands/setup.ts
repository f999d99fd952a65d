import { BootstrapController } from "../adapter/services/bootstrap.ts";
import { createAdapter } from "../adapter/app.ts";
import { loadBranding } from "../lib/branding.ts";
import type { AdapterConfig } from "../lib/config.ts";
import { ExitCode } from "../lib/exit-codes.ts";

export async function run(_args: string[], config: AdapterConfig): Promise<ExitCode> {
  const branding = loadBranding(config.brandingFile);
  const { store, client } = createAdapter(config);

  const { performed } = await new BootstrapController(store, client, branding).run();

  console.log("Setup: complete");
  console.log(`Steps: ${performed.length > 0 ? performed.join(", ") : "nothing to do"}`);
  return ExitCode.Success;
}
