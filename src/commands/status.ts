import { StateStore } from "../adapter/services/state.ts";
import type { AdapterConfig } from "../lib/config.ts";
import { ExitCode } from "../lib/exit-codes.ts";

export async function run(_args: string[], config: AdapterConfig): Promise<ExitCode> {
  const { state, exists, error } = new StateStore(config.stateFile).inspect();

  console.log(`State file:     ${config.stateFile}${exists ? "" : " (not created yet)"}`);
  console.log(`First boot:     ${state.firstBootCompleted ? "completed" : "pending"}`);
  console.log(`Credential:     ${state.permanentCredential ? "present" : "absent"}`);
  console.log(`Discovered:     ${state.discoveredApps.size}`);
  console.log(`Removed:        ${state.removedApps.size}`);
  console.log(`Last sync:      ${state.lastSyncAt ?? "never"}`);
  if (error) {
    console.log(`State error:    ${error.message}`);
  }
  return ExitCode.Success;
}
