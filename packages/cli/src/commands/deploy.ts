/**
 * @module commands/deploy
 * Implementation of the `floe deploy` CLI command (the default command).
 */

import { Floe, FloeConfig } from '@floe/core';
import {
  LogDebug,
  LogInfo,
  LogScriptEnd,
  PrintFailureSummary,
  formatElapsed,
} from '../formatting';

/**
 * Executes the deploy command: applies every pending change script.
 *
 * @param config - Loaded Floe configuration
 * @param floe - Engine to run; built from `config` when omitted
 * @returns true when every pending script was applied
 */
export async function RunDeploy(config: FloeConfig, floe: Floe = new Floe(config)): Promise<boolean> {
  floe.OnProgress({
    OnScriptEnd: LogScriptEnd,
    OnLog: LogInfo,
    OnDebug: LogDebug,
  });

  const result = await floe.Migrate();

  if (!result.Success) {
    PrintFailureSummary(result.ScriptsApplied, result.ErrorMessage);
    return false;
  }

  LogInfo(`Finished in ${formatElapsed(result.TotalExecutionTimeMS)}`);
  console.log();
  return true;
}
