/**
 * @module commands/validate
 * Implementation of the `floe validate` CLI command.
 */

import { Floe, FloeConfig, ValidateResult } from '@floe/core';
import { LogDebug, LogError, LogInfo, PrintValidationReport } from '../formatting';

/**
 * Compares the change history with the scripts on disk. Nothing is applied.
 *
 * @param config - Loaded Floe configuration
 * @param floe - Engine to run; built from `config` when omitted
 * @returns true when every recorded script is on disk with its recorded checksum
 */
export async function RunValidate(config: FloeConfig, floe: Floe = new Floe(config)): Promise<boolean> {
  floe.OnProgress({ OnLog: LogInfo, OnDebug: LogDebug });

  let result: ValidateResult;
  try {
    result = await floe.Validate();
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }

  PrintValidationReport(result);
  return result.Valid;
}
