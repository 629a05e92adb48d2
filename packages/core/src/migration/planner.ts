/**
 * @module migration/planner
 * Decides which change scripts still need to run.
 *
 * The change history is reduced to a single watermark: the highest version
 * ever recorded. A script is pending only if its version is strictly above
 * that watermark. A script below the watermark is skipped even if it was
 * never recorded, so adding an older version after a newer one has been
 * deployed has no effect; give it a version above the watermark instead.
 */

import { ChangePlan, ScriptCatalog } from './types';
import { CompareVersionKeys, MaxVersion, ParseVersionKey, SortByVersion } from './version';

/**
 * Computes the deployment plan.
 *
 * @param catalog - All scripts discovered on disk
 * @param appliedVersions - Every VERSION in the change history, any order
 * @returns Pending and skipped scripts, both ascending by version
 */
export function PlanChangeScripts(
  catalog: ScriptCatalog,
  appliedVersions: readonly string[]
): ChangePlan {
  const maxApplied = MaxVersion(appliedVersions);
  const sorted = SortByVersion([...catalog.values()], (script) => script.Version);

  if (maxApplied === null) {
    return { Pending: sorted, Skipped: [], MaxAppliedVersion: null };
  }

  const watermark = ParseVersionKey(maxApplied);
  const plan: ChangePlan = { Pending: [], Skipped: [], MaxAppliedVersion: maxApplied };

  for (const script of sorted) {
    if (CompareVersionKeys(ParseVersionKey(script.Version), watermark) > 0) {
      plan.Pending.push(script);
    } else {
      plan.Skipped.push(script);
    }
  }

  return plan;
}
