import { describe, it, expect } from 'vitest';
import { PlanChangeScripts } from '../migration/planner';
import { ChangeScript, ScriptCatalog } from '../migration/types';

function catalogOf(...versions: string[]): ScriptCatalog {
  const catalog: ScriptCatalog = new Map();
  for (const version of versions) {
    const script: ChangeScript = {
      Name: `V${version}__change.sql`,
      FullPath: `/repo/sql/V${version}__change.sql`,
      Type: 'V',
      Version: version,
      Description: 'Change',
    };
    catalog.set(script.Name, script);
  }
  return catalog;
}

function versionsOf(scripts: ChangeScript[]): string[] {
  return scripts.map((script) => script.Version);
}

describe('PlanChangeScripts', () => {
  it('plans everything when nothing was applied', () => {
    const plan = PlanChangeScripts(catalogOf('2.0', '1.0', '1.1'), []);
    expect(plan.MaxAppliedVersion).toBeNull();
    expect(versionsOf(plan.Pending)).toEqual(['1.0', '1.1', '2.0']);
    expect(plan.Skipped).toEqual([]);
  });

  it('plans only versions above the highest applied version', () => {
    const plan = PlanChangeScripts(catalogOf('1.0', '1.1', '1.2', '2.0'), ['1.0', '1.1']);
    expect(plan.MaxAppliedVersion).toBe('1.1');
    expect(versionsOf(plan.Pending)).toEqual(['1.2', '2.0']);
    expect(versionsOf(plan.Skipped)).toEqual(['1.0', '1.1']);
  });

  it('skips an unapplied version below the watermark', () => {
    const plan = PlanChangeScripts(catalogOf('1.0', '1.5', '2.0'), ['2.0']);
    expect(plan.Pending).toEqual([]);
    expect(versionsOf(plan.Skipped)).toEqual(['1.0', '1.5', '2.0']);
  });

  it('orders numerically rather than lexically', () => {
    const plan = PlanChangeScripts(catalogOf('1.10', '1.9', '1.2'), ['1.1']);
    expect(versionsOf(plan.Pending)).toEqual(['1.2', '1.9', '1.10']);
  });

  it('uses the highest applied version whatever order the history returns', () => {
    const plan = PlanChangeScripts(catalogOf('3', '4'), ['3', '1', '2']);
    expect(plan.MaxAppliedVersion).toBe('3');
    expect(versionsOf(plan.Pending)).toEqual(['4']);
  });

  it('treats a version equal to the watermark under a different spelling as applied', () => {
    const plan = PlanChangeScripts(catalogOf('1.01', '1.2'), ['1.1']);
    expect(versionsOf(plan.Pending)).toEqual(['1.2']);
    expect(versionsOf(plan.Skipped)).toEqual(['1.01']);
  });

  it('returns an empty plan for an empty catalog', () => {
    const plan = PlanChangeScripts(new Map(), ['1']);
    expect(plan.Pending).toEqual([]);
    expect(plan.Skipped).toEqual([]);
  });
});
