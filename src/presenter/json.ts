import { FACT_NAMES, FactName, SystemSnapshot } from '../collector/types';

/** Pretty JSON of the snapshot; absent facts become null. */
export function toJson(snapshot: SystemSnapshot): string {
  const view: Partial<Record<FactName, unknown>> = {};
  for (const name of FACT_NAMES) {
    const fact = snapshot[name];
    view[name] = fact.ok ? fact.value : null;
  }
  return `${JSON.stringify(view, null, 2)}\n`;
}
