export type Version = readonly [number, number, number];

export interface DialectCapabilities {
  cte: boolean;
  recursiveCte: boolean;
  windowFunctions: boolean;
  returning: boolean;
  savepoints: boolean;
  rowLocking: boolean;
  filterClause: boolean;
  intersect: boolean;
  except: boolean;
  rightJoin: boolean;
  fullJoin: boolean;
  nullsOrdering: boolean;
  /** OFFSET may appear without a preceding LIMIT. */
  offsetWithoutLimit: boolean;
  /** Set-operation operands may be wrapped in parentheses. */
  parenthesizedSetOperands: boolean;
  readOnlyTransactions: boolean;
  /** INSERT that updates or skips rows colliding on a unique key. */
  upsert: boolean;
  /** `x op ANY (subquery)` and `x op ALL (subquery)`. */
  quantifiedSubquery: boolean;
  rollup: boolean;
  cube: boolean;
  groupingSets: boolean;
  /** MATERIALIZED / NOT MATERIALIZED on a CTE. */
  materializedCte: boolean;
}

export type Capability = keyof DialectCapabilities;

export function versionAtLeast(version: Version, minimum: Version): boolean {
  for (let i = 0; i < 3; i++) {
    if (version[i] !== minimum[i]) return version[i] > minimum[i];
  }
  return true;
}

export function parseVersion(text: string): Version {
  const match = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(text.trim());
  if (!match) throw new TypeError(`unrecognised version string ${JSON.stringify(text)}`);
  return [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)];
}

export function formatVersion(version: Version): string {
  return version.join('.');
}
