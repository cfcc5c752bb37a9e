import type { GroupItem, OrderTerm, SelectStatement } from '../ir/types.js';

function nodeKey(node: GroupItem): string {
  return JSON.stringify(node, (_key, value: unknown) => (typeof value === 'bigint' ? `${value}n` : value));
}

/**
 * Simple optimizer: de-duplicate GROUP BY expressions and ORDER BY terms.
 * A repeated sort key can never change the order, so the first one wins.
 */
export function optimizeStatement(statement: SelectStatement): SelectStatement {
  const groups = new Set<string>();
  const groupBy = statement.groupBy.filter((g) => {
    const key = nodeKey(g);
    if (groups.has(key)) return false;
    groups.add(key);
    return true;
  });

  const sorted = new Set<string>();
  const orderBy = statement.orderBy.filter((term: OrderTerm) => {
    const key = nodeKey(term.expr);
    if (sorted.has(key)) return false;
    sorted.add(key);
    return true;
  });

  if (groupBy.length === statement.groupBy.length && orderBy.length === statement.orderBy.length) return statement;
  return { ...statement, groupBy, orderBy };
}
