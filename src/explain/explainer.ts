import type { QueryPlan, QueryPlanNode, QueryResult } from '../adapters/result.js';
import type { AppValue, Row } from '../types/logical-type.js';

function toNumber(value: AppValue | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return 0;
}

function describeRow(row: Row): string {
  if (typeof row.detail === 'string') return row.detail;
  return Object.values(row)
    .map((v) => (v === null ? 'NULL' : String(v)))
    .join(' ');
}

/**
 * Plan rows carry `id`, `parent` and `detail` (SQLite's EXPLAIN QUERY PLAN
 * shape). Rows without ids become a flat list in output order.
 */
export function buildPlanTree(rows: Row[]): QueryPlanNode[] {
  const nodes: QueryPlanNode[] = rows.map((row, index) => ({
    id: 'id' in row ? toNumber(row.id) : index + 1,
    parent: 'parent' in row ? toNumber(row.parent) : 0,
    detail: describeRow(row),
    children: [],
  }));
  const byId = new Map<number, QueryPlanNode>();
  for (const node of nodes) byId.set(node.id, node);

  const roots: QueryPlanNode[] = [];
  for (const node of nodes) {
    const parent = node.parent === node.id ? undefined : byId.get(node.parent);
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}

export function formatPlan(nodes: QueryPlanNode[], depth = 0): string {
  const lines: string[] = [];
  for (const node of nodes) {
    lines.push(`${'  '.repeat(depth)}- ${node.detail}`);
    if (node.children.length) lines.push(formatPlan(node.children, depth + 1));
  }
  return lines.join('\n');
}

export function explainResult(sql: string, result: QueryResult): QueryPlan {
  const nodes = buildPlanTree(result.rows);
  return { sql, nodes, text: formatPlan(nodes) };
}
