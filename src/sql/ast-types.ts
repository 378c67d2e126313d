/**
 * SQL AST Shapes
 * ==============
 *
 * node-sql-parser produces plain JSON trees whose exact fields vary between
 * clauses and dialect versions. The walker only relies on the few shapes
 * below and narrows everything else from `unknown` through these guards.
 *
 * @module
 */

/** Any JSON object in the AST */
export type AstNode = Record<string, unknown>;

/** A `SELECT` (possibly the head of a set-operation chain via `_next`) */
export interface SelectNode extends AstNode {
  type: 'select';
}

/**
 * A table reference in a FROM list. Two-part names put the schema in `db`
 * (or `schema`, depending on dialect version); three-part names use both.
 */
export interface TableRefNode extends AstNode {
  table: string;
  db?: string | null;
  schema?: string | null;
}

/** Name parts of a reference: length 1 unqualified, 2 qualified, >2 over-qualified */
export type NameParts = readonly string[];

export function isAstNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSelectNode(value: unknown): value is SelectNode {
  return isAstNode(value) && value.type === 'select';
}

export function isTableRefNode(value: unknown): value is TableRefNode {
  return isAstNode(value) && typeof value.table === 'string' && value.table !== '';
}

function nonEmpty(value: unknown): value is string {
  return typeof value === 'string' && value !== '';
}

export function tableRefParts(node: TableRefNode): string[] {
  return [node.db, node.schema, node.table].filter(nonEmpty);
}

/** CTE name: `{ name: { value } }` in current releases, a bare string in older ones */
export function cteName(cte: unknown): string | undefined {
  if (!isAstNode(cte)) return undefined;
  const name = cte.name;
  if (typeof name === 'string') return name;
  if (isAstNode(name) && typeof name.value === 'string') return name.value;
  return undefined;
}

/** CTE body: `{ stmt: { ast } }` or `{ stmt }` */
export function cteStatement(cte: unknown): unknown {
  if (!isAstNode(cte)) return undefined;
  const stmt = cte.stmt;
  if (isAstNode(stmt) && stmt.ast !== undefined) return stmt.ast;
  return stmt;
}

/** Nested join group `(a JOIN b)`: `{ expr: { type: 'tables', value: [...] } }` */
export function nestedFromItems(node: AstNode): unknown[] | undefined {
  const expr = node.expr;
  if (isAstNode(expr) && Array.isArray(expr.value) && expr.type === 'tables') {
    return expr.value;
  }
  return undefined;
}
