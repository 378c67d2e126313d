/**
 * Dependency Analyzer
 * ===================
 *
 * Walks a parsed query and reports every table it reads, as name parts.
 *
 * ## Scoping
 *
 * CTE names shadow tables. Each `WITH` pushes its names as one scope before
 * its CTE bodies, main query and set-operation branches are visited, and pops
 * them afterwards. A one-part reference is skipped when any enclosing scope
 * (innermost first) defines it.
 *
 * ```ts
 * const refs = collectRelations(sqlParser.parseQuery(`
 *   WITH recent AS (SELECT * FROM app.orders)
 *   SELECT * FROM recent JOIN users USING (user_id)
 * `).root);
 * // [['app', 'orders'], ['users']]
 * ```
 *
 * @module
 */

import {
  cteName,
  cteStatement,
  isAstNode,
  isSelectNode,
  isTableRefNode,
  nestedFromItems,
  tableRefParts,
} from './ast-types';
import type { AstNode, NameParts, SelectNode, TableRefNode } from './ast-types';
import { sqlParser } from './parser';

/** Ordered list of CTE name sets, outermost first */
export type ScopeStack = Array<ReadonlySet<string>>;

export function isCteName(scopes: ScopeStack, name: string): boolean {
  for (let i = scopes.length - 1; i >= 0; i--) {
    if (scopes[i].has(name)) return true;
  }
  return false;
}

/** Keys of a SELECT node the walker visits explicitly */
const STRUCTURAL_KEYS = new Set(['with', 'from', '_next', 'loc']);

/**
 * Generic query walker. Subclasses decide what to do with each table
 * reference; the traversal and CTE scoping live here.
 */
export abstract class QueryWalker {
  protected readonly scopes: ScopeStack;

  constructor(initialScope: Iterable<string> = []) {
    this.scopes = [new Set(initialScope)];
  }

  /** Called for every table reference not shadowed by a CTE */
  protected abstract visitTableRef(node: TableRefNode, parts: NameParts): void;

  walk(root: SelectNode): void {
    this.visitSelect(root);
  }

  protected visitSelect(select: SelectNode): void {
    const withList = Array.isArray(select.with) ? select.with : [];
    const names = withList.map(cteName).filter((n): n is string => n !== undefined);
    const pushed = names.length > 0;
    if (pushed) {
      this.scopes.push(new Set(names));
    }

    try {
      for (const cte of withList) {
        this.visitAny(cteStatement(cte));
      }

      if (Array.isArray(select.from)) {
        for (const item of select.from) this.visitFromItem(item);
      } else if (select.from !== undefined && select.from !== null) {
        this.visitFromItem(select.from);
      }

      // Columns, WHERE, GROUP BY, HAVING, ORDER BY, LIMIT/OFFSET/FETCH, windows:
      // table references only occur inside subqueries there.
      for (const [key, value] of Object.entries(select)) {
        if (!STRUCTURAL_KEYS.has(key)) this.visitAny(value);
      }

      // UNION / INTERSECT / EXCEPT branches share the head's WITH clause
      if (isSelectNode(select._next)) {
        this.visitSelect(select._next);
      }
    } finally {
      if (pushed) {
        this.scopes.pop();
      }
    }
  }

  protected visitFromItem(item: unknown): void {
    if (!isAstNode(item)) return;

    if (isTableRefNode(item)) {
      const parts = tableRefParts(item);
      if (!(parts.length === 1 && isCteName(this.scopes, parts[0]))) {
        this.visitTableRef(item, parts);
      }
      this.visitExpressions(item);
      return;
    }

    const nested = nestedFromItems(item);
    if (nested) {
      for (const child of nested) this.visitFromItem(child);
      this.visitExpressions(item, 'expr');
      return;
    }

    // Derived table `(SELECT ...) AS x`, VALUES lists, set-returning functions
    this.visitAny(item);
  }

  /** Join predicates and other expressions hanging off a FROM item */
  private visitExpressions(item: AstNode, skip?: string): void {
    for (const [key, value] of Object.entries(item)) {
      if (key !== skip && key !== 'loc') this.visitAny(value);
    }
  }

  /** Descend through expressions until a nested query is found */
  protected visitAny(value: unknown): void {
    if (Array.isArray(value)) {
      for (const child of value) this.visitAny(child);
      return;
    }
    if (!isAstNode(value)) return;
    if (isSelectNode(value)) {
      this.visitSelect(value);
      return;
    }
    for (const [key, child] of Object.entries(value)) {
      if (key !== 'loc') this.visitAny(child);
    }
  }
}

class RelationCollector extends QueryWalker {
  readonly found = new Map<string, NameParts>();

  protected visitTableRef(_node: TableRefNode, parts: NameParts): void {
    this.found.set(parts.join('.'), parts);
  }
}

/** Every table referenced by a query, de-duplicated and sorted */
export function collectRelations(root: SelectNode, initialScope: Iterable<string> = []): NameParts[] {
  const collector = new RelationCollector(initialScope);
  collector.walk(root);
  return [...collector.found.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, parts]) => parts);
}

/** Parse one query and collect its relations */
export function inferRelationsFromSql(sql: string): NameParts[] {
  return collectRelations(sqlParser.parseQuery(sql).root);
}
