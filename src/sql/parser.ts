/**
 * SQL Parser
 * ===========
 *
 * Parses model SQL using node-sql-parser (PostgreSQL dialect) and serializes
 * rewritten trees back to SQL text.
 *
 * A model body must be exactly one query: `SELECT ...`, `WITH ... SELECT ...`
 * or a set operation. Anything else is rejected.
 *
 * @module
 */

import pkg from 'node-sql-parser';
import type { AST } from 'node-sql-parser';
import { BodyParseError } from '../core/errors';
import { normalizeBody } from '../core/model';
import { isSelectNode } from './ast-types';
import type { SelectNode } from './ast-types';

const { Parser } = pkg;

const DIALECT = { database: 'PostgresQL' };

/** A parsed model query: the library's tree plus its validated select root */
export interface ParsedQuery {
  ast: AST;
  root: SelectNode;
}

/**
 * SQLParser: thin wrapper over node-sql-parser's `Parser`
 */
export class SQLParser {
  private parser: InstanceType<typeof Parser>;

  constructor() {
    this.parser = new Parser();
  }

  /**
   * Parse a single query. Trailing semicolons are ignored.
   */
  parseQuery(sql: string): ParsedQuery {
    const text = normalizeBody(sql);
    if (text === '') {
      throw new BodyParseError('expected exactly one SQL statement, found 0');
    }

    let result: AST | AST[];
    try {
      result = this.parser.astify(text, DIALECT);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      throw new BodyParseError(`parse SQL (Postgres dialect): ${detail}`, { cause: e });
    }

    const statements = (Array.isArray(result) ? result : [result]).filter(
      (stmt) => stmt !== null && stmt !== undefined,
    );
    if (statements.length !== 1) {
      throw new BodyParseError(`expected exactly one SQL statement, found ${statements.length}`);
    }

    const ast = statements[0];
    if (!isSelectNode(ast)) {
      throw new BodyParseError(
        `unsupported statement kind in model (expected query): ${String(ast.type).toUpperCase()}`,
      );
    }
    return { ast, root: ast };
  }

  /** Serialize a tree back to PostgreSQL text */
  toSql(ast: AST): string {
    return this.parser.sqlify(ast, DIALECT);
  }
}

/** Shared parser; node-sql-parser's Parser keeps no per-call state */
export const sqlParser = new SQLParser();
