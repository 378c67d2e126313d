/**
 * SQL Module
 * ===========
 *
 * Static analysis of model SQL: parsing with node-sql-parser and table
 * reference collection with CTE scoping.
 *
 * ## Quick Start
 *
 * ```ts
 * import { inferRelationsFromSql } from './sql';
 *
 * inferRelationsFromSql('SELECT * FROM app.users JOIN orders USING (user_id)');
 * // [['app', 'users'], ['orders']]
 * ```
 *
 * @module
 */

// Re-export all AST types
export * from './ast-types';

// Re-export parser
export { SQLParser, sqlParser, type ParsedQuery } from './parser';

// Re-export analyzer
export { QueryWalker, collectRelations, inferRelationsFromSql, isCteName, type ScopeStack } from './analyzer';
