/**
 * Data test rendering.
 *
 * `not_null`, `accepted_values` and `relationships` return one `violations`
 * count (pass iff 0); `unique` returns the duplicated keys (pass iff empty).
 *
 * @module
 */

import { quoteIdent, relationKey } from './relation';
import type { ModelTest, Relation } from './types';

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function testToSql(test: ModelTest, model: Relation): string {
  const target = relationKey(model);
  switch (test.kind) {
    case 'not_null':
      return `SELECT COUNT(*) as violations FROM ${target} WHERE ${quoteIdent(test.column)} IS NULL`;
    case 'unique': {
      const cols = test.columns.map(quoteIdent).join(', ');
      return `SELECT ${cols}, COUNT(*) as cnt FROM ${target} GROUP BY ${cols} HAVING COUNT(*) > 1`;
    }
    case 'accepted_values':
      return (
        `SELECT COUNT(*) as violations FROM ${target} ` +
        `WHERE ${quoteIdent(test.column)} NOT IN (${test.values.map(sqlString).join(', ')})`
      );
    case 'relationships':
      return (
        `SELECT COUNT(*) as violations FROM ${target} m ` +
        `WHERE m.${quoteIdent(test.column)} IS NOT NULL ` +
        `AND NOT EXISTS (SELECT 1 FROM ${relationKey(test.targetTable)} t ` +
        `WHERE t.${quoteIdent(test.targetColumn)} = m.${quoteIdent(test.column)})`
      );
  }
}

/** Header-style description, e.g. `relationships(user_id, app.users.id)` */
export function describeTest(test: ModelTest): string {
  switch (test.kind) {
    case 'not_null':
      return `not_null(${test.column})`;
    case 'unique':
      return `unique(${test.columns.join(', ')})`;
    case 'accepted_values':
      return `accepted_values(${test.column}, [${test.values.join(', ')}])`;
    case 'relationships':
      return `relationships(${test.column}, ${relationKey(test.targetTable)}.${test.targetColumn})`;
  }
}

/** Whether a test expects a `violations` count rather than duplicate rows */
export function isCountTest(test: ModelTest): boolean {
  return test.kind !== 'unique';
}
