/**
 * Test Syntax Parser
 * ==================
 *
 * Parses the `tests:` header value, a comma list of `name(arg, arg...)` calls:
 *
 * ```
 * not_null(id), unique(a, b), accepted_values(status, ['open', 'it''s']),
 * relationships(user_id, app.users.id)
 * ```
 *
 * Commas inside `[...]` do not split arguments. Quoted values may use `'` or
 * `"`, with the quote doubled to escape it.
 *
 * @module
 */

import { HeaderParseError } from '../core/errors';
import type { ModelTest, Relation } from '../core/types';

const TEST_NAMES = 'not_null, unique, accepted_values, relationships';

export function parseTests(text: string): ModelTest[] {
  const tests: ModelTest[] = [];
  let remaining = text.trim();

  while (remaining.length > 0) {
    remaining = remaining.trimStart();
    if (remaining.length === 0) break;

    if (remaining.startsWith(',')) {
      remaining = remaining.slice(1);
      continue;
    }

    const parenStart = remaining.indexOf('(');
    if (parenStart < 0) {
      throw new HeaderParseError(`invalid test syntax (expected 'test_name(args)'): ${remaining}`);
    }
    const name = remaining.slice(0, parenStart).trim().toLowerCase();
    remaining = remaining.slice(parenStart + 1);

    const parenEnd = findClosingParen(remaining);
    if (parenEnd < 0) {
      throw new HeaderParseError(`invalid test syntax (missing closing paren): ${text.trim()}`);
    }

    const args = splitArgs(remaining.slice(0, parenEnd));
    remaining = remaining.slice(parenEnd + 1);

    tests.push(buildTest(name, args));
  }

  return tests;
}

/** Index of the `)` closing an already-opened paren; `[`/`]` count toward depth */
function findClosingParen(s: string): number {
  let depth = 1;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (ch === '(' || ch === '[') {
      depth++;
    } else if (ch === ')' || ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split on top-level commas; commas inside brackets stay in the argument */
export function splitArgs(s: string): string[] {
  const args: string[] = [];
  let current = '';
  let depth = 0;

  for (const ch of s) {
    if (ch === '[') {
      depth++;
      current += ch;
    } else if (ch === ']') {
      depth--;
      current += ch;
    } else if (ch === ',' && depth === 0) {
      if (current.trim()) args.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  if (depth !== 0) {
    throw new HeaderParseError(`unbalanced brackets in test arguments: ${s}`);
  }
  if (current.trim()) args.push(current.trim());
  return args;
}

function buildTest(name: string, args: string[]): ModelTest {
  if (args.length === 0) {
    throw new HeaderParseError(`test '${name}' requires at least one argument`);
  }

  switch (name) {
    case 'not_null':
      if (args.length !== 1) {
        throw new HeaderParseError(`not_null() takes exactly one column, got ${args.length}`);
      }
      return { kind: 'not_null', column: args[0] };
    case 'unique':
      return { kind: 'unique', columns: args };
    case 'accepted_values':
      if (args.length !== 2) {
        throw new HeaderParseError(
          "accepted_values() takes column and list, e.g., accepted_values(status, ['a', 'b'])",
        );
      }
      return { kind: 'accepted_values', column: args[0], values: parseStringList(args[1]) };
    case 'relationships': {
      if (args.length !== 2) {
        throw new HeaderParseError(
          'relationships() takes column and reference, e.g., relationships(user_id, app.users.id)',
        );
      }
      const [targetTable, targetColumn] = parseColumnRef(args[1]);
      return { kind: 'relationships', column: args[0], targetTable, targetColumn };
    }
    default:
      throw new HeaderParseError(`unknown test type: ${name}. Valid types: ${TEST_NAMES}`);
  }
}

/** `['a', "b", 'it''s']` → `["a", "b", "it's"]` */
export function parseStringList(text: string): string[] {
  const s = text.trim();
  if (!s.startsWith('[') || !s.endsWith(']')) {
    throw new HeaderParseError(`expected list syntax ['val1', 'val2'], got: ${s}`);
  }
  const inner = s.slice(1, -1);
  if (inner.trim() === '') {
    throw new HeaderParseError('accepted_values list cannot be empty');
  }

  const values: string[] = [];
  let i = 0;
  while (i < inner.length) {
    while (i < inner.length && /[\s,]/.test(inner[i])) i++;
    if (i >= inner.length) break;

    const quote = inner[i];
    if (quote !== "'" && quote !== '"') {
      throw new HeaderParseError(`values must be quoted with ' or ": got unexpected char '${quote}'`);
    }
    i++;

    let value = '';
    let closed = false;
    while (i < inner.length) {
      const ch = inner[i];
      i++;
      if (ch !== quote) {
        value += ch;
      } else if (inner[i] === quote) {
        value += quote;
        i++;
      } else {
        closed = true;
        break;
      }
    }
    if (!closed) {
      throw new HeaderParseError('unclosed quote in value list');
    }
    values.push(value);
  }

  if (values.length === 0) {
    throw new HeaderParseError('accepted_values list cannot be empty');
  }
  return values;
}

/** `schema.table.column` */
function parseColumnRef(text: string): [Relation, string] {
  const parts = text.trim().split('.');
  if (parts.length !== 3 || parts.some((p) => p === '')) {
    throw new HeaderParseError(
      `relationships() second argument must be schema.table.column (e.g., 'app.users.id'), got: ${text.trim()}`,
    );
  }
  return [{ schema: parts[0], name: parts[1] }, parts[2]];
}
