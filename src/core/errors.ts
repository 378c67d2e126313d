/**
 * Model Errors
 * ============
 *
 * Error taxonomy for the model build engine. Every error raised while
 * loading, analyzing or running models is a `ModelError` subclass, so callers
 * can separate user-facing model problems from internal failures.
 *
 * Context is added as errors bubble up:
 *
 * ```ts
 * try {
 *   parseHeader(lines);
 * } catch (e) {
 *   throw withContext(e, `parse model header: ${path}`);
 * }
 * ```
 *
 * @module
 */

export interface ModelErrorOptions {
  /** Model file the error belongs to */
  path?: string;
  /** Suggestion shown under the message (e.g. a misspelled key) */
  hint?: string;
  cause?: unknown;
}

export class ModelError extends Error {
  path?: string;
  hint?: string;

  constructor(message: string, options: ModelErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.path = options.path;
    this.hint = options.hint;
  }
}

/** Missing or invalid header key, malformed test syntax, bad tag, incremental-only misuse */
export class HeaderParseError extends ModelError {}

/** Empty body, malformed section markers, `${this}` in `@base`, unparseable SQL */
export class BodyParseError extends ModelError {}

/** Malformed `schema.name` text */
export class RelationParseError extends ModelError {}

/** Unknown, ambiguous or unresolved relation references */
export class DependencyError extends ModelError {}

/** Circular dependency, unknown model in a target or selector */
export class GraphError extends ModelError {}

export interface ExecutionDetails {
  /** `schema.name` of the failing model */
  model: string;
  /** Statement text, trimmed and truncated */
  sqlPreview: string;
  sqlstate?: string;
  /** 1-based character offset into the statement */
  position?: number;
  /** Next steps: edit the file, rerun the model */
  hints: string[];
  /** Similarly named relations when one was missing */
  suggestions: string[];
}

/** A statement failed while materializing a model */
export class ModelExecutionError extends ModelError {
  readonly details: ExecutionDetails;

  constructor(message: string, details: ExecutionDetails, options: ModelErrorOptions = {}) {
    super(message, options);
    this.details = details;
  }
}

// ============ CONTEXT ============

/**
 * Prefix an error's message with where it happened.
 * Non-`Error` values are converted so the result is always throwable.
 */
export function withContext(err: unknown, context: string, path?: string): Error {
  if (err instanceof ModelError) {
    err.message = `${context}: ${err.message}`;
    if (path !== undefined && err.path === undefined) {
      err.path = path;
    }
    return err;
  }
  if (err instanceof Error) {
    return new ModelError(`${context}: ${err.message}`, { path, cause: err });
  }
  return new ModelError(`${context}: ${String(err)}`, { path });
}

/** One-line message plus hint, for console output */
export function formatError(err: unknown): string {
  if (err instanceof ModelExecutionError) {
    const { details } = err;
    const lines = [`model ${details.model} failed: ${err.message}`];
    if (err.path) lines.push(`  file: ${err.path}`);
    if (details.sqlstate) lines.push(`  sqlstate: ${details.sqlstate}`);
    if (details.position !== undefined) lines.push(`  position: ${details.position}`);
    lines.push('  sql:', ...details.sqlPreview.split('\n').map((l) => `    ${l}`));
    for (const s of details.suggestions) lines.push(`  did you mean: ${s}`);
    for (const h of details.hints) lines.push(`  ${h}`);
    return lines.join('\n');
  }
  if (err instanceof ModelError) {
    return err.hint ? `${err.message}\n  hint: ${err.hint}` : err.message;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
