/**
 * Shared plumbing for the command functions a CLI calls: options, project
 * loading, selection, logging and exit codes.
 *
 * @module
 */

import type { ProjectConfig } from '../core/config';
import { ModelError, formatError } from '../core/errors';
import { relationKey } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { connect } from '../build/client';
import type { DatabaseClient } from '../build/client';
import { applySelectors } from '../graph/selectors';
import { loadProject } from '../graph/project';

/** 0: nothing to report, 1: issues found, 2: fatal */
export type ExitCode = 0 | 1 | 2;

export const EXIT_OK: ExitCode = 0;
export const EXIT_ISSUES: ExitCode = 1;
export const EXIT_FATAL: ExitCode = 2;

export interface CommandOptions {
  /** Project root containing the models directory */
  root: string;
  config?: Partial<ProjectConfig>;
  /** `--select` selectors; empty selects every model */
  select?: string[];
  exclude?: string[];
  /** Silence progress output; fatal errors are still printed */
  quiet?: boolean;
}

export interface DatabaseCommandOptions extends CommandOptions {
  /** Used when no `client` is passed */
  databaseUrl?: string;
  /** Existing connection; left open when the command finishes */
  client?: DatabaseClient;
}

export interface Selection {
  project: Project;
  relations: Relation[];
  models: Model[];
}

/** Console output tagged with a component prefix, e.g. `[model]` */
export class CommandLog {
  constructor(
    private readonly prefix: string,
    private readonly quiet: boolean,
  ) {}

  info(message: string): void {
    if (!this.quiet) console.log(`[${this.prefix}] ${message}`);
  }

  /** Indented detail line under the previous message */
  detail(message: string): void {
    if (!this.quiet) console.log(`  ${message}`);
  }

  warn(message: string): void {
    if (!this.quiet) console.warn(`[${this.prefix}] ${message}`);
  }

  /** Always printed */
  error(err: unknown): void {
    console.error(`[${this.prefix}] ${formatError(err)}`);
  }
}

export async function loadSelection(options: CommandOptions): Promise<Selection> {
  const project = await loadProject(options.root, options.config);
  const relations = applySelectors(project, options.select, options.exclude);
  const models = relations.flatMap((rel) => {
    const model = project.models.get(relationKey(rel));
    return model ? [model] : [];
  });
  return { project, relations, models };
}

/** Whether no selector or exclude narrowed the run */
export function selectsAll(options: CommandOptions): boolean {
  return (options.select ?? []).length === 0 && (options.exclude ?? []).length === 0;
}

/**
 * Run `fn` with the caller's client, or with a fresh connection that is
 * closed afterwards.
 */
export async function withClient<T>(
  options: DatabaseCommandOptions,
  fn: (client: DatabaseClient) => Promise<T>,
): Promise<T> {
  if (options.client) {
    return fn(options.client);
  }
  if (!options.databaseUrl) {
    throw new ModelError('no database connection', { hint: 'set a database URL' });
  }
  const client = await connect(options.databaseUrl);
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}

/** Turn a thrown error into exit code 2, printing it with its context */
export async function guard(log: CommandLog, fn: () => Promise<ExitCode>): Promise<ExitCode> {
  try {
    return await fn();
  } catch (e) {
    log.error(e);
    return EXIT_FATAL;
  }
}
