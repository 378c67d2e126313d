/**
 * `lint deps`, `lint qualify` and `check`.
 *
 * Issues are collected across every selected model; a model that fails to
 * parse is reported as an issue and the rest are still linted. With `fix`,
 * each file is patched on its own.
 *
 * @module
 */

import { formatError } from '../core/errors';
import { relationKey } from '../core/relation';
import type { Model, Project } from '../core/types';
import { declaredModelDeps, diffDeps, lintDeps } from '../lint/lint-deps';
import { qualifyModelSql } from '../lint/qualify';
import { rewriteDepsLine, rewriteModelBody } from '../lint/rewrite';
import { CommandLog, EXIT_ISSUES, EXIT_OK, guard, loadSelection } from './context';
import type { CommandOptions, ExitCode } from './context';

export interface LintOptions extends CommandOptions {
  /** Rewrite model files where a fix is known */
  fix?: boolean;
}

const keys = (rels: ReadonlyArray<{ schema: string; name: string }>): string => rels.map(relationKey).join(', ');

function depsIssues(project: Project, model: Model): { issues: string[]; fixable: boolean } {
  const result = lintDeps(project, model);
  const diff = diffDeps(declaredModelDeps(project, model), result.inferredModelDeps);
  const issues: string[] = [];
  if (result.unqualifiedRelations.length > 0) {
    issues.push(`unqualified: ${result.unqualifiedRelations.join(', ')}`);
  }
  if (result.unknownRelations.length > 0) {
    issues.push(`unknown: ${result.unknownRelations.join(', ')}`);
  }
  if (diff.missing.length > 0) issues.push(`missing deps: ${keys(diff.missing)}`);
  if (diff.extra.length > 0) issues.push(`extra deps: ${keys(diff.extra)}`);

  const mismatch = diff.missing.length > 0 || diff.extra.length > 0;
  return { issues, fixable: mismatch && result.unqualifiedRelations.length === 0 };
}

function report(log: CommandLog, model: Model, issues: readonly string[]): void {
  log.info(`Issue ${relationKey(model.id)}`);
  for (const issue of issues) log.detail(issue);
}

function summary(log: CommandLog, issues: number, ok: string): ExitCode {
  if (issues === 0) {
    log.info(`OK ${ok}`);
    return EXIT_OK;
  }
  log.info(`Issues: ${issues} model(s) with issues`);
  return EXIT_ISSUES;
}

/** Compare declared `deps:` with what each model's SQL references */
export function lintDepsCommand(options: LintOptions): Promise<ExitCode> {
  const log = new CommandLog('lint', options.quiet ?? false);
  return guard(log, async () => {
    const { project, models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }

    let issues = 0;
    for (const model of models) {
      try {
        const found = depsIssues(project, model);
        if (options.fix && found.fixable) {
          await rewriteDepsLine(model.path, lintDeps(project, model).inferredModelDeps);
          log.info(`Fixed ${relationKey(model.id)} (fixed deps)`);
          continue;
        }
        if (found.issues.length > 0) {
          issues++;
          report(log, model, found.issues);
        }
      } catch (e) {
        issues++;
        report(log, model, [`error: ${formatError(e)}`]);
      }
    }
    return summary(log, issues, 'All deps match');
  });
}

/** Report unqualified table references; with `fix`, qualify the unambiguous ones */
export function lintQualifyCommand(options: LintOptions): Promise<ExitCode> {
  const log = new CommandLog('lint', options.quiet ?? false);
  return guard(log, async () => {
    const { project, models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }

    let issues = 0;
    for (const model of models) {
      try {
        const { result, sql } = qualifyModelSql(project, model);
        if (options.fix && result.changed && sql !== undefined) {
          await rewriteModelBody(model.path, sql);
          log.info(`Fixed ${relationKey(model.id)} (qualified references)`);
          continue;
        }

        const found: string[] = [];
        if (result.unqualified.length > 0) found.push(`unqualified: ${result.unqualified.join(', ')}`);
        if (result.ambiguous.length > 0) found.push(`ambiguous: ${result.ambiguous.join(', ')}`);
        if (result.unknown.length > 0) found.push(`unknown: ${result.unknown.join(', ')}`);
        if (result.changed) found.push('qualifiable references (run with fix)');
        if (found.length > 0) {
          issues++;
          report(log, model, found);
        }
      } catch (e) {
        issues++;
        report(log, model, [`error: ${formatError(e)}`]);
      }
    }
    return summary(log, issues, 'All references qualified');
  });
}

/** Both lints, read-only */
export function checkCommand(options: CommandOptions): Promise<ExitCode> {
  const log = new CommandLog('lint', options.quiet ?? false);
  return guard(log, async () => {
    const { project, models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }

    let issues = 0;
    for (const model of models) {
      const found: string[] = [];
      try {
        found.push(...depsIssues(project, model).issues);
        const { result } = qualifyModelSql(project, model);
        if (result.ambiguous.length > 0) found.push(`ambiguous tables: ${result.ambiguous.join(', ')}`);
      } catch (e) {
        found.push(`error: ${formatError(e)}`);
      }
      if (found.length > 0) {
        issues++;
        report(log, model, found);
      }
    }
    return summary(log, issues, `${models.length} model(s) checked, no issues`);
  });
}
