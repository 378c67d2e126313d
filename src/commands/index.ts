/**
 * Command functions for a CLI. Each loads the project, applies selectors,
 * logs progress and resolves to an exit code.
 *
 * @module
 */

export {
  CommandLog,
  EXIT_FATAL,
  EXIT_ISSUES,
  EXIT_OK,
  type CommandOptions,
  type DatabaseCommandOptions,
  type ExitCode,
} from './context';
export { checkCommand, lintDepsCommand, lintQualifyCommand, type LintOptions } from './lint';
export {
  compileCommand,
  modelStatuses,
  runCommand,
  statusCommand,
  testCommand,
  type ModelStatus,
  type RunCommandOptions,
  type SyncStatus,
} from './build';
export { docsCommand, graphCommand, type GraphCommandOptions } from './project';
