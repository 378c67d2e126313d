/**
 * `docs` and `graph`: read-only views of the project.
 *
 * @module
 */

import { generateDocs } from '../docs/docs';
import { parseGraphFormat, renderGraph } from '../graph/render';
import { CommandLog, EXIT_OK, guard, loadSelection, selectsAll } from './context';
import type { CommandOptions, ExitCode } from './context';

/** Markdown docs for the selected models; the index only when nothing was filtered */
export function docsCommand(options: CommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const { project, relations } = await loadSelection(options);
    if (relations.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }
    const written = await generateDocs(project, relations, { ...options.config, all: selectsAll(options) });
    for (const path of written) log.info(`Generated ${path}`);
    return EXIT_OK;
  });
}

export interface GraphCommandOptions extends CommandOptions {
  /** `ascii` (default), `dot`, `json` or `mermaid` */
  format?: string;
}

/** Print the DAG of the selected models; the rendering is printed even when quiet */
export function graphCommand(options: GraphCommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const format = parseGraphFormat(options.format ?? 'ascii');
    const { project, relations } = await loadSelection(options);
    if (relations.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }
    console.log(renderGraph(project, relations, format));
    return EXIT_OK;
  });
}
