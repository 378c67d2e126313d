/**
 * Project configuration.
 *
 * Loading a config file is the CLI's job; the engine takes a plain options
 * object and fills in defaults.
 *
 * ```ts
 * const config = resolveConfig({ sources: ['public.users'] });
 * const project = await loadProject('/path/to/project', config);
 * ```
 *
 * @module
 */

export interface ProjectConfig {
  /** Directory (relative to the project root) holding `<schema>/<name>.sql` files */
  modelsDir: string;
  /** Externally managed relations, as `schema.name` */
  sources: string[];
  /** Directory for compiled SQL and docs */
  targetDir: string;
}

export const DEFAULT_CONFIG: Readonly<ProjectConfig> = {
  modelsDir: 'models',
  sources: [],
  targetDir: 'target',
};

export function resolveConfig(options: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    modelsDir: options.modelsDir ?? DEFAULT_CONFIG.modelsDir,
    sources: options.sources ?? [...DEFAULT_CONFIG.sources],
    targetDir: options.targetDir ?? DEFAULT_CONFIG.targetDir,
  };
}
