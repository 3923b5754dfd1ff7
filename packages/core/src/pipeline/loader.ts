import { readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { Logger, TaskDefinition } from '../types.js';
import { PipelineConfigError, PipelineConfigSchema, type PipelineConfig } from './schema.js';

export const PIPELINE_FILES = ['hopper.json', 'hopper.yaml', 'hopper.yml'];

/**
 * Pipeline Loader - Reads the task pipeline from the repository root
 */
export class PipelineLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load the first pipeline file found in rootDir
   *
   * @throws PipelineConfigError if no file exists or it fails validation
   */
  async load(rootDir: string): Promise<PipelineConfig> {
    for (const file of PIPELINE_FILES) {
      const path = join(rootDir, file);
      let raw: string;
      try {
        raw = await readFile(path, 'utf-8');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') continue;
        throw error;
      }

      this.logger?.debug(`Loading pipeline from ${file}`);
      return this.parse(raw, file);
    }

    throw new PipelineConfigError(
      `No pipeline configuration found in ${rootDir} (looked for ${PIPELINE_FILES.join(', ')})`
    );
  }

  /**
   * Parse and validate pipeline source text
   */
  parse(raw: string, file = 'hopper.json'): PipelineConfig {
    let data: unknown;
    try {
      data = file.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
    } catch (error) {
      throw new PipelineConfigError(
        `Failed to parse ${file}: ${error instanceof Error ? error.message : 'Unknown'}`
      );
    }

    const result = PipelineConfigSchema.safeParse(data ?? {});
    if (!result.success) {
      throw new PipelineConfigError(`Invalid pipeline configuration in ${file}`, result.error);
    }

    const taskCount = Object.keys(result.data.tasks).length;
    if (taskCount === 0) {
      this.logger?.warn(`${file} defines no tasks`);
    }

    return result.data;
  }
}

/**
 * Look up the definition that applies to a task in a workspace:
 * `workspace#task` first, then `task`. Root tasks only use `//#task`.
 */
export function findTaskDefinition(
  pipeline: PipelineConfig,
  workspace: string,
  task: string,
  isRoot: boolean
): TaskDefinition | undefined {
  const own = (key: string) => (Object.hasOwn(pipeline.tasks, key) ? pipeline.tasks[key] : undefined);
  const specific = own(`${workspace}#${task}`);
  if (specific || isRoot) return specific;
  return own(task);
}
