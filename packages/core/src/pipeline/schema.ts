import { z } from 'zod';
import { parseDependencyRef } from '../graph/task-id.js';

const DependencyRefSchema = z.string().superRefine((value, ctx) => {
  try {
    parseDependencyRef(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `invalid dependency '${value}'`,
    });
  }
});

/**
 * One entry of the `tasks` map
 */
export const TaskDefinitionSchema = z
  .object({
    dependsOn: z.array(DependencyRefSchema).default([]),
    outputs: z.array(z.string()).default([]),
    inputs: z.array(z.string()).default([]),
    env: z.array(z.string()).default([]),
    cache: z.boolean().default(true),
    outputLogs: z.enum(['full', 'hash-only', 'new-only', 'errors-only', 'none']).default('full'),
  })
  .strict();

const TaskKeySchema = z.string().refine((key) => key.length > 0 && !key.startsWith('^'), {
  message: 'task key must be `task`, `workspace#task` or `//#task`',
});

/**
 * hopper.json / hopper.yaml
 *
 * `pipeline` is accepted as a legacy spelling of `tasks`.
 */
export const PipelineConfigSchema = z
  .object({
    $schema: z.string().optional(),
    globalDependencies: z.array(z.string()).default([]),
    globalEnv: z.array(z.string()).default([]),
    tasks: z.record(TaskKeySchema, TaskDefinitionSchema).optional(),
    pipeline: z.record(TaskKeySchema, TaskDefinitionSchema).optional(),
  })
  .strict()
  .transform(({ tasks, pipeline, globalDependencies, globalEnv }) => ({
    globalDependencies,
    globalEnv,
    tasks: { ...(pipeline ?? {}), ...(tasks ?? {}) },
  }));

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;

/**
 * Custom error for pipeline configuration failures
 */
export class PipelineConfigError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'PipelineConfigError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}
