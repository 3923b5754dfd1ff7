/**
 * Pipeline System - Declarative task definitions (hopper.json / hopper.yaml)
 */

export {
  PipelineConfigSchema,
  TaskDefinitionSchema,
  PipelineConfigError,
  type PipelineConfig,
} from './schema.js';

export { PipelineLoader, findTaskDefinition, PIPELINE_FILES } from './loader.js';
