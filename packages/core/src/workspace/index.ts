/**
 * Workspace System - Package discovery and the internal dependency graph
 */

export {
  PackageManifestSchema,
  RootManifestSchema,
  ROOT_WORKSPACE,
  type PackageManifest,
  type RootManifest,
} from './schema.js';

export { WorkspaceDiscovery, DiscoveryError } from './discovery.js';

export { WorkspaceGraph } from './graph.js';

export { selectWorkspaces, FilterError } from './filter.js';
