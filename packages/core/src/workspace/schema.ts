import { z } from 'zod';

const StringRecord = z.record(z.string());

/**
 * package.json fields Hopper reads
 */
export const PackageManifestSchema = z.object({
  name: z.string().min(1, 'name must not be empty'),
  version: z.string().optional(),
  private: z.boolean().optional(),
  scripts: StringRecord.optional(),
  dependencies: StringRecord.optional(),
  devDependencies: StringRecord.optional(),
  peerDependencies: StringRecord.optional(),
  optionalDependencies: StringRecord.optional(),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

/**
 * Root package.json - name is optional, workspaces may be an array or
 * the `{ packages: [...] }` object form
 */
export const RootManifestSchema = PackageManifestSchema.extend({
  name: z.string().optional(),
  workspaces: z
    .union([z.array(z.string()), z.object({ packages: z.array(z.string()) })])
    .optional(),
});

export type RootManifest = z.infer<typeof RootManifestSchema>;

export const PnpmWorkspaceSchema = z.object({
  packages: z.array(z.string()).default([]),
});

export const DEPENDENCY_FIELDS = [
  'dependencies',
  'devDependencies',
  'peerDependencies',
  'optionalDependencies',
] as const;

/**
 * Name of the root workspace
 */
export const ROOT_WORKSPACE = '//';
