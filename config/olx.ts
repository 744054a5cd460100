/**
 * OLX Configuration
 * Static per-type import/export lists and the environment-driven directory layout.
 * Built once at startup and passed explicitly to the loader, merger and exporter.
 */

import { resolve, normalize, relative, isAbsolute } from 'path';
import { z } from 'zod';

/**
 * Attributes never loaded as metadata and never written back as attributes.
 */
export const METADATA_TO_STRIP = [
  'data_dir',
  'tabs',
  'grading_policy',
  'discussion_blackouts',
  // Old inline-course attributes, still present in exported courses
  'course',
  'org',
  'url_name',
  'filename',
  // Holds unhandled attributes between import and export
  'xml_attributes',
  // Set by hosts that need a node to load inline even though it looks like a pointer
  'x-is-pointer-node'
] as const;

/** Fields that belong in the course policy file rather than inline. */
export const METADATA_TO_EXPORT_TO_POLICY = ['discussion_topics'] as const;

/**
 * Per-category settings fields that live in the definition element itself and must not
 * be cleaned or overridden on export.
 */
export const METADATA_TO_NOT_CLEAN: Readonly<Record<string, readonly string[]>> = {
  video: ['sub', 'transcripts']
};

export const DEFAULT_FILENAME_EXTENSION = 'xml';

export const ASIDE_FAMILY = 'xblock_asides.v1';

export const XML_NAMESPACES = {
  option: 'http://code.edx.org/xblock/option',
  block: 'http://code.edx.org/xblock/block'
} as const;

export interface OlxConfig {
  readonly metadataToStrip: ReadonlySet<string>;
  readonly metadataToExportToPolicy: ReadonlySet<string>;
  readonly metadataToNotClean: ReadonlyMap<string, ReadonlySet<string>>;
  readonly asideFamily: string;
}

export interface OlxConfigOverrides {
  metadataToStrip?: readonly string[];
  metadataToExportToPolicy?: readonly string[];
  metadataToNotClean?: Readonly<Record<string, readonly string[]>>;
}

export function createOlxConfig(overrides: OlxConfigOverrides = {}): OlxConfig {
  const notClean = overrides.metadataToNotClean ?? METADATA_TO_NOT_CLEAN;
  return Object.freeze({
    metadataToStrip: new Set<string>(overrides.metadataToStrip ?? METADATA_TO_STRIP),
    metadataToExportToPolicy: new Set<string>(overrides.metadataToExportToPolicy ?? METADATA_TO_EXPORT_TO_POLICY),
    metadataToNotClean: new Map(
      Object.entries(notClean).map(([category, fields]) => [category, new Set<string>(fields)] as const)
    ),
    asideFamily: ASIDE_FAMILY
  });
}

export const DEFAULT_OLX_CONFIG = createOlxConfig();

export function notToCleanFields(config: OlxConfig, category: string): ReadonlySet<string> {
  return config.metadataToNotClean.get(category) ?? new Set<string>();
}

/**
 * Directory configuration with environment variable overrides
 */
const RelativeDirectory = z.string().min(1).refine(value => !value.startsWith('..'), {
  message: 'must not leave the working directory'
});

const EnvironmentSchema = z.object({
  OLX_SOURCE_DIR: RelativeDirectory.default('course'),
  OLX_EXPORT_DIR: RelativeDirectory.default('export'),
  OLX_POLICY_FILE: z.string().min(1).optional(),
  OLX_COURSE_KEY: z.string().regex(/^course-v1:[^+]+\+[^+]+\+[^+]+$/).default('course-v1:Demo+OLX101+2024')
});

export type OlxEnvironment = z.infer<typeof EnvironmentSchema>;

export function loadOlxEnvironment(env: NodeJS.ProcessEnv = process.env): OlxEnvironment {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid OLX environment configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(process.cwd(), ...segments);
}

/**
 * Check if path is within allowed directory
 */
export function isWithinDirectory(filePath: string, allowedDir: string): boolean {
  const relativePath = relative(normalize(allowedDir), normalize(filePath));
  return !relativePath.startsWith('..') && !isAbsolute(relativePath);
}
