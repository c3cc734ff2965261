/**
 * course-sync.yaml loading and validation
 *
 * The file is parsed with `yaml` and checked field by field; every problem
 * found is reported in one ConfigError rather than stopping at the first.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_GITHUB_API_URL, parseRepoUrl } from '../api/github.js';
import type { RepoTarget } from '../api/types.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_ASSET_BASE_URL } from '../platform/memory.js';
import type { MetadataStrategy } from '../reconcilers/frontmatter/types.js';
import { DEFAULT_LAYOUT, type TreeLayout } from '../reconcilers/tree/types.js';
import {
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG_FILE,
  SUPPORTED_CONFIG_VERSION,
  type CourseConfig,
  type SyncConfig,
} from './types.js';

const COURSE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_STATE_DIR = '.course-sync';
export const DEFAULT_TOKEN_ENV = 'GITHUB_TOKEN';
export const DEFAULT_WEBHOOK_SECRET_ENV = 'COURSE_SYNC_WEBHOOK_SECRET';

type Env = Record<string, string | undefined>;

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Config file location: explicit flag, then COURSE_SYNC_CONFIG, then the
 * working directory
 */
export function resolveConfigPath(
  explicit?: string,
  env: Env = process.env,
  cwd: string = process.cwd()
): string {
  const chosen = explicit ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_FILE;
  return isAbsolute(chosen) ? chosen : resolve(cwd, chosen);
}

// =============================================================================
// Field Readers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects issues while reading optional fields with defaults
 */
class FieldReader {
  readonly issues: string[] = [];

  section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
      this.issues.push(`${key}: must be a mapping`);
      return {};
    }
    return value;
  }

  string(map: Record<string, unknown>, key: string, where: string, fallback: string): string {
    const value = map[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string' || value.trim() === '') {
      this.issues.push(`${where}: must be a non-empty string`);
      return fallback;
    }
    return value;
  }

  optionalString(map: Record<string, unknown>, key: string, where: string): string | undefined {
    const value = map[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
      this.issues.push(`${where}: must be a non-empty string`);
      return undefined;
    }
    return value;
  }

  envName(map: Record<string, unknown>, key: string, where: string, fallback: string): string {
    const value = this.string(map, key, where, fallback);
    if (!ENV_NAME_PATTERN.test(value)) {
      this.issues.push(`${where}: "${value}" is not a valid environment variable name`);
    }
    return value;
  }

  boolean(map: Record<string, unknown>, key: string, where: string, fallback: boolean): boolean {
    const value = map[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'boolean') {
      this.issues.push(`${where}: must be true or false`);
      return fallback;
    }
    return value;
  }

  stringList(map: Record<string, unknown>, key: string, where: string): string[] | undefined {
    const value = map[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'string' && item !== '')) {
      this.issues.push(`${where}: must be a list of non-empty strings`);
      return undefined;
    }
    return value.filter((item): item is string => typeof item === 'string');
  }
}

// =============================================================================
// Validation
// =============================================================================

function readLayout(reader: FieldReader, root: Record<string, unknown>): TreeLayout {
  const layout = reader.section(root, 'layout');
  const result: TreeLayout = {
    rootMetadataFile: reader.string(layout, 'rootMetadataFile', 'layout.rootMetadataFile', DEFAULT_LAYOUT.rootMetadataFile),
    sectionMetadataFile: reader.string(layout, 'sectionMetadataFile', 'layout.sectionMetadataFile', DEFAULT_LAYOUT.sectionMetadataFile),
    bookMetadataFile: reader.string(layout, 'bookMetadataFile', 'layout.bookMetadataFile', DEFAULT_LAYOUT.bookMetadataFile),
  };
  const extensions = reader.stringList(layout, 'pageExtensions', 'layout.pageExtensions');
  if (extensions) {
    result.pageExtensions = extensions;
  }
  return result;
}

function readStrategy(reader: FieldReader, root: Record<string, unknown>): MetadataStrategy {
  const metadata = reader.section(root, 'metadata');
  const value = reader.string(metadata, 'strategy', 'metadata.strategy', 'yaml');
  if (value !== 'yaml' && value !== 'simple') {
    reader.issues.push(`metadata.strategy: must be "yaml" or "simple"`);
    return 'yaml';
  }
  return value;
}

function readCourses(reader: FieldReader, root: Record<string, unknown>): CourseConfig[] {
  const raw = root.courses;
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    reader.issues.push('courses: must be a list');
    return [];
  }

  const courses: CourseConfig[] = [];
  const seen = new Set<string>();

  raw.forEach((item: unknown, index: number) => {
    const where = `courses[${index}]`;
    if (!isRecord(item)) {
      reader.issues.push(`${where}: must be a mapping`);
      return;
    }

    const id = reader.optionalString(item, 'id', `${where}.id`);
    if (id === undefined) {
      reader.issues.push(`${where}.id: is required`);
    } else if (!COURSE_ID_PATTERN.test(id)) {
      reader.issues.push(`${where}.id: "${id}" may only contain letters, digits, '.', '_' and '-'`);
    } else if (seen.has(id)) {
      reader.issues.push(`${where}.id: duplicate course id "${id}"`);
    }

    const repo = reader.optionalString(item, 'repo', `${where}.repo`);
    if (repo === undefined) {
      reader.issues.push(`${where}.repo: is required`);
    } else {
      try {
        parseRepoUrl(repo);
      } catch (err) {
        reader.issues.push(`${where}.repo: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    const tokenEnv = reader.optionalString(item, 'tokenEnv', `${where}.tokenEnv`);
    if (tokenEnv !== undefined && !ENV_NAME_PATTERN.test(tokenEnv)) {
      reader.issues.push(`${where}.tokenEnv: "${tokenEnv}" is not a valid environment variable name`);
    }

    const course: CourseConfig = {
      id: id ?? '',
      repo: repo ?? '',
      branch: reader.string(item, 'branch', `${where}.branch`, 'main'),
      autoSync: reader.boolean(item, 'autoSync', `${where}.autoSync`, false),
      tokenEnv,
      owner: reader.optionalString(item, 'owner', `${where}.owner`),
    };

    if (id !== undefined) seen.add(id);
    courses.push(course);
  });

  return courses;
}

/**
 * Validate a parsed config document
 *
 * @param configPath - Absolute path the document was read from; relative
 *   `stateDir` values resolve against its directory
 * @throws ConfigError with code CONFIG_INVALID listing every issue
 */
export function validateConfig(raw: unknown, configPath: string): SyncConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Configuration must be a mapping: ${configPath}`, 'CONFIG_INVALID');
  }

  const reader = new FieldReader();

  const version = raw.version ?? SUPPORTED_CONFIG_VERSION;
  if (version !== SUPPORTED_CONFIG_VERSION) {
    reader.issues.push(`version: unsupported version ${String(version)} (expected ${SUPPORTED_CONFIG_VERSION})`);
  }

  const stateDir = reader.string(raw, 'stateDir', 'stateDir', DEFAULT_STATE_DIR);
  const github = reader.section(raw, 'github');
  const webhook = reader.section(raw, 'webhook');
  const assets = reader.section(raw, 'assets');

  const config: SyncConfig = {
    version: SUPPORTED_CONFIG_VERSION,
    configPath,
    stateDir: isAbsolute(stateDir) ? stateDir : resolve(dirname(configPath), stateDir),
    github: {
      baseUrl: reader.string(github, 'baseUrl', 'github.baseUrl', DEFAULT_GITHUB_API_URL),
      tokenEnv: reader.envName(github, 'tokenEnv', 'github.tokenEnv', DEFAULT_TOKEN_ENV),
    },
    webhook: {
      secretEnv: reader.envName(webhook, 'secretEnv', 'webhook.secretEnv', DEFAULT_WEBHOOK_SECRET_ENV),
    },
    layout: readLayout(reader, raw),
    metadata: { strategy: readStrategy(reader, raw) },
    assets: {
      baseUrl: reader.string(assets, 'baseUrl', 'assets.baseUrl', DEFAULT_ASSET_BASE_URL),
    },
    courses: readCourses(reader, raw),
  };

  if (reader.issues.length > 0) {
    throw new ConfigError(
      `Configuration validation failed: ${configPath}`,
      'CONFIG_INVALID',
      reader.issues,
      'Fix the listed fields and run the command again'
    );
  }

  return config;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and validate a course-sync.yaml file
 *
 * @throws ConfigError if the file is missing, unparseable or invalid
 */
export async function loadConfig(configPath: string): Promise<SyncConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${configPath}`,
      'CONFIG_NOT_FOUND',
      [],
      `Create ${DEFAULT_CONFIG_FILE}, pass --config, or set ${CONFIG_PATH_ENV}`
    );
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_NOT_FOUND'
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config YAML: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR'
    );
  }

  return validateConfig(raw ?? {}, configPath);
}

// =============================================================================
// Lookups
// =============================================================================

/**
 * @throws ConfigError CONFIG_UNKNOWN_COURSE
 */
export function findCourse(config: SyncConfig, id: string): CourseConfig {
  const course = config.courses.find((candidate) => candidate.id === id);
  if (!course) {
    const known = config.courses.map((candidate) => candidate.id);
    throw new ConfigError(
      `Unknown course: ${id}`,
      'CONFIG_UNKNOWN_COURSE',
      [],
      known.length > 0 ? `Configured courses: ${known.join(', ')}` : 'No courses are configured'
    );
  }
  return course;
}

/**
 * Access token for a course
 *
 * A course that names its own variable must find it set; the shared default
 * variable is optional so public repositories work without a token.
 *
 * @throws ConfigError CONFIG_MISSING_SECRET
 */
export function resolveToken(
  config: SyncConfig,
  course: CourseConfig,
  env: Env = process.env
): string | undefined {
  if (course.tokenEnv) {
    const token = env[course.tokenEnv];
    if (!token) {
      throw new ConfigError(
        `Token for course ${course.id} is not set`,
        'CONFIG_MISSING_SECRET',
        [],
        `Set the ${course.tokenEnv} environment variable`
      );
    }
    return token;
  }
  const token = env[config.github.tokenEnv];
  return token ? token : undefined;
}

/**
 * Shared webhook secret, or null when not configured
 */
export function resolveWebhookSecret(config: SyncConfig, env: Env = process.env): string | null {
  const secret = env[config.webhook.secretEnv];
  return secret ? secret : null;
}

/**
 * Repository target for a configured course
 */
export function toRepoTarget(
  config: SyncConfig,
  course: CourseConfig,
  env: Env = process.env
): RepoTarget {
  const { owner, repo } = parseRepoUrl(course.repo);
  return { owner, repo, branch: course.branch, token: resolveToken(config, course, env) };
}

/**
 * Check whether an error came from configuration
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
