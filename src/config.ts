/**
 * Copyright 2024 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *       https://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { z } from 'zod';

import { ConfigError, InvalidArgumentError } from './errors.js';
import { StringUtil } from './utils.js';

const ARCHIVE_TYPES = ['zip', 'tar', 'gz'] as const;

export const BACKENDS = ['api', 'gcloud'] as const;
export type Backend = (typeof BACKENDS)[number];

const DEFAULT_BACKEND: Backend = 'api';
const DEFAULT_EXTENSIONS: string[] = [...ARCHIVE_TYPES];

/**
 * CONFIG holds the fixed parameters of a scan: the asset type searched for,
 * report and permission-log naming, and defaults for everything an operator
 * can override through `.config.json`, the environment or flags.
 */
export const CONFIG = {
  projectAssetType: 'cloudresourcemanager.googleapis.com/Project',
  bucketScheme: 'gs://',
  report: {
    filePrefix: 'archive_files_',
    fileExtension: '.txt',
    header: ['Project', 'Bucket', 'File Type', 'File Path'],
  },
  permissionLog: {
    filePrefix: 'permission_errors_',
    fileExtension: '.txt',
    header: '# Projects with permission issues',
  },
  userConfigFile: '.config.json',
  env: {
    backend: 'ARCHIVE_SCAN_BACKEND',
    excludedBuckets: 'ARCHIVE_SCAN_EXCLUDED_BUCKETS',
  },
  defaultBackend: DEFAULT_BACKEND,
  defaultExtensions: DEFAULT_EXTENSIONS,
  commandTimeoutMs: 0, // 0 leaves the provider's own timeout in place
  maxAttempts: 1,
  debug: false,
};

const userConfigSchema = z
  .object({
    organizationId: z.string().optional(),
    excludedBuckets: z.array(z.string()).optional(),
    extensions: z.array(z.string()).optional(),
    backend: z.enum(BACKENDS).optional(),
    commandTimeoutMs: z.number().int().nonnegative().optional(),
    maxAttempts: z.number().int().positive().optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof userConfigSchema>;

/** Values taken from the command line; anything unset falls through. */
export interface CliFlags {
  organizationId?: string;
  output?: string;
  excludedBuckets: string[];
  extensions?: string[];
  backend?: string;
  commandTimeoutMs?: number;
  maxAttempts?: number;
  debug?: boolean;
  help?: boolean;
}

export interface ScanSettings {
  /** Only set from `--org-id`; otherwise the operator is prompted. */
  organizationId?: string;
  /** Last organization ID entered, offered as the prompt's initial value. */
  savedOrganizationId?: string;
  outputPath?: string;
  excludedBuckets: Set<string>;
  extensions: string[];
  backend: Backend;
  commandTimeoutMs: number;
  maxAttempts: number;
  debug: boolean;
}

export class UserConfigManager {
  static getUserConfig(file = CONFIG.userConfigFile): UserConfig {
    if (!fs.existsSync(file)) {
      return {};
    }
    let raw: unknown;
    try {
      raw = fs.readJsonSync(file);
    } catch (err) {
      throw new ConfigError(`Failed to read ${file}`, { cause: err });
    }
    const parsed = userConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid ${file}: ${issues}`);
    }
    return parsed.data;
  }

  /** Merges `update` into the stored configuration, keeping other keys. */
  static setUserConfig(update: UserConfig, file = CONFIG.userConfigFile) {
    const current = UserConfigManager.getUserConfig(file);
    fs.writeJsonSync(file, { ...current, ...update }, { spaces: 2 });
  }

  static resolveConfigPath(cwd: string): string {
    return path.join(cwd, CONFIG.userConfigFile);
  }
}

export function isBackend(value: string): value is Backend {
  return BACKENDS.some(backend => backend === value);
}

/**
 * Brings a bucket reference to the canonical `gs://<name>/` form used by
 * listings, so exclusions match however they were written.
 */
export function normalizeBucketUri(value: string): string {
  let name = value.trim();
  if (name.startsWith(CONFIG.bucketScheme)) {
    name = name.slice(CONFIG.bucketScheme.length);
  }
  name = name.replace(/\/+$/, '');
  return name ? `${CONFIG.bucketScheme}${name}/` : '';
}

/**
 * Layers defaults, `.config.json`, environment and flags (last wins).
 * Exclusions accumulate across every layer instead of replacing each other.
 */
export function resolveSettings(
  flags: CliFlags,
  userConfig: UserConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ScanSettings {
  const envBackend = env[CONFIG.env.backend]?.trim() || undefined;
  const backend =
    flags.backend ?? envBackend ?? userConfig.backend ?? CONFIG.defaultBackend;
  if (!isBackend(backend)) {
    throw new InvalidArgumentError(
      `Unknown backend '${backend}'. Expected one of: ${BACKENDS.join(', ')}`
    );
  }

  const excluded = [
    ...(userConfig.excludedBuckets ?? []),
    ...StringUtil.splitList(env[CONFIG.env.excludedBuckets] ?? ''),
    ...flags.excludedBuckets,
  ]
    .map(normalizeBucketUri)
    .filter(uri => uri.length > 0);

  return {
    organizationId: flags.organizationId,
    savedOrganizationId: userConfig.organizationId,
    outputPath: flags.output,
    excludedBuckets: new Set(excluded),
    extensions:
      flags.extensions ?? userConfig.extensions ?? CONFIG.defaultExtensions,
    backend,
    commandTimeoutMs:
      flags.commandTimeoutMs ??
      userConfig.commandTimeoutMs ??
      CONFIG.commandTimeoutMs,
    maxAttempts: flags.maxAttempts ?? userConfig.maxAttempts ?? CONFIG.maxAttempts,
    debug: flags.debug ?? userConfig.debug ?? CONFIG.debug,
  };
}
