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

import spawn from 'cross-spawn';
import fs from 'fs-extra';
import minimist from 'minimist';
import os from 'node:os';
import path from 'node:path';
import prompts from 'prompts';

import type { CloudResourceClient } from './src/cloud-client.js';
import {
  BACKENDS,
  type Backend,
  type CliFlags,
  type ScanSettings,
  UserConfigManager,
  resolveSettings,
} from './src/config.js';
import { InvalidArgumentError, ScanError, describeError } from './src/errors.js';
import { GcloudCliClient, runCommand } from './src/gcloud-client.js';
import { GoogleApiClient } from './src/google-api-client.js';
import { AppLogger } from './src/logging.js';
import {
  ArchiveScanWorkflow,
  BucketListWorkflow,
} from './src/orchestrator.js';
import { PermissionLog, ReportWriter } from './src/report.js';
import { StringUtil } from './src/utils.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export type CliCommand = 'scan-archives' | 'list-buckets';

export type OrganizationPrompt = (
  initial?: string
) => Promise<string | undefined>;

/** Everything a run touches outside its own arguments. */
export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  now: () => Date;
  prompt: OrganizationPrompt;
  checkAuth: (backend: Backend, env: NodeJS.ProcessEnv) => Promise<boolean>;
  createClient: (settings: ScanSettings) => CloudResourceClient;
  signal?: AbortSignal;
}

const STRING_FLAGS = [
  'org-id',
  'output',
  'exclude',
  'extensions',
  'backend',
  'timeout',
  'max-attempts',
];
const BOOLEAN_FLAGS = ['debug', 'help'];

function stringFlag(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' ? last : undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

function stringListFlag(args: minimist.ParsedArgs, name: string): string[] {
  const value: unknown = args[name];
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values
    .filter((entry): entry is string => typeof entry === 'string')
    .flatMap(entry => StringUtil.splitList(entry));
}

function integerFlag(
  args: minimist.ParsedArgs,
  name: string,
  min: number
): number | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`--${name} must be an integer >= ${min}`);
  }
  return value;
}

function hasFlag(argv: string[], name: string): boolean {
  return argv.some(arg => arg === `--${name}` || arg.startsWith(`--${name}=`));
}

export class CliOptionsParser {
  static parse(argv: string[]): CliFlags {
    const rejected: string[] = [];
    const args = minimist(argv, {
      string: STRING_FLAGS,
      boolean: BOOLEAN_FLAGS,
      alias: { h: 'help' },
      unknown: arg => {
        rejected.push(arg);
        return false;
      },
    });
    if (rejected.length) {
      throw new InvalidArgumentError(`Unknown argument(s): ${rejected.join(' ')}`);
    }

    const extensions = stringListFlag(args, 'extensions');
    return {
      organizationId: hasFlag(argv, 'org-id')
        ? stringFlag(args, 'org-id') ?? ''
        : undefined,
      output: stringFlag(args, 'output') || undefined,
      excludedBuckets: stringListFlag(args, 'exclude'),
      extensions: extensions.length ? extensions : undefined,
      backend: stringFlag(args, 'backend') || undefined,
      commandTimeoutMs: integerFlag(args, 'timeout', 0),
      maxAttempts: integerFlag(args, 'max-attempts', 1),
      debug: argv.includes('--no-debug')
        ? false
        : args.debug === true
          ? true
          : undefined,
      help: args.help === true,
    };
  }

  static usage(command: CliCommand): string {
    const common = `[--org-id=<ID>] [--exclude=gs://<bucket>/]... [--backend=${BACKENDS.join('|')}] [--timeout=<ms>] [--max-attempts=<n>] [--debug]`;
    return command === 'scan-archives'
      ? `Usage: scan-archives ${common} [--output=<path>] [--extensions=zip,tar,gz]`
      : `Usage: list-buckets ${common}`;
  }
}

export class GcpAuthHandler {
  static applicationDefaultCredentialsPath(): string {
    return path.join(
      os.homedir(),
      '.config',
      'gcloud',
      'application_default_credentials.json'
    );
  }

  static activeGcloudAccount(): string | undefined {
    const result = runCommand(
      'gcloud',
      ['auth', 'list', '--filter=status:ACTIVE', '--format=value(account)'],
      0
    );
    if (result.error || result.status !== 0) {
      return undefined;
    }
    return StringUtil.lines(result.stdout)[0];
  }

  static async checkGcloudAuth(): Promise<boolean> {
    let account = GcpAuthHandler.activeGcloudAccount();
    if (!account) {
      AppLogger.info('Logging in via gcloud...');
      spawn.sync('gcloud', ['auth', 'login'], { stdio: 'inherit' });
      AppLogger.info();
      account = GcpAuthHandler.activeGcloudAccount();
    }
    if (!account) {
      AppLogger.error(
        "Error: No active gcloud account found. Please run 'gcloud auth login' first."
      );
      return false;
    }
    AppLogger.info(`Using account: ${account}`);
    return true;
  }

  static async checkApplicationDefaultCredentials(
    env: NodeJS.ProcessEnv = process.env
  ): Promise<boolean> {
    const explicitCredentials = env.GOOGLE_APPLICATION_CREDENTIALS;
    if (explicitCredentials) {
      if (await fs.pathExists(explicitCredentials)) {
        return true;
      }
      AppLogger.error(
        `Error: GOOGLE_APPLICATION_CREDENTIALS points to a missing file: ${explicitCredentials}`
      );
      return false;
    }
    const adcPath = GcpAuthHandler.applicationDefaultCredentialsPath();
    if (!(await fs.pathExists(adcPath))) {
      AppLogger.info(
        'Setting Application Default Credentials (ADC) via gcloud...'
      );
      spawn.sync('gcloud', ['auth', 'application-default', 'login'], {
        stdio: 'inherit',
      });
      AppLogger.info();
    }
    if (!(await fs.pathExists(adcPath))) {
      AppLogger.error(
        "Error: No Application Default Credentials found. Please run 'gcloud auth application-default login' first."
      );
      return false;
    }
    return true;
  }

  static check(
    backend: Backend,
    env: NodeJS.ProcessEnv = process.env
  ): Promise<boolean> {
    return backend === 'gcloud'
      ? GcpAuthHandler.checkGcloudAuth()
      : GcpAuthHandler.checkApplicationDefaultCredentials(env);
  }
}

export class CloudClientFactory {
  static create(settings: ScanSettings): CloudResourceClient {
    const options = {
      commandTimeoutMs: settings.commandTimeoutMs,
      maxAttempts: settings.maxAttempts,
    };
    return settings.backend === 'gcloud'
      ? new GcloudCliClient(options)
      : new GoogleApiClient(options);
  }
}

export async function promptForOrganizationId(
  initial?: string
): Promise<string | undefined> {
  const response = await prompts({
    type: 'text',
    name: 'organizationId',
    message: `Enter your Google Cloud Organization ID${
      initial ? ` - [Current: ${initial}]` : ''
    }:`,
    initial: initial ?? '',
  });
  const value: unknown = response.organizationId;
  return typeof value === 'string' ? value : undefined;
}

export function defaultCliContext(): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    now: () => new Date(),
    prompt: promptForOrganizationId,
    checkAuth: GcpAuthHandler.check,
    createClient: CloudClientFactory.create,
  };
}

interface PreparedRun {
  settings: ScanSettings;
  organizationId: string;
  client: CloudResourceClient;
}

export class CliRunner {
  /**
   * Parses flags, resolves configuration, obtains the organization ID and
   * checks credentials. Returns an exit code when the run must stop here.
   */
  private static async prepare(
    command: CliCommand,
    argv: string[],
    context: CliContext
  ): Promise<PreparedRun | number> {
    let settings: ScanSettings;
    const configPath = UserConfigManager.resolveConfigPath(context.cwd);
    try {
      const flags = CliOptionsParser.parse(argv);
      if (flags.help) {
        AppLogger.info(CliOptionsParser.usage(command));
        return EXIT_SUCCESS;
      }
      settings = resolveSettings(
        flags,
        UserConfigManager.getUserConfig(configPath),
        context.env
      );
    } catch (err) {
      if (err instanceof ScanError) {
        AppLogger.error(err.message);
        AppLogger.error(CliOptionsParser.usage(command));
        return EXIT_FAILURE;
      }
      throw err;
    }
    AppLogger.setDebug(settings.debug);

    const prompted = settings.organizationId === undefined;
    const organizationId = (
      prompted
        ? await context.prompt(settings.savedOrganizationId)
        : settings.organizationId
    )?.trim();
    if (!organizationId) {
      AppLogger.error('Organization ID cannot be empty.');
      return EXIT_FAILURE;
    }
    if (prompted && organizationId !== settings.savedOrganizationId) {
      try {
        UserConfigManager.setUserConfig({ organizationId }, configPath);
      } catch (err) {
        AppLogger.warn(
          `Warning: could not save ${configPath}: ${describeError(err)}`
        );
      }
    }

    if (!(await context.checkAuth(settings.backend, context.env))) {
      return EXIT_FAILURE;
    }
    return {
      settings,
      organizationId,
      client: context.createClient(settings),
    };
  }

  private static async finish(
    client: CloudResourceClient,
    work: () => Promise<number>
  ): Promise<number> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof ScanError) {
        AppLogger.error(`Error: ${err.message}`);
        return EXIT_FAILURE;
      }
      throw err;
    } finally {
      await client.close?.();
    }
  }

  static async scanArchives(
    argv: string[],
    context: CliContext = defaultCliContext()
  ): Promise<number> {
    const prepared = await CliRunner.prepare('scan-archives', argv, context);
    if (typeof prepared === 'number') {
      return prepared;
    }
    const { settings, organizationId, client } = prepared;
    const now = context.now();
    return CliRunner.finish(client, async () => {
      const summary = await ArchiveScanWorkflow.run({
        client,
        organizationId,
        excludedBuckets: settings.excludedBuckets,
        extensions: settings.extensions,
        reportPath: settings.outputPath
          ? path.resolve(context.cwd, settings.outputPath)
          : ReportWriter.defaultPath(context.cwd, now),
        permissionLogPath: PermissionLog.defaultPath(context.cwd, now),
        signal: context.signal,
      });
      return summary.status === 'enumeration-failed'
        ? EXIT_FAILURE
        : EXIT_SUCCESS;
    });
  }

  static async listBuckets(
    argv: string[],
    context: CliContext = defaultCliContext()
  ): Promise<number> {
    const prepared = await CliRunner.prepare('list-buckets', argv, context);
    if (typeof prepared === 'number') {
      return prepared;
    }
    const { settings, organizationId, client } = prepared;
    return CliRunner.finish(client, async () => {
      const summary = await BucketListWorkflow.run({
        client,
        organizationId,
        excludedBuckets: settings.excludedBuckets,
        signal: context.signal,
      });
      return summary.status === 'enumeration-failed'
        ? EXIT_FAILURE
        : EXIT_SUCCESS;
    });
  }

  /** Process entry: wires SIGINT to cancellation and sets the exit code. */
  static main(command: CliCommand) {
    const controller = new AbortController();
    const onInterrupt = () => {
      AppLogger.warn(
        'Interrupted; finishing the current bucket before stopping...'
      );
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    const run =
      command === 'scan-archives' ? CliRunner.scanArchives : CliRunner.listBuckets;
    run(process.argv.slice(2), {
      ...defaultCliContext(),
      signal: controller.signal,
    }).then(
      code => {
        process.removeListener('SIGINT', onInterrupt);
        process.exitCode = code;
      },
      (err: unknown) => {
        process.removeListener('SIGINT', onInterrupt);
        AppLogger.error(`Unexpected error: ${describeError(err)}`);
        process.exitCode = EXIT_FAILURE;
      }
    );
  }
}
