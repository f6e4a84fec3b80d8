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

import { type CloudResourceClient, isPermissionFailure } from './cloud-client.js';
import { CONFIG } from './config.js';
import { PermissionDeniedError, ProviderError } from './errors.js';
import { AppLogger } from './logging.js';
import { RetryUtil, StringUtil } from './utils.js';

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => CommandResult;

// gsutil exits 1 with this message when a wildcard has nothing to expand.
const NO_MATCH_PATTERN = /matched no objects|One or more URLs matched no/i;

function toText(value: string | Buffer | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : value.toString('utf8');
}

export const runCommand: CommandRunner = (command, args, timeoutMs) => {
  const result = spawn.sync(command, args, {
    timeout: timeoutMs > 0 ? timeoutMs : undefined,
    windowsHide: true,
  });
  return {
    status: result.status,
    stdout: toText(result.stdout),
    stderr: toText(result.stderr),
    error: result.error,
  };
};

export interface GcloudCliClientOptions {
  runner?: CommandRunner;
  commandTimeoutMs?: number;
  maxAttempts?: number;
  retryDelayMillis?: number;
}

/**
 * Drives the `gcloud` and `gsutil` executables. The active project is
 * global gcloud configuration, so every command runs through one queue and
 * bucket listing also pins the project with `-p`.
 */
export class GcloudCliClient implements CloudResourceClient {
  readonly name = 'gcloud';

  private readonly runner: CommandRunner;
  private readonly commandTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMillis: number;
  private queue: Promise<unknown> = Promise.resolve();
  private activeProject?: string;

  constructor(options: GcloudCliClientOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.commandTimeoutMs = options.commandTimeoutMs ?? CONFIG.commandTimeoutMs;
    this.maxAttempts = options.maxAttempts ?? CONFIG.maxAttempts;
    this.retryDelayMillis = options.retryDelayMillis ?? 0;
  }

  get currentProject(): string | undefined {
    return this.activeProject;
  }

  async searchProjects(organizationId: string): Promise<string[]> {
    const lines = await this.exec('gcloud', [
      'asset',
      'search-all-resources',
      `--scope=organizations/${organizationId}`,
      `--asset-types=${CONFIG.projectAssetType}`,
      '--format=value(name.basename())',
      '--quiet',
    ]);
    return lines.map(StringUtil.basename);
  }

  async setActiveProject(projectId: string): Promise<void> {
    await this.exec('gcloud', ['config', 'set', 'project', projectId, '--quiet']);
    this.activeProject = projectId;
  }

  async listBuckets(projectId: string): Promise<string[]> {
    if (this.activeProject !== projectId) {
      throw new ProviderError(
        `Active gcloud project is '${this.activeProject ?? '<unset>'}', not '${projectId}'`
      );
    }
    return this.exec('gsutil', ['ls', '-p', projectId]);
  }

  async listObjects(bucketUri: string, extension: string): Promise<string[]> {
    return this.exec('gsutil', ['ls', '-r', `${bucketUri}**.${extension}`], {
      emptyOnNoMatch: true,
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The caller observes failures through `run`; the queue only orders.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private exec(
    command: 'gcloud' | 'gsutil',
    args: string[],
    options: { emptyOnNoMatch?: boolean } = {}
  ): Promise<string[]> {
    const commandLine = `${command} ${args.join(' ')}`;
    return this.serialize(() =>
      RetryUtil.executeWithRetry(
        async () => {
          AppLogger.debug(`$ ${commandLine}`);
          const result = this.runner(command, args, this.commandTimeoutMs);
          if (result.error) {
            throw new ProviderError(
              `${commandLine} could not run: ${result.error.message}`,
              { cause: result.error }
            );
          }
          if (result.status === 0) {
            return StringUtil.lines(result.stdout);
          }
          const stderr = result.stderr.trim();
          if (options.emptyOnNoMatch && NO_MATCH_PATTERN.test(stderr)) {
            return [];
          }
          const message = `${commandLine} exited with status ${result.status}${
            stderr ? `: ${stderr}` : ''
          }`;
          throw isPermissionFailure(stderr)
            ? new PermissionDeniedError(message)
            : new ProviderError(message);
        },
        this.maxAttempts,
        this.retryDelayMillis,
        err => !(err instanceof PermissionDeniedError)
      )
    );
  }
}
