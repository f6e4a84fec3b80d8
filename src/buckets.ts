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

import { type CloudResourceClient, toProviderError } from './cloud-client.js';
import { normalizeBucketUri } from './config.js';
import type { ProviderError } from './errors.js';
import { AppLogger } from './logging.js';

export type ProjectBuckets =
  | {
      status: 'ok';
      projectId: string;
      buckets: string[];
      excluded: string[];
    }
  | {
      status: 'skipped';
      projectId: string;
      reason: string;
      error: ProviderError;
    };

const BUCKET_URI_PATTERN = /^gs:\/\/[^/\s]+\/$/;

/** True for `gs://<name>/`; prefixes and object paths are not buckets. */
export function isBucketUri(entry: string): boolean {
  return BUCKET_URI_PATTERN.test(entry);
}

export class BucketScanner {
  private readonly excludedBuckets: ReadonlySet<string>;

  constructor(
    private readonly client: CloudResourceClient,
    excludedBuckets: Iterable<string> = []
  ) {
    this.excludedBuckets = new Set(
      [...excludedBuckets].map(normalizeBucketUri).filter(Boolean)
    );
  }

  isExcluded(bucketUri: string): boolean {
    return this.excludedBuckets.has(bucketUri);
  }

  /**
   * Activates `projectId` on the client and lists its buckets minus the
   * exclusions. A failure to activate or list skips the project with a
   * warning instead of throwing.
   */
  async listBuckets(projectId: string): Promise<ProjectBuckets> {
    try {
      await this.client.setActiveProject(projectId);
    } catch (err) {
      return this.skip(projectId, `Failed to set project ${projectId}`, err);
    }

    let entries: string[];
    try {
      entries = await this.client.listBuckets(projectId);
    } catch (err) {
      return this.skip(
        projectId,
        `Failed to list buckets in project ${projectId}`,
        err
      );
    }

    const buckets: string[] = [];
    const excluded: string[] = [];
    for (const entry of entries) {
      const uri = entry.trim();
      if (!isBucketUri(uri)) {
        continue;
      }
      if (this.isExcluded(uri)) {
        AppLogger.info(`  Skipping bucket: ${uri}`);
        excluded.push(uri);
        continue;
      }
      buckets.push(uri);
    }
    return { status: 'ok', projectId, buckets, excluded };
  }

  private skip(
    projectId: string,
    context: string,
    err: unknown
  ): ProjectBuckets {
    const error = toProviderError(err, context);
    AppLogger.warn(`Warning: ${context}. Skipping.`);
    AppLogger.debug(`  ${error.message}`);
    return { status: 'skipped', projectId, reason: error.message, error };
  }
}
