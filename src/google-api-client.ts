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

import { AssetServiceClient } from '@google-cloud/asset';
import { Storage } from '@google-cloud/storage';

import { type CloudResourceClient, toProviderError } from './cloud-client.js';
import { CONFIG } from './config.js';
import { InvalidArgumentError } from './errors.js';
import { AppLogger } from './logging.js';
import { StringUtil } from './utils.js';

export interface GoogleApiClientOptions {
  commandTimeoutMs?: number;
  maxAttempts?: number;
}

/**
 * Talks to Cloud Asset Inventory and Cloud Storage through the Google client
 * libraries with Application Default Credentials. Every call names its
 * project explicitly, so no global context is mutated.
 */
export class GoogleApiClient implements CloudResourceClient {
  readonly name = 'api';

  private readonly assetClient: AssetServiceClient;
  private readonly storage: Storage;
  private readonly timeout?: number;
  private activeProject?: string;

  constructor(options: GoogleApiClientOptions = {}) {
    const timeoutMs = options.commandTimeoutMs ?? CONFIG.commandTimeoutMs;
    const maxAttempts = options.maxAttempts ?? CONFIG.maxAttempts;
    this.timeout = timeoutMs > 0 ? timeoutMs : undefined;
    this.assetClient = new AssetServiceClient();
    this.storage = new Storage({
      timeout: this.timeout,
      retryOptions: { maxRetries: Math.max(0, maxAttempts - 1) },
    });
  }

  get currentProject(): string | undefined {
    return this.activeProject;
  }

  async searchProjects(organizationId: string): Promise<string[]> {
    try {
      const [results] = await this.assetClient.searchAllResources(
        {
          scope: `organizations/${organizationId}`,
          assetTypes: [CONFIG.projectAssetType],
        },
        { timeout: this.timeout }
      );
      return results
        .map(result => StringUtil.basename(result.name ?? ''))
        .filter(id => id.length > 0);
    } catch (err) {
      throw toProviderError(
        err,
        `Asset search in organizations/${organizationId} failed`
      );
    }
  }

  async setActiveProject(projectId: string): Promise<void> {
    // Listing calls carry the project themselves; this only records it.
    this.activeProject = projectId;
  }

  async listBuckets(projectId: string): Promise<string[]> {
    try {
      const [buckets] = await this.storage.getBuckets({ project: projectId });
      return buckets.map(bucket => `${CONFIG.bucketScheme}${bucket.name}/`);
    } catch (err) {
      throw toProviderError(err, `Listing buckets of ${projectId} failed`);
    }
  }

  async listObjects(bucketUri: string, extension: string): Promise<string[]> {
    const bucketName = GoogleApiClient.bucketName(bucketUri);
    try {
      AppLogger.debug(`getFiles ${bucketUri} matchGlob=**.${extension}`);
      const [files] = await this.storage
        .bucket(bucketName)
        .getFiles({ matchGlob: `**.${extension}` });
      return files.map(file => `${bucketUri}${file.name}`);
    } catch (err) {
      throw toProviderError(err, `Listing ${bucketUri}**.${extension} failed`);
    }
  }

  async close(): Promise<void> {
    await this.assetClient.close();
  }

  static bucketName(bucketUri: string): string {
    const match = /^gs:\/\/([^/]+)\/$/.exec(bucketUri);
    if (!match) {
      throw new InvalidArgumentError(`Not a bucket URI: ${bucketUri}`);
    }
    return match[1];
  }
}
