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
import { InvalidArgumentError } from './errors.js';
import { AppLogger } from './logging.js';

/** One archive object found in a bucket; `fileType` is the matching extension. */
export interface ArchiveRecord {
  readonly project: string;
  readonly bucket: string;
  readonly fileType: string;
  readonly filePath: string;
}

/**
 * Strips leading dots and whitespace and drops duplicates, keeping the
 * first occurrence order. Matching stays case-sensitive.
 */
export function normalizeExtensions(extensions: Iterable<string>): string[] {
  const normalized: string[] = [];
  for (const extension of extensions) {
    const value = extension.trim().replace(/^\.+/, '');
    if (value && !normalized.includes(value)) {
      normalized.push(value);
    }
  }
  if (!normalized.length) {
    throw new InvalidArgumentError('At least one file extension is required.');
  }
  return normalized;
}

export class ArchiveFinder {
  constructor(private readonly client: CloudResourceClient) {}

  /**
   * Runs one recursive listing per extension and returns the matches grouped
   * by extension, in the order the extensions were given. A failed query is
   * logged and contributes nothing; the other queries still run.
   */
  async findArchives(
    projectId: string,
    bucketUri: string,
    extensions: Iterable<string>
  ): Promise<ArchiveRecord[]> {
    const records: ArchiveRecord[] = [];
    const queried = normalizeExtensions(extensions);
    let failedQueries = 0;

    for (const extension of queried) {
      let files: string[];
      try {
        files = await this.client.listObjects(bucketUri, extension);
      } catch (err) {
        const error = toProviderError(
          err,
          `Listing .${extension} files in ${bucketUri} failed`
        );
        AppLogger.warn(`    Warning: ${error.message}`);
        failedQueries++;
        continue;
      }

      const suffix = `.${extension}`;
      const matches = files.filter(
        file => file.startsWith(bucketUri) && file.endsWith(suffix)
      );
      if (!matches.length) {
        continue;
      }
      AppLogger.info(`    Found ${suffix} files:`);
      for (const filePath of matches) {
        AppLogger.info(`      ${filePath}`);
        records.push({
          project: projectId,
          bucket: bucketUri,
          fileType: extension,
          filePath,
        });
      }
    }

    if (failedQueries) {
      AppLogger.warn(
        `    Could not check ${failedQueries} of ${queried.length} extensions in ${bucketUri}`
      );
    } else if (!records.length) {
      AppLogger.info(`    No archive files found in ${bucketUri}`);
    }
    return records;
  }
}
