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

import { Storage } from '@google-cloud/storage';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  InvalidArgumentError,
  PermissionDeniedError,
  ProviderError,
} from './errors.js';
import { GoogleApiClient } from './google-api-client.js';

const mocks = vi.hoisted(() => ({
  searchAllResources: vi.fn(),
  close: vi.fn(),
  getBuckets: vi.fn(),
  getFiles: vi.fn(),
  bucket: vi.fn(),
}));

vi.mock('@google-cloud/asset', () => ({
  AssetServiceClient: vi.fn(function () {
    return {
      searchAllResources: mocks.searchAllResources,
      close: mocks.close,
    };
  }),
}));

vi.mock('@google-cloud/storage', () => ({
  Storage: vi.fn(function () {
    return { getBuckets: mocks.getBuckets, bucket: mocks.bucket };
  }),
}));

describe('GoogleApiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.bucket.mockReturnValue({ getFiles: mocks.getFiles });
  });

  it('configures the storage client from the scan settings', () => {
    new GoogleApiClient({ commandTimeoutMs: 5000, maxAttempts: 3 });

    expect(Storage).toHaveBeenCalledWith({
      timeout: 5000,
      retryOptions: { maxRetries: 2 },
    });
  });

  it('returns the basename of every project in the organization', async () => {
    mocks.searchAllResources.mockResolvedValue([
      [
        { name: '//cloudresourcemanager.googleapis.com/projects/p1' },
        { name: '//cloudresourcemanager.googleapis.com/projects/p2' },
        { name: null },
      ],
      null,
      null,
    ]);
    const client = new GoogleApiClient();

    await expect(client.searchProjects('org-1')).resolves.toEqual(['p1', 'p2']);
    expect(mocks.searchAllResources).toHaveBeenCalledWith(
      {
        scope: 'organizations/org-1',
        assetTypes: ['cloudresourcemanager.googleapis.com/Project'],
      },
      { timeout: undefined }
    );
  });

  it('maps gRPC permission errors', async () => {
    mocks.searchAllResources.mockRejectedValue(
      Object.assign(new Error('7 PERMISSION_DENIED: denied'), { code: 7 })
    );

    await expect(new GoogleApiClient().searchProjects('org-1')).rejects.toThrow(
      PermissionDeniedError
    );
  });

  it('lists buckets with the project passed explicitly', async () => {
    mocks.getBuckets.mockResolvedValue([[{ name: 'b1' }, { name: 'b2' }]]);
    const client = new GoogleApiClient();

    await client.setActiveProject('p1');
    await expect(client.listBuckets('p1')).resolves.toEqual([
      'gs://b1/',
      'gs://b2/',
    ]);
    expect(mocks.getBuckets).toHaveBeenCalledWith({ project: 'p1' });
    expect(client.currentProject).toBe('p1');
  });

  it('wraps listing failures', async () => {
    mocks.getBuckets.mockRejectedValue(new Error('socket hang up'));

    await expect(new GoogleApiClient().listBuckets('p1')).rejects.toThrow(
      new ProviderError('Listing buckets of p1 failed: socket hang up')
    );
  });

  it('lists objects with a suffix glob', async () => {
    mocks.getFiles.mockResolvedValue([[{ name: 'a.zip' }, { name: 'dir/c.zip' }]]);

    await expect(
      new GoogleApiClient().listObjects('gs://b1/', 'zip')
    ).resolves.toEqual(['gs://b1/a.zip', 'gs://b1/dir/c.zip']);
    expect(mocks.bucket).toHaveBeenCalledWith('b1');
    expect(mocks.getFiles).toHaveBeenCalledWith({ matchGlob: '**.zip' });
  });

  it('rejects values that are not bucket URIs', async () => {
    await expect(
      new GoogleApiClient().listObjects('b1', 'zip')
    ).rejects.toThrow(InvalidArgumentError);
    expect(mocks.bucket).not.toHaveBeenCalled();
  });

  it('closes the asset client', async () => {
    mocks.close.mockResolvedValue(undefined);

    await new GoogleApiClient().close();

    expect(mocks.close).toHaveBeenCalledTimes(1);
  });
});
