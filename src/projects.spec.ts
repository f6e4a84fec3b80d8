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

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  InvalidArgumentError,
  PermissionDeniedError,
  ProviderError,
} from './errors.js';
import { OrgProjectEnumerator } from './projects.js';
import { FakeCloudClient } from './testing/fake-cloud-client.js';
import { captureLogs, type LogCapture } from './testing/log-capture.js';

describe('OrgProjectEnumerator', () => {
  let logs: LogCapture;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  it('rejects empty and whitespace-only organization IDs before any call', async () => {
    const client = new FakeCloudClient();
    const enumerator = new OrgProjectEnumerator(client);

    await expect(enumerator.listProjects('')).rejects.toThrow(
      InvalidArgumentError
    );
    await expect(enumerator.listProjects('   ')).rejects.toThrow(
      'Organization ID cannot be empty.'
    );
    expect(client.calls).toEqual([]);
  });

  it('keeps the provider order and drops blank entries', async () => {
    const client = new FakeCloudClient({
      organizations: { 'org-1': ['p2', ' ', 'p1', 'p3 '] },
    });

    await expect(
      new OrgProjectEnumerator(client).listProjects(' org-1 ')
    ).resolves.toEqual(['p2', 'p1', 'p3']);
    expect(client.calls).toEqual(['searchProjects:org-1']);
  });

  it('treats an organization without projects as a normal result', async () => {
    const client = new FakeCloudClient({ organizations: { 'org-1': [] } });

    await expect(
      new OrgProjectEnumerator(client).listProjects('org-1')
    ).resolves.toEqual([]);
  });

  it('surfaces provider failures without partial results', async () => {
    const client = new FakeCloudClient({
      searchError: new Error('network unreachable'),
    });

    const failure = new OrgProjectEnumerator(client).listProjects('org-1');

    await expect(failure).rejects.toThrow(ProviderError);
    await expect(failure).rejects.toThrow(
      'Failed to list projects in organization org-1: network unreachable'
    );
  });

  it('classifies permission failures', async () => {
    const denied = Object.assign(new Error('caller lacks access'), { code: 7 });
    const client = new FakeCloudClient({ searchError: denied });

    await expect(
      new OrgProjectEnumerator(client).listProjects('org-1')
    ).rejects.toThrow(PermissionDeniedError);
  });
});
