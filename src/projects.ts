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

export class OrgProjectEnumerator {
  constructor(private readonly client: CloudResourceClient) {}

  /** Trims `organizationId` and rejects it when nothing is left. */
  static requireOrganizationId(organizationId: string | undefined): string {
    const trimmed = (organizationId ?? '').trim();
    if (!trimmed) {
      throw new InvalidArgumentError('Organization ID cannot be empty.');
    }
    return trimmed;
  }

  /**
   * Every project of the organization, nested folders included, in the
   * order the provider returned them. A provider failure is rethrown as a
   * `ProviderError` and nothing partial is returned.
   */
  async listProjects(organizationId: string): Promise<string[]> {
    const orgId = OrgProjectEnumerator.requireOrganizationId(organizationId);
    let projectIds: string[];
    try {
      projectIds = await this.client.searchProjects(orgId);
    } catch (err) {
      throw toProviderError(
        err,
        `Failed to list projects in organization ${orgId}`
      );
    }
    return projectIds
      .map(projectId => projectId.trim())
      .filter(projectId => projectId.length > 0);
  }
}
