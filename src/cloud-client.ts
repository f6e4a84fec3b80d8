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

import {
  PermissionDeniedError,
  ProviderError,
  describeError,
} from './errors.js';

/**
 * The two provider capabilities a scan consumes: organization-wide asset
 * search and project / bucket scoped storage listing. Authentication and
 * pagination are the implementation's concern.
 */
export interface CloudResourceClient {
  readonly name: string;

  /** Project IDs under `organizations/<organizationId>`, folders included. */
  searchProjects(organizationId: string): Promise<string[]>;

  /**
   * Makes `projectId` the context for the listing calls that follow. Callers
   * must not interleave two projects on one client.
   */
  setActiveProject(projectId: string): Promise<void>;

  /** Raw bucket listing; entries that are not `gs://<name>/` may appear. */
  listBuckets(projectId: string): Promise<string[]>;

  /**
   * Object URIs under `bucketUri` (any depth) whose names end in
   * `.<extension>`, in provider order. No match is an empty array.
   */
  listObjects(bucketUri: string, extension: string): Promise<string[]>;

  close?(): Promise<void>;
}

const PERMISSION_CODES: ReadonlyArray<number | string> = [
  7, // gRPC PERMISSION_DENIED
  403,
  'PERMISSION_DENIED',
];

const PERMISSION_PATTERN =
  /PERMISSION_DENIED|AccessDenied|does not have \S+ access|\b403\b/i;

export function isPermissionFailure(err: unknown): boolean {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    if (
      (typeof code === 'number' || typeof code === 'string') &&
      PERMISSION_CODES.includes(code)
    ) {
      return true;
    }
  }
  return PERMISSION_PATTERN.test(describeError(err));
}

/**
 * Wraps anything a provider threw into a `ProviderError`, upgrading it to
 * `PermissionDeniedError` when it carries permission semantics.
 */
export function toProviderError(err: unknown, context: string): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }
  const message = `${context}: ${describeError(err)}`;
  return isPermissionFailure(err)
    ? new PermissionDeniedError(message, { cause: err })
    : new ProviderError(message, { cause: err });
}
