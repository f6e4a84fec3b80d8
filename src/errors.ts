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

export type ScanErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PROVIDER_ERROR'
  | 'PERMISSION_DENIED'
  | 'REPORT_WRITE_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for every failure the scanner raises on purpose. The `code` is
 * stable and used to pick an exit status and a recovery scope.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(message: string, code: ScanErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
  }
}

/** Bad operator input, e.g. an empty organization ID. Always fatal. */
export class InvalidArgumentError extends ScanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_ARGUMENT', options);
    this.name = 'InvalidArgumentError';
  }
}

/** A call into gcloud / gsutil or a Google Cloud API failed. */
export class ProviderError extends ScanError {
  constructor(
    message: string,
    options?: ErrorOptions,
    code: ScanErrorCode = 'PROVIDER_ERROR'
  ) {
    super(message, code, options);
    this.name = 'ProviderError';
  }
}

export class PermissionDeniedError extends ProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

export class ReportWriteError extends ScanError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(`${message} (${path})`, 'REPORT_WRITE_ERROR', options);
    this.name = 'ReportWriteError';
    this.path = path;
  }
}

export class ConfigError extends ScanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
