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

import fs from 'fs-extra';
import path from 'node:path';

import type { ArchiveRecord } from './archives.js';
import { CONFIG } from './config.js';
import { ReportWriteError, describeError } from './errors.js';
import { TimeUtil } from './utils.js';

export interface ReportHandle {
  readonly path: string;
  readonly fd: number;
  rows: number;
  closed: boolean;
}

const NEEDS_QUOTING = /[",\r\n]/;

/** RFC 4180 field: quoted only when it holds a comma, quote or line break. */
export function formatCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(formatCsvField).join(',');
}

function writeLine(handle: ReportHandle, line: string) {
  try {
    fs.writeSync(handle.fd, `${line}\n`);
    fs.fsyncSync(handle.fd);
  } catch (err) {
    throw new ReportWriteError(
      `Failed to write report: ${describeError(err)}`,
      handle.path,
      { cause: err }
    );
  }
}

export class ReportWriter {
  static defaultFileName(now: Date = new Date()): string {
    return `${CONFIG.report.filePrefix}${TimeUtil.fileTimestamp(now)}${CONFIG.report.fileExtension}`;
  }

  static defaultPath(cwd: string, now: Date = new Date()): string {
    return path.join(cwd, ReportWriter.defaultFileName(now));
  }

  /**
   * Creates the report and writes its header. The file must not exist yet:
   * a report from an earlier run is never overwritten.
   */
  static open(reportPath: string): ReportHandle {
    let fd: number;
    try {
      fd = fs.openSync(reportPath, 'wx');
    } catch (err) {
      throw new ReportWriteError(
        `Failed to create report: ${describeError(err)}`,
        reportPath,
        { cause: err }
      );
    }
    const handle: ReportHandle = { path: reportPath, fd, rows: 0, closed: false };
    writeLine(handle, CONFIG.report.header.join(','));
    return handle;
  }

  /** Appends one record and flushes it to disk before returning. */
  static appendRecord(handle: ReportHandle, record: ArchiveRecord) {
    if (handle.closed) {
      throw new ReportWriteError('Report is already closed', handle.path);
    }
    writeLine(
      handle,
      formatCsvRow([
        record.project,
        record.bucket,
        record.fileType,
        record.filePath,
      ])
    );
    handle.rows++;
  }

  static close(handle: ReportHandle) {
    if (handle.closed) {
      return;
    }
    handle.closed = true;
    try {
      fs.closeSync(handle.fd);
    } catch (err) {
      throw new ReportWriteError(
        `Failed to close report: ${describeError(err)}`,
        handle.path,
        { cause: err }
      );
    }
  }
}

/**
 * Side file listing the projects skipped because access was denied.
 * Created on the first entry only.
 */
export class PermissionLog {
  private created = false;

  constructor(readonly path: string) {}

  static defaultPath(cwd: string, now: Date = new Date()): string {
    return path.join(
      cwd,
      `${CONFIG.permissionLog.filePrefix}${TimeUtil.fileTimestamp(now)}${CONFIG.permissionLog.fileExtension}`
    );
  }

  get exists(): boolean {
    return this.created;
  }

  record(projectId: string) {
    try {
      if (!this.created) {
        fs.writeFileSync(this.path, `${CONFIG.permissionLog.header}\n`, {
          flag: 'wx',
        });
        this.created = true;
      }
      fs.appendFileSync(this.path, `${projectId}\n`);
    } catch (err) {
      throw new ReportWriteError(
        `Failed to record skipped project ${projectId}: ${describeError(err)}`,
        this.path,
        { cause: err }
      );
    }
  }
}
