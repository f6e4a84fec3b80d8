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

import { ArchiveFinder, normalizeExtensions } from './archives.js';
import { BucketScanner } from './buckets.js';
import type { CloudResourceClient } from './cloud-client.js';
import {
  PermissionDeniedError,
  ProviderError,
  describeError,
} from './errors.js';
import { AppLogger } from './logging.js';
import { OrgProjectEnumerator } from './projects.js';
import { PermissionLog, ReportWriter } from './report.js';

export type WorkflowStatus =
  | 'completed'
  | 'no-projects'
  | 'enumeration-failed'
  | 'cancelled';

export interface WorkflowOptions {
  client: CloudResourceClient;
  organizationId: string;
  excludedBuckets?: Iterable<string>;
  /** Checked between projects and between buckets only. */
  signal?: AbortSignal;
}

export interface ScanArchivesOptions extends WorkflowOptions {
  extensions: Iterable<string>;
  reportPath: string;
  permissionLogPath?: string;
}

export interface WorkflowSummary {
  status: WorkflowStatus;
  organizationId: string;
  projectsFound: number;
  projectsScanned: number;
  skippedProjects: string[];
  bucketsScanned: number;
}

export interface ScanArchivesSummary extends WorkflowSummary {
  archiveFiles: number;
  reportPath: string;
  permissionLogPath?: string;
}

const SECTION_RULE = '========================================';
const PROJECT_RULE = '------------------------------------';

const REQUIRED_ROLES = [
  'roles/cloudasset.viewer',
  'roles/resourcemanager.organizationViewer',
  'roles/storage.objectViewer',
];

type Enumeration =
  | { status: 'ok'; projectIds: string[] }
  | { status: 'enumeration-failed' | 'no-projects' };

async function enumerateProjects(
  enumerator: OrgProjectEnumerator,
  organizationId: string
): Promise<Enumeration> {
  AppLogger.info(
    `Fetching projects in organization: ${organizationId} (this may take a while for large organizations)...`
  );
  let projectIds: string[];
  try {
    projectIds = await enumerator.listProjects(organizationId);
  } catch (err) {
    if (!(err instanceof ProviderError)) {
      throw err;
    }
    AppLogger.error(`Error: ${err.message}`);
    AppLogger.error('Please ensure you have the following permissions:');
    REQUIRED_ROLES.forEach(role => AppLogger.error(`- ${role}`));
    return { status: 'enumeration-failed' };
  }
  if (!projectIds.length) {
    AppLogger.info(
      `No projects found in organization ${organizationId} or you may not have the required permissions.`
    );
    return { status: 'no-projects' };
  }
  AppLogger.info(`Found ${projectIds.length} projects:`);
  projectIds.forEach(projectId => AppLogger.info(projectId));
  AppLogger.info();
  return { status: 'ok', projectIds };
}

function emptySummary(organizationId: string): WorkflowSummary {
  return {
    status: 'completed',
    organizationId,
    projectsFound: 0,
    projectsScanned: 0,
    skippedProjects: [],
    bucketsScanned: 0,
  };
}

function noBucketsMessage(projectId: string, excluded: string[]): string {
  return excluded.length
    ? `  All buckets in project ${projectId} are excluded.`
    : `  No buckets found in project ${projectId} or insufficient permissions to list them.`;
}

function cancelled(signal: AbortSignal | undefined, next: string): boolean {
  if (!signal?.aborted) {
    return false;
  }
  AppLogger.warn(`Cancelled before ${next}; stopping.`);
  return true;
}

/**
 * Searches every bucket of every project for archive files and appends one
 * report row per match. Projects and buckets are processed one at a time.
 */
export class ArchiveScanWorkflow {
  static async run(options: ScanArchivesOptions): Promise<ScanArchivesSummary> {
    const organizationId = OrgProjectEnumerator.requireOrganizationId(
      options.organizationId
    );
    const extensions = normalizeExtensions(options.extensions);
    const { client, signal } = options;
    const scanner = new BucketScanner(client, options.excludedBuckets);
    const finder = new ArchiveFinder(client);
    const permissionLog = options.permissionLogPath
      ? new PermissionLog(options.permissionLogPath)
      : undefined;

    const report = ReportWriter.open(options.reportPath);
    AppLogger.info(`Results will be saved to: ${report.path}`);

    const summary: ScanArchivesSummary = {
      ...emptySummary(organizationId),
      archiveFiles: 0,
      reportPath: report.path,
    };

    try {
      const enumeration = await enumerateProjects(
        new OrgProjectEnumerator(client),
        organizationId
      );
      if (enumeration.status !== 'ok') {
        summary.status = enumeration.status;
        return summary;
      }
      summary.projectsFound = enumeration.projectIds.length;

      AppLogger.info(
        `Searching for ${extensions.map(ext => `.${ext}`).join(', ')} files in buckets...`
      );
      AppLogger.info(SECTION_RULE);

      for (const projectId of enumeration.projectIds) {
        if (cancelled(signal, `project ${projectId}`)) {
          summary.status = 'cancelled';
          break;
        }
        AppLogger.info(`--- Project: ${projectId} ---`);
        const result = await scanner.listBuckets(projectId);
        if (result.status === 'skipped') {
          summary.skippedProjects.push(projectId);
          if (result.error instanceof PermissionDeniedError) {
            ArchiveScanWorkflow.recordSkip(permissionLog, projectId);
          }
          AppLogger.info(PROJECT_RULE);
          continue;
        }
        summary.projectsScanned++;

        if (!result.buckets.length) {
          AppLogger.info(noBucketsMessage(projectId, result.excluded));
        }
        for (const bucketUri of result.buckets) {
          if (cancelled(signal, `bucket ${bucketUri}`)) {
            summary.status = 'cancelled';
            break;
          }
          AppLogger.info(`  Scanning bucket: ${bucketUri}`);
          const records = await finder.findArchives(
            projectId,
            bucketUri,
            extensions
          );
          records.forEach(record => ReportWriter.appendRecord(report, record));
          summary.archiveFiles += records.length;
          summary.bucketsScanned++;
        }
        AppLogger.info(PROJECT_RULE);
        if (summary.status === 'cancelled') {
          break;
        }
      }
      return summary;
    } finally {
      ReportWriter.close(report);
      if (permissionLog?.exists) {
        summary.permissionLogPath = permissionLog.path;
      }
      ArchiveScanWorkflow.printSummary(summary);
    }
  }

  private static recordSkip(
    permissionLog: PermissionLog | undefined,
    projectId: string
  ) {
    if (!permissionLog) {
      return;
    }
    try {
      permissionLog.record(projectId);
    } catch (err) {
      AppLogger.warn(`Warning: ${describeError(err)}`);
    }
  }

  static printSummary(summary: ScanArchivesSummary) {
    AppLogger.info(SECTION_RULE);
    AppLogger.info('Finished searching for archive files.');
    AppLogger.info(`Found ${summary.archiveFiles} archive files.`);
    AppLogger.info(
      `Scanned ${summary.projectsScanned} of ${summary.projectsFound} projects (${summary.skippedProjects.length} skipped, ${summary.bucketsScanned} buckets).`
    );
    AppLogger.info(`Results have been saved to: ${summary.reportPath}`);
    if (summary.permissionLogPath) {
      AppLogger.info(
        `Projects with permission issues have been saved to: ${summary.permissionLogPath}`
      );
    }
  }
}

/** Prints the buckets of every project; writes no report. */
export class BucketListWorkflow {
  static async run(options: WorkflowOptions): Promise<WorkflowSummary> {
    const organizationId = OrgProjectEnumerator.requireOrganizationId(
      options.organizationId
    );
    const { client, signal } = options;
    const scanner = new BucketScanner(client, options.excludedBuckets);
    const summary = emptySummary(organizationId);

    try {
      const enumeration = await enumerateProjects(
        new OrgProjectEnumerator(client),
        organizationId
      );
      if (enumeration.status !== 'ok') {
        summary.status = enumeration.status;
        return summary;
      }
      summary.projectsFound = enumeration.projectIds.length;

      AppLogger.info('Listing buckets for each project...');
      AppLogger.info(PROJECT_RULE);
      for (const projectId of enumeration.projectIds) {
        if (cancelled(signal, `project ${projectId}`)) {
          summary.status = 'cancelled';
          break;
        }
        AppLogger.info(`Buckets in project: ${projectId}`);
        const result = await scanner.listBuckets(projectId);
        if (result.status === 'skipped') {
          summary.skippedProjects.push(projectId);
        } else {
          summary.projectsScanned++;
          if (!result.buckets.length) {
            AppLogger.info(noBucketsMessage(projectId, result.excluded));
          }
          result.buckets.forEach(bucketUri => AppLogger.info(`  ${bucketUri}`));
          summary.bucketsScanned += result.buckets.length;
        }
        AppLogger.info(PROJECT_RULE);
      }
      return summary;
    } finally {
      BucketListWorkflow.printSummary(summary);
    }
  }

  static printSummary(summary: WorkflowSummary) {
    AppLogger.info('Finished listing all buckets.');
    AppLogger.info(
      `Listed ${summary.bucketsScanned} buckets in ${summary.projectsScanned} of ${summary.projectsFound} projects (${summary.skippedProjects.length} skipped).`
    );
  }
}
