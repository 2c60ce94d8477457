/**
 * create_assignments Tool Handler
 *
 * Creates Workforce assignments from a CSV file. Every row is parsed, resolved
 * and validated before anything is written; the batch is then inserted with a
 * single addFeatures call and attachments are uploaded one by one.
 */

import { resolve } from 'path';
import { parseAssignmentsCSV } from '../parsers/csv.js';
import { formatUtcTimestamp } from '../parsers/dates.js';
import { fetchReferenceSets, resolveDispatcherId, resolveWorkerId } from '../resolvers/references.js';
import { assertValidAssignments } from '../validators/assignments.js';
import type { Logger } from '../logging/logger.js';
import {
  AssignmentStatus,
  FileError,
  ParseError,
  RemoteServiceError,
  type AssignmentCandidate,
  type CreateAssignmentsInput,
  type CreateAssignmentsOutput,
  type WorkforceProject,
} from '../types/index.js';

export interface CreateAssignmentsContext {
  project: WorkforceProject;
  logger: Logger;
  /** Clock for assignedDate */
  now?: () => Date;
}

/**
 * Handle create_assignments
 *
 * Flow:
 * 1. Parse CSV into candidates (fails on any malformed value)
 * 2. Resolve the acting user's dispatcher id and default dispatcherId with it
 * 3. Resolve worker usernames; assigned rows get status=1 and assignedDate
 * 4. Fetch reference sets and validate the whole batch
 * 5. If validate_only=true: return a preview, write nothing
 * 6. Insert all features in one call and copy the new OBJECTIDs back
 * 7. Upload attachments for inserted rows, sequentially
 *
 * @param input - CSV source, column mapping and parse settings
 * @param context - Project layers and logger
 * @returns Created ids, per-record failures and attachment results
 */
export async function handleCreateAssignments(
  input: CreateAssignmentsInput,
  context: CreateAssignmentsContext
): Promise<CreateAssignmentsOutput> {
  const startTime = Date.now();
  const { project, logger } = context;
  const now = context.now ?? (() => new Date());
  const validateOnly = input.validate_only ?? false;

  // ============================================================================
  // Phase 1: Parse CSV
  // ============================================================================

  logger.info(`Reading CSV file: ${resolve(input.csv_file_path)}...`);
  const candidates = parseAssignmentsCSV({
    csv_file_path: input.csv_file_path,
    column_mapping: input.column_mapping,
    date_format: input.date_format,
    wkid: input.wkid,
    timezone: input.timezone,
  });

  if (candidates.length === 0) {
    throw new ParseError('CSV contains no data rows');
  }
  logger.info(`Parsed ${candidates.length} assignments`);

  // ============================================================================
  // Phase 2: Dispatcher
  // ============================================================================

  const dispatcherId = await resolveDispatcherId(project.dispatchers, input.username);
  logger.debug(`${input.username} is dispatcher ${dispatcherId}`);

  for (const candidate of candidates) {
    if (candidate.feature.attributes.dispatcherId === undefined) {
      candidate.feature.attributes.dispatcherId = dispatcherId;
    }
  }

  // ============================================================================
  // Phase 3: Workers
  // ============================================================================

  for (const candidate of candidates) {
    if (!candidate.workerUsername) {
      continue;
    }
    const workerId = await resolveWorkerId(project.workers, candidate.workerUsername, candidate.row_number);
    const { attributes } = candidate.feature;
    attributes.workerId = workerId;
    attributes.status = AssignmentStatus.ASSIGNED;
    attributes.assignedDate = formatUtcTimestamp(now());
  }

  // ============================================================================
  // Phase 4: Validate
  // ============================================================================

  logger.info('Validating assignments...');
  const references = await fetchReferenceSets(project);
  logger.debug(
    `Reference data: ${references.dispatcherIds.size} dispatchers, ${references.workerIds.size} workers`
  );
  assertValidAssignments(references, candidates);

  if (validateOnly) {
    logger.info(`Validation passed for ${candidates.length} assignments; nothing submitted (validate only)`);
    return {
      total_rows: candidates.length,
      created_assignments: 0,
      failed_assignments: 0,
      created_object_ids: [],
      failed_items: [],
      uploaded_attachments: 0,
      failed_attachments: [],
      validate_only: true,
      preview: candidates.map(candidate => candidate.feature),
      execution_time_ms: Date.now() - startTime,
    };
  }

  // ============================================================================
  // Phase 5: Submit
  // ============================================================================

  logger.info(`Adding ${candidates.length} assignments...`);
  const results = await project.assignments.addFeatures(candidates.map(candidate => candidate.feature));
  logger.debug(`addFeatures response: ${JSON.stringify(results)}`);

  if (results.length !== candidates.length) {
    throw new RemoteServiceError(
      `addFeatures returned ${results.length} results for ${candidates.length} submitted assignments`,
      200,
      results
    );
  }

  const createdObjectIds: number[] = [];
  const failedItems: CreateAssignmentsOutput['failed_items'] = [];

  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    const candidate = candidates[i];
    if (result.success && result.objectId !== undefined) {
      candidate.feature.attributes.OBJECTID = result.objectId;
      createdObjectIds.push(result.objectId);
    } else {
      const error = result.error
        ? `${result.error.description} (code ${result.error.code})`
        : 'Service did not return an objectId';
      failedItems.push({ row_number: candidate.row_number, error });
      logger.error(`Row ${candidate.row_number}: failed to add assignment: ${error}`);
    }
  }
  logger.info(`Added ${createdObjectIds.length} of ${candidates.length} assignments`);

  // ============================================================================
  // Phase 6: Attachments
  // ============================================================================

  const attachments = await uploadAttachments(candidates, project, logger);

  logger.info('Completed');

  return {
    total_rows: candidates.length,
    created_assignments: createdObjectIds.length,
    failed_assignments: failedItems.length,
    created_object_ids: createdObjectIds,
    failed_items: failedItems,
    uploaded_attachments: attachments.uploaded,
    failed_attachments: attachments.failed,
    validate_only: false,
    execution_time_ms: Date.now() - startTime,
  };
}

/**
 * Upload each inserted candidate's attachment.
 * A failed upload is reported, not thrown: the assignment itself already exists.
 */
async function uploadAttachments(
  candidates: AssignmentCandidate[],
  project: WorkforceProject,
  logger: Logger
): Promise<{ uploaded: number; failed: CreateAssignmentsOutput['failed_attachments'] }> {
  const failed: CreateAssignmentsOutput['failed_attachments'] = [];
  let uploaded = 0;

  const withAttachments = candidates.filter(candidate => candidate.attachmentFile);
  if (withAttachments.length === 0) {
    return { uploaded, failed };
  }

  logger.info('Adding attachments...');
  for (const candidate of withAttachments) {
    const objectId = candidate.feature.attributes.OBJECTID;
    const file = candidate.attachmentFile;
    if (objectId === undefined || !file) {
      continue;
    }

    const filePath = resolve(file);
    try {
      const result = await project.assignments.addAttachment(objectId, filePath);
      if (result.success) {
        uploaded++;
        logger.debug(`Attached ${filePath} to assignment ${objectId}`);
      } else {
        const error = result.error?.description ?? 'Upload rejected by service';
        failed.push({ row_number: candidate.row_number, object_id: objectId, file: filePath, error });
        logger.warn(`Row ${candidate.row_number}: failed to attach ${filePath} to assignment ${objectId}: ${error}`);
      }
    } catch (error) {
      if (!(error instanceof RemoteServiceError || error instanceof FileError)) {
        throw error;
      }
      failed.push({ row_number: candidate.row_number, object_id: objectId, file: filePath, error: error.message });
      logger.warn(`Row ${candidate.row_number}: failed to attach ${filePath} to assignment ${objectId}: ${error.message}`);
    }
  }

  return { uploaded, failed };
}
