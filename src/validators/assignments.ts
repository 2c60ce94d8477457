/**
 * Batch validation of enriched assignments
 *
 * All-or-nothing: the first failing rule rejects the whole batch, so nothing
 * is submitted unless every record passes.
 */

import { statSync } from 'fs';
import { resolve } from 'path';
import {
  ValidationError,
  type AssignmentCandidate,
  type ReferenceSets,
  type ValidationRule,
} from '../types/index.js';

export type AssignmentValidationResult =
  | { valid: true }
  | { valid: false; row_number: number; rule: ValidationRule; message: string };

/**
 * Check every candidate against the reference snapshot.
 *
 * Rules, in order: status, priority (when set), assignmentType, dispatcherId,
 * workerId (when a worker was named), attachment file (when a path was given).
 */
export function validateAssignments(
  references: ReferenceSets,
  candidates: AssignmentCandidate[]
): AssignmentValidationResult {
  for (const candidate of candidates) {
    const failure = validateCandidate(references, candidate);
    if (failure) {
      return failure;
    }
  }
  return { valid: true };
}

/**
 * Same as validateAssignments, but throws on failure
 *
 * @throws ValidationError naming the first failing row and rule
 */
export function assertValidAssignments(references: ReferenceSets, candidates: AssignmentCandidate[]): void {
  const result = validateAssignments(references, candidates);
  if (!result.valid) {
    throw new ValidationError(result.message, result.row_number, result.rule);
  }
}

function validateCandidate(
  references: ReferenceSets,
  candidate: AssignmentCandidate
): Extract<AssignmentValidationResult, { valid: false }> | undefined {
  const { attributes } = candidate.feature;
  const fail = (rule: ValidationRule, message: string) => ({
    valid: false as const,
    row_number: candidate.row_number,
    rule,
    message: `Row ${candidate.row_number}: ${message}`,
  });

  if (!isAllowed(references.statuses, attributes.status)) {
    return fail('status', `invalid status ${attributes.status}`);
  }
  if (attributes.priority !== undefined && !isAllowed(references.priorities, attributes.priority)) {
    return fail('priority', `invalid priority ${attributes.priority}`);
  }
  if (!isAllowed(references.assignmentTypes, attributes.assignmentType)) {
    return fail('assignmentType', `invalid assignment type ${attributes.assignmentType}`);
  }
  if (attributes.dispatcherId === undefined || !references.dispatcherIds.has(attributes.dispatcherId)) {
    return fail('dispatcherId', `invalid dispatcher id ${attributes.dispatcherId ?? '(none)'}`);
  }
  if (candidate.workerUsername) {
    if (attributes.workerId === undefined || !references.workerIds.has(attributes.workerId)) {
      return fail('workerId', `invalid worker id ${attributes.workerId ?? '(none)'} for ${candidate.workerUsername}`);
    }
  }
  if (candidate.attachmentFile && !isFile(candidate.attachmentFile)) {
    return fail('attachmentFile', `attachment file not found: ${candidate.attachmentFile}`);
  }

  return undefined;
}

/** Fields without a coded-value domain accept any value */
function isAllowed(codes: ReadonlySet<number> | null, value: number): boolean {
  return codes === null || codes.has(value);
}

function isFile(path: string): boolean {
  return statSync(resolve(path), { throwIfNoEntry: false })?.isFile() ?? false;
}
