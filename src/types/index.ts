/**
 * TypeScript type definitions for assignment-csv-importer
 */

// ============================================================================
// Feature Types
// ============================================================================

export interface SpatialReference {
  wkid: number;
}

export interface PointGeometry {
  x: number;
  y: number;
  spatialReference: SpatialReference;
}

/**
 * Assignment status codes used by the importer.
 * The layer's own coded-value domain decides which codes are valid.
 */
export const AssignmentStatus = {
  UNASSIGNED: 0,
  ASSIGNED: 1,
} as const;

export type AssignmentStatusCode = (typeof AssignmentStatus)[keyof typeof AssignmentStatus];

/**
 * Attributes of an assignment feature as sent to the assignments layer.
 *
 * Optional attributes are left out entirely when their column was not mapped.
 */
export interface AssignmentAttributes {
  assignmentType: number;
  location: string;
  status: AssignmentStatusCode;
  assignmentRead: null;
  dispatcherId?: number;
  description?: string;
  priority?: number;
  workOrderId?: string;
  dueDate?: string;
  workerId?: number;
  assignedDate?: string;
  OBJECTID?: number;
}

export interface AssignmentFeature {
  geometry: PointGeometry;
  attributes: AssignmentAttributes;
}

/**
 * One CSV row on its way to the service.
 * workerUsername and attachmentFile never leave the process as part of the feature.
 */
export interface AssignmentCandidate {
  row_number: number;
  feature: AssignmentFeature;
  workerUsername?: string;
  attachmentFile?: string;
}

/** A feature returned by a layer query */
export interface QueriedFeature {
  attributes: Record<string, unknown>;
  geometry?: unknown;
}

export interface CodedValue {
  name: string;
  code: number | string;
}

export interface LayerField {
  name: string;
  type?: string;
  domain?: {
    type: string;
    codedValues?: CodedValue[];
  } | null;
}

export interface EditResult {
  objectId?: number;
  success: boolean;
  error?: {
    code: number;
    description: string;
  } | null;
}

// ============================================================================
// Remote Layer Interfaces
// ============================================================================

/** Dispatchers and workers layers */
export interface IdentityLayer {
  query(where?: string): Promise<QueriedFeature[]>;
}

export interface AssignmentLayer extends IdentityLayer {
  getFields(): Promise<LayerField[]>;
  addFeatures(features: AssignmentFeature[]): Promise<EditResult[]>;
  addAttachment(objectId: number, filePath: string): Promise<EditResult>;
}

export interface WorkforceProject {
  assignments: AssignmentLayer;
  dispatchers: IdentityLayer;
  workers: IdentityLayer;
}

// ============================================================================
// Reference Data Types
// ============================================================================

/**
 * Snapshot of the reference data a batch is checked against.
 * A null code set means the layer field has no coded-value domain and is not checked.
 */
export interface ReferenceSets {
  dispatcherIds: ReadonlySet<number>;
  workerIds: ReadonlySet<number>;
  statuses: ReadonlySet<number> | null;
  priorities: ReadonlySet<number> | null;
  assignmentTypes: ReadonlySet<number> | null;
}

// ============================================================================
// Import Types
// ============================================================================

/**
 * Maps semantic assignment fields to CSV column names
 */
export interface ColumnMapping {
  x: string;
  y: string;
  assignmentType: string;
  location: string;
  dispatcherId?: string;
  description?: string;
  priority?: string;
  workOrderId?: string;
  dueDate?: string;
  worker?: string;
  attachmentFile?: string;
}

export interface CreateAssignmentsInput {
  csv_file_path: string;
  column_mapping: ColumnMapping;
  date_format: string;
  wkid: number;
  timezone: string;
  /** Login of the acting user, resolved to a dispatcher */
  username: string;
  validate_only?: boolean;
}

export interface CreateAssignmentsOutput {
  total_rows: number;
  created_assignments: number;
  failed_assignments: number;
  created_object_ids: number[];
  failed_items: Array<{ row_number: number; error: string }>;
  uploaded_attachments: number;
  failed_attachments: Array<{ row_number: number; object_id: number; file: string; error: string }>;
  validate_only: boolean;
  preview?: AssignmentFeature[];
  execution_time_ms: number;
}

// ============================================================================
// Error Types
// ============================================================================

export class RemoteServiceError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public response?: unknown
  ) {
    super(message);
    this.name = 'RemoteServiceError';
  }
}

export class FileError extends Error {
  constructor(
    message: string,
    public path: string
  ) {
    super(message);
    this.name = 'FileError';
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public row_number?: number,
    public column?: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public username?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ResolutionError extends Error {
  constructor(
    message: string,
    public row_number: number,
    public username: string
  ) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export type ValidationRule =
  | 'status'
  | 'priority'
  | 'assignmentType'
  | 'dispatcherId'
  | 'workerId'
  | 'attachmentFile';

export class ValidationError extends Error {
  constructor(
    message: string,
    public row_number: number,
    public rule: ValidationRule
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UsageError extends Error {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'UsageError';
  }
}
