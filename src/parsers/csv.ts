/**
 * CSV Parser for assignment imports
 *
 * Features:
 * - Accepts CSV data as string or file path
 * - Explicit column mapping from CSV headers to assignment fields
 * - Optional fields are only read when their column is mapped
 * - Due dates normalized to UTC with end-of-day handling for bare dates
 * - Handles quoted fields and commas in values (via papaparse)
 */

import Papa from 'papaparse';
import { readFileSync } from 'fs';
import { normalizeDueDate, toDateFnsPattern, isValidTimeZone } from './dates.js';
import {
  AssignmentStatus,
  FileError,
  ParseError,
  UsageError,
  type AssignmentAttributes,
  type AssignmentCandidate,
  type ColumnMapping,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CSVRows {
  fields: string[];
  rows: Array<Record<string, string>>;
}

export interface CSVReadOptions {
  csv_data?: string;
  csv_file_path?: string;
}

export interface AssignmentParseOptions extends CSVReadOptions {
  column_mapping: ColumnMapping;
  /** strptime directives or a date-fns pattern */
  date_format: string;
  wkid: number;
  timezone: string;
}

/** Header is line 1, so data row i sits on line i + 2 */
const FIRST_DATA_ROW = 2;

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Read CSV rows keyed by (trimmed) header name
 *
 * @throws FileError when the file cannot be read
 * @throws ParseError when a line is structurally malformed
 */
export function readCSV(options: CSVReadOptions): CSVRows {
  let csvContent: string;
  if (options.csv_data !== undefined) {
    csvContent = options.csv_data;
  } else if (options.csv_file_path) {
    try {
      csvContent = readFileSync(options.csv_file_path, 'utf-8');
    } catch (err) {
      throw new FileError(
        `Failed to read CSV file: ${err instanceof Error ? err.message : String(err)}`,
        options.csv_file_path
      );
    }
  } else {
    throw new UsageError('Either csv_data or csv_file_path must be provided', 'csv_file_path');
  }

  // Spreadsheet exports often start with a byte order mark
  csvContent = csvContent.replace(/^\uFEFF/, '');

  const parseResult = Papa.parse<Record<string, string>>(csvContent, {
    header: true,
    skipEmptyLines: true,
    delimiter: ',',
    transformHeader: (header: string) => header.trim(),
  });

  if (parseResult.errors.length > 0) {
    const [first] = parseResult.errors;
    const rowNumber = first.row !== undefined ? first.row + FIRST_DATA_ROW : undefined;
    throw new ParseError(
      `CSV parse error${rowNumber !== undefined ? ` at row ${rowNumber}` : ''}: ${first.message}`,
      rowNumber
    );
  }

  const fields = parseResult.meta.fields ?? [];
  if (fields.length === 0) {
    throw new ParseError('CSV must have a header row with column names');
  }

  return { fields, rows: parseResult.data };
}

/**
 * Parse assignment candidates from CSV
 *
 * @param options - CSV source, column mapping, date format, wkid and timezone
 * @returns One candidate per data row, in file order
 *
 * @example
 * ```typescript
 * const candidates = parseAssignmentsCSV({
 *   csv_data: 'X,Y,Type,Where\n-117.19,34.05,1,123 Main St',
 *   column_mapping: { x: 'X', y: 'Y', assignmentType: 'Type', location: 'Where' },
 *   date_format: '%m/%d/%Y %H:%M:%S',
 *   wkid: 4326,
 *   timezone: 'UTC',
 * });
 * // candidates[0].feature.attributes = { assignmentType: 1, location: '123 Main St', status: 0, assignmentRead: null }
 * ```
 */
export function parseAssignmentsCSV(options: AssignmentParseOptions): AssignmentCandidate[] {
  if (!isValidTimeZone(options.timezone)) {
    throw new UsageError(`Unknown timezone: "${options.timezone}"`, 'timezone');
  }
  const datePattern = toDateFnsPattern(options.date_format);

  const { fields, rows } = readCSV(options);
  assertMappedColumnsExist(options.column_mapping, fields);

  return rows.map((row, index) =>
    rowToCandidate(row, index + FIRST_DATA_ROW, options, datePattern)
  );
}

/**
 * Every mapped column must be present in the header row
 */
export function assertMappedColumnsExist(mapping: ColumnMapping, fields: string[]): void {
  const available = new Set(fields);
  for (const [field, column] of Object.entries(mapping)) {
    if (column === undefined) {
      continue;
    }
    if (!available.has(column)) {
      throw new ParseError(
        `Column "${column}" (mapped to ${field}) not found in CSV header. Available columns: ${fields.join(', ')}`,
        undefined,
        column
      );
    }
  }
}

/**
 * Build one candidate from a CSV row
 */
export function rowToCandidate(
  row: Record<string, string>,
  rowNumber: number,
  options: AssignmentParseOptions,
  datePattern: string
): AssignmentCandidate {
  const mapping = options.column_mapping;
  const cell = (column: string): string => row[column] ?? '';

  const attributes: AssignmentAttributes = {
    assignmentType: parseInteger(cell(mapping.assignmentType), rowNumber, mapping.assignmentType),
    location: cell(mapping.location),
    status: AssignmentStatus.UNASSIGNED,
    assignmentRead: null,
  };

  if (mapping.dispatcherId) {
    const value = cell(mapping.dispatcherId);
    if (value.trim() !== '') {
      attributes.dispatcherId = parseInteger(value, rowNumber, mapping.dispatcherId);
    }
  }
  if (mapping.description) {
    attributes.description = cell(mapping.description);
  }
  if (mapping.priority) {
    const value = cell(mapping.priority);
    if (value.trim() !== '') {
      attributes.priority = parseInteger(value, rowNumber, mapping.priority);
    }
  }
  if (mapping.workOrderId) {
    attributes.workOrderId = cell(mapping.workOrderId);
  }
  if (mapping.dueDate) {
    const value = cell(mapping.dueDate);
    if (value.trim() !== '') {
      const dueDate = normalizeDueDate(value, datePattern, options.timezone);
      if (dueDate === null) {
        throw new ParseError(
          `Row ${rowNumber}: invalid date "${value}" in column "${mapping.dueDate}" (expected format "${options.date_format}")`,
          rowNumber,
          mapping.dueDate
        );
      }
      attributes.dueDate = dueDate;
    }
  }

  const candidate: AssignmentCandidate = {
    row_number: rowNumber,
    feature: {
      geometry: {
        x: parseFloatValue(cell(mapping.x), rowNumber, mapping.x),
        y: parseFloatValue(cell(mapping.y), rowNumber, mapping.y),
        spatialReference: { wkid: options.wkid },
      },
      attributes,
    },
  };

  if (mapping.worker) {
    candidate.workerUsername = cell(mapping.worker);
  }
  if (mapping.attachmentFile) {
    candidate.attachmentFile = cell(mapping.attachmentFile);
  }

  return candidate;
}

// ============================================================================
// Value Parsing
// ============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/;

// Decimal only: Number() would also take 0x, 0o and 0b literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseInteger(value: string, rowNumber: number, column: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(
      `Row ${rowNumber}: expected an integer in column "${column}", got "${value}"`,
      rowNumber,
      column
    );
  }
  return Number.parseInt(trimmed, 10);
}

function parseFloatValue(value: string, rowNumber: number, column: string): number {
  const trimmed = value.trim();
  const parsed = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new ParseError(
      `Row ${rowNumber}: expected a number in column "${column}", got "${value}"`,
      rowNumber,
      column
    );
  }
  return parsed;
}
