/**
 * Unit tests for CSV parser
 */

import { describe, test, expect, afterEach } from 'vitest';
import { parseAssignmentsCSV, readCSV, assertMappedColumnsExist, type AssignmentParseOptions } from './csv.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileError, ParseError, UsageError, type ColumnMapping } from '../types/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const TEST_DIR = join(tmpdir(), 'assignment-csv-parser-tests');

function createTestFile(filename: string, content: string): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filePath = join(TEST_DIR, filename);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

const BASE_MAPPING: ColumnMapping = {
  x: 'X',
  y: 'Y',
  assignmentType: 'Type',
  location: 'Location',
};

function options(csv: string, overrides: Partial<AssignmentParseOptions> = {}): AssignmentParseOptions {
  return {
    csv_data: csv,
    column_mapping: BASE_MAPPING,
    date_format: '%m/%d/%Y %H:%M:%S',
    wkid: 4326,
    timezone: 'UTC',
    ...overrides,
  };
}

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

// ============================================================================
// Basic Parsing Tests
// ============================================================================

describe('parseAssignmentsCSV - required fields', () => {
  test('builds geometry and base attributes', () => {
    const csv = 'X,Y,Type,Location\n-117.1956,34.0564,2,380 New York St';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(candidate.row_number).toBe(2);
    expect(candidate.feature.geometry).toEqual({
      x: -117.1956,
      y: 34.0564,
      spatialReference: { wkid: 4326 },
    });
    expect(candidate.feature.attributes).toEqual({
      assignmentType: 2,
      location: '380 New York St',
      status: 0,
      assignmentRead: null,
    });
  });

  test('row without optional mappings has exactly the base attributes', () => {
    const csv = 'X,Y,Type,Location,Description\n1,2,3,Depot,ignored';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(Object.keys(candidate.feature.attributes).sort()).toEqual(
      ['assignmentRead', 'assignmentType', 'location', 'status']
    );
    expect('workerUsername' in candidate).toBe(false);
    expect('attachmentFile' in candidate).toBe(false);
  });

  test('keeps input order and numbers rows from the file line', () => {
    const csv = 'X,Y,Type,Location\n1,1,1,First\n2,2,1,Second\n3,3,1,Third';
    const candidates = parseAssignmentsCSV(options(csv));

    expect(candidates.map(c => c.feature.attributes.location)).toEqual(['First', 'Second', 'Third']);
    expect(candidates.map(c => c.row_number)).toEqual([2, 3, 4]);
  });

  test('uses the configured wkid', () => {
    const csv = 'X,Y,Type,Location\n-13046000.5,4036000.25,1,Somewhere';
    const [candidate] = parseAssignmentsCSV(options(csv, { wkid: 102100 }));

    expect(candidate.feature.geometry).toEqual({
      x: -13046000.5,
      y: 4036000.25,
      spatialReference: { wkid: 102100 },
    });
  });

  test('handles quoted values containing commas', () => {
    const csv = 'X,Y,Type,Location\n1,2,1,"12 Oak St, Apt 4"';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(candidate.feature.attributes.location).toBe('12 Oak St, Apt 4');
  });

  test('trims header names and strips a byte order mark', () => {
    const csv = '\uFEFF X , Y ,Type,Location\n5,6,1,Yard';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(candidate.feature.geometry.x).toBe(5);
    expect(candidate.feature.geometry.y).toBe(6);
  });

  test('skips empty lines', () => {
    const csv = 'X,Y,Type,Location\n1,2,1,A\n\n3,4,1,B\n';
    const candidates = parseAssignmentsCSV(options(csv));

    expect(candidates).toHaveLength(2);
  });
});

describe('parseAssignmentsCSV - numeric failures', () => {
  test('non-numeric x raises ParseError naming row and column', () => {
    const csv = 'X,Y,Type,Location\n1,2,1,A\nabc,4,1,B';

    expect(() => parseAssignmentsCSV(options(csv))).toThrow('Row 3: expected a number in column "X", got "abc"');
    try {
      parseAssignmentsCSV(options(csv));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ row_number: 3, column: 'X' });
    }
  });

  test('blank y raises ParseError', () => {
    const csv = 'X,Y,Type,Location\n1,,1,A';

    expect(() => parseAssignmentsCSV(options(csv))).toThrow('Row 2: expected a number in column "Y", got ""');
  });

  test('fractional assignment type raises ParseError', () => {
    const csv = 'X,Y,Type,Location\n1,2,1.5,A';

    expect(() => parseAssignmentsCSV(options(csv))).toThrow(
      'Row 2: expected an integer in column "Type", got "1.5"'
    );
  });

  test('accepts scientific notation for coordinates', () => {
    const csv = 'X,Y,Type,Location\n1.5e2,-2E1,1,A';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(candidate.feature.geometry.x).toBe(150);
    expect(candidate.feature.geometry.y).toBe(-20);
  });

  test('accepts leading and trailing decimal points', () => {
    const csv = 'X,Y,Type,Location\n-.5,12.,1,A';
    const [candidate] = parseAssignmentsCSV(options(csv));

    expect(candidate.feature.geometry.x).toBe(-0.5);
    expect(candidate.feature.geometry.y).toBe(12);
  });

  test.each(['0x1A', '0b101', '0o17', 'Infinity', '1,5'])('rejects non-decimal coordinate %s', value => {
    const csv = `X,Y,Type,Location\n"${value}",2,1,A`;

    expect(() => parseAssignmentsCSV(options(csv))).toThrow(
      `Row 2: expected a number in column "X", got "${value}"`
    );
  });
});

// ============================================================================
// Optional Field Tests
// ============================================================================

describe('parseAssignmentsCSV - optional fields', () => {
  const csv = [
    'X,Y,Type,Location,Dispatcher,Notes,Priority,WorkOrder,Due,Worker,File',
    '1,2,3,Depot,7,Check valve,2,WO-100,01/15/2024 14:30:00,jdoe,photos/valve.jpg',
  ].join('\n');

  const fullMapping: ColumnMapping = {
    ...BASE_MAPPING,
    dispatcherId: 'Dispatcher',
    description: 'Notes',
    priority: 'Priority',
    workOrderId: 'WorkOrder',
    dueDate: 'Due',
    worker: 'Worker',
    attachmentFile: 'File',
  };

  test('reads every mapped optional column', () => {
    const [candidate] = parseAssignmentsCSV(options(csv, { column_mapping: fullMapping }));

    expect(candidate.feature.attributes).toEqual({
      assignmentType: 3,
      location: 'Depot',
      status: 0,
      assignmentRead: null,
      dispatcherId: 7,
      description: 'Check valve',
      priority: 2,
      workOrderId: 'WO-100',
      dueDate: '01/15/2024 14:30:00',
    });
    expect(candidate.workerUsername).toBe('jdoe');
    expect(candidate.attachmentFile).toBe('photos/valve.jpg');
  });

  test('unmapped optional columns are omitted, not nulled', () => {
    const [candidate] = parseAssignmentsCSV(options(csv, {
      column_mapping: { ...BASE_MAPPING, priority: 'Priority' },
    }));

    expect(candidate.feature.attributes).toEqual({
      assignmentType: 3,
      location: 'Depot',
      status: 0,
      assignmentRead: null,
      priority: 2,
    });
  });

  test('blank optional integer and date cells leave the attribute absent', () => {
    const blankCsv = 'X,Y,Type,Location,Dispatcher,Priority,Due\n1,2,3,Depot,,,';
    const [candidate] = parseAssignmentsCSV(options(blankCsv, {
      column_mapping: { ...BASE_MAPPING, dispatcherId: 'Dispatcher', priority: 'Priority', dueDate: 'Due' },
    }));

    expect('dispatcherId' in candidate.feature.attributes).toBe(false);
    expect('priority' in candidate.feature.attributes).toBe(false);
    expect('dueDate' in candidate.feature.attributes).toBe(false);
  });

  test('copies empty worker and attachment values verbatim', () => {
    const blankCsv = 'X,Y,Type,Location,Worker,File\n1,2,3,Depot,,';
    const [candidate] = parseAssignmentsCSV(options(blankCsv, {
      column_mapping: { ...BASE_MAPPING, worker: 'Worker', attachmentFile: 'File' },
    }));

    expect(candidate.workerUsername).toBe('');
    expect(candidate.attachmentFile).toBe('');
  });

  test('non-integer priority raises ParseError', () => {
    const badCsv = 'X,Y,Type,Location,Priority\n1,2,3,Depot,high';

    expect(() => parseAssignmentsCSV(options(badCsv, {
      column_mapping: { ...BASE_MAPPING, priority: 'Priority' },
    }))).toThrow('Row 2: expected an integer in column "Priority", got "high"');
  });
});

describe('parseAssignmentsCSV - due dates', () => {
  const mapping: ColumnMapping = { ...BASE_MAPPING, dueDate: 'Due' };

  test('midnight becomes end of day', () => {
    const csv = 'X,Y,Type,Location,Due\n1,2,1,A,01/15/2024 00:00:00';
    const [candidate] = parseAssignmentsCSV(options(csv, { column_mapping: mapping }));

    expect(candidate.feature.attributes.dueDate).toBe('01/15/2024 23:59:59');
  });

  test('converts from the configured timezone', () => {
    const csv = 'X,Y,Type,Location,Due\n1,2,1,A,07/04/2024 09:00:00';
    const [candidate] = parseAssignmentsCSV(options(csv, { column_mapping: mapping, timezone: 'America/Los_Angeles' }));

    // PDT is UTC-7 in July
    expect(candidate.feature.attributes.dueDate).toBe('07/04/2024 16:00:00');
  });

  test('honours a custom date format', () => {
    const csv = 'X,Y,Type,Location,Due\n1,2,1,A,2024-02-29';
    const [candidate] = parseAssignmentsCSV(options(csv, { column_mapping: mapping, date_format: '%Y-%m-%d' }));

    expect(candidate.feature.attributes.dueDate).toBe('02/29/2024 23:59:59');
  });

  test('malformed date raises ParseError with row and column', () => {
    const csv = 'X,Y,Type,Location,Due\n1,2,1,A,tomorrow';

    try {
      parseAssignmentsCSV(options(csv, { column_mapping: mapping }));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ row_number: 2, column: 'Due' });
    }
  });

  test('unknown timezone is a usage error', () => {
    const csv = 'X,Y,Type,Location\n1,2,1,A';

    expect(() => parseAssignmentsCSV(options(csv, { timezone: 'Nowhere/Special' }))).toThrow(UsageError);
  });
});

// ============================================================================
// Structure and File Tests
// ============================================================================

describe('parseAssignmentsCSV - structure', () => {
  test('mapped column missing from header raises ParseError', () => {
    const csv = 'X,Y,Type\n1,2,1';

    expect(() => parseAssignmentsCSV(options(csv))).toThrow(
      'Column "Location" (mapped to location) not found in CSV header. Available columns: X, Y, Type'
    );
  });

  test('row with too few fields raises ParseError with its row number', () => {
    const csv = 'X,Y,Type,Location\n1,2,1,A\n3,4';

    try {
      parseAssignmentsCSV(options(csv));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ row_number: 3 });
    }
  });

  test('header-only CSV yields no candidates', () => {
    expect(parseAssignmentsCSV(options('X,Y,Type,Location\n'))).toEqual([]);
  });

  test('reads from a file path', () => {
    const filePath = createTestFile('assignments.csv', 'X,Y,Type,Location\n10,20,1,From file');
    const candidates = parseAssignmentsCSV({ ...options(''), csv_data: undefined, csv_file_path: filePath });

    expect(candidates).toHaveLength(1);
    expect(candidates[0].feature.attributes.location).toBe('From file');
  });

  test('unreadable file raises FileError', () => {
    const missing = join(TEST_DIR, 'missing.csv');

    try {
      readCSV({ csv_file_path: missing });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FileError);
      expect(error).toMatchObject({ path: missing });
    }
  });
});

describe('assertMappedColumnsExist', () => {
  test('ignores optional mappings that were not supplied', () => {
    expect(() => assertMappedColumnsExist(
      { ...BASE_MAPPING, description: undefined },
      ['X', 'Y', 'Type', 'Location']
    )).not.toThrow();
  });
});
