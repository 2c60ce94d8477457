/**
 * Command-line options
 *
 * Flags are read with node:util parseArgs and validated with zod.
 * The password may come from ASSIGNMENT_IMPORTER_PASSWORD instead of --password.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_DATE_FORMAT, isValidTimeZone } from '../parsers/dates.js';
import { UsageError, type CreateAssignmentsInput } from '../types/index.js';

/** WGS84 longitude/latitude */
export const DEFAULT_WKID = 4326;

export const PASSWORD_ENV_VAR = 'ASSIGNMENT_IMPORTER_PASSWORD';

const OPTION_DEFINITIONS = {
  username: { type: 'string', short: 'u' },
  password: { type: 'string', short: 'p' },
  'org-url': { type: 'string' },
  'project-id': { type: 'string' },
  'csv-file': { type: 'string' },
  'log-file': { type: 'string' },
  'x-field': { type: 'string' },
  'y-field': { type: 'string' },
  'assignment-type-field': { type: 'string' },
  'location-field': { type: 'string' },
  'dispatcher-id-field': { type: 'string' },
  'description-field': { type: 'string' },
  'priority-field': { type: 'string' },
  'work-order-id-field': { type: 'string' },
  'due-date-field': { type: 'string' },
  'worker-field': { type: 'string' },
  'attachment-file-field': { type: 'string' },
  'date-format': { type: 'string' },
  wkid: { type: 'string' },
  timezone: { type: 'string' },
  'validate-only': { type: 'boolean' },
} as const;

const required = (flag: string) =>
  z.string({ required_error: `${flag} is required` }).trim().min(1, `${flag} must not be empty`);

const optionalColumn = z.string().trim().min(1).optional();

const OptionsSchema = z.object({
  username: required('--username'),
  password: z
    .string({ required_error: `--password (or ${PASSWORD_ENV_VAR}) is required` })
    .min(1, `--password (or ${PASSWORD_ENV_VAR}) must not be empty`),
  orgUrl: required('--org-url').url('--org-url must be a URL, e.g. https://example.maps.arcgis.com'),
  projectId: required('--project-id'),
  csvFile: required('--csv-file'),
  logFile: required('--log-file'),
  xField: required('--x-field'),
  yField: required('--y-field'),
  assignmentTypeField: required('--assignment-type-field'),
  locationField: required('--location-field'),
  dispatcherIdField: optionalColumn,
  descriptionField: optionalColumn,
  priorityField: optionalColumn,
  workOrderIdField: optionalColumn,
  dueDateField: optionalColumn,
  workerField: optionalColumn,
  attachmentFileField: optionalColumn,
  dateFormat: z.string().min(1).default(DEFAULT_DATE_FORMAT),
  wkid: z.coerce.number().int('--wkid must be an integer').positive('--wkid must be positive').default(DEFAULT_WKID),
  timezone: z
    .string()
    .default('UTC')
    .refine(isValidTimeZone, value => ({ message: `--timezone "${value}" is not a known IANA timezone` })),
  validateOnly: z.boolean().default(false),
});

export type ImporterOptions = z.infer<typeof OptionsSchema>;

/**
 * Parse and validate command-line arguments
 *
 * @param argv - Arguments after the script name
 * @param env - Environment for the password fallback
 * @throws UsageError on unknown flags, missing required flags or invalid values
 */
export function parseOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): ImporterOptions {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (error) {
    // parseArgs reports unknown flags and missing values as TypeErrors
    if (error instanceof TypeError) {
      throw new UsageError(error.message);
    }
    throw error;
  }

  const result = OptionsSchema.safeParse({
    username: values.username,
    password: values.password ?? env[PASSWORD_ENV_VAR],
    orgUrl: values['org-url'],
    projectId: values['project-id'],
    csvFile: values['csv-file'],
    logFile: values['log-file'],
    xField: values['x-field'],
    yField: values['y-field'],
    assignmentTypeField: values['assignment-type-field'],
    locationField: values['location-field'],
    dispatcherIdField: values['dispatcher-id-field'],
    descriptionField: values['description-field'],
    priorityField: values['priority-field'],
    workOrderIdField: values['work-order-id-field'],
    dueDateField: values['due-date-field'],
    workerField: values['worker-field'],
    attachmentFileField: values['attachment-file-field'],
    dateFormat: values['date-format'],
    wkid: values.wkid,
    timezone: values.timezone,
    validateOnly: values['validate-only'],
  });

  if (!result.success) {
    const [first] = result.error.issues;
    throw new UsageError(
      result.error.issues.map(issue => issue.message).join('; '),
      first?.path[0]?.toString()
    );
  }
  return result.data;
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: OPTION_DEFINITIONS,
    strict: true,
    allowPositionals: false,
  }).values;
}

/**
 * Build the create_assignments input from validated options
 */
export function toCreateAssignmentsInput(options: ImporterOptions): CreateAssignmentsInput {
  return {
    csv_file_path: options.csvFile,
    column_mapping: {
      x: options.xField,
      y: options.yField,
      assignmentType: options.assignmentTypeField,
      location: options.locationField,
      dispatcherId: options.dispatcherIdField,
      description: options.descriptionField,
      priority: options.priorityField,
      workOrderId: options.workOrderIdField,
      dueDate: options.dueDateField,
      worker: options.workerField,
      attachmentFile: options.attachmentFileField,
    },
    date_format: options.dateFormat,
    wkid: options.wkid,
    timezone: options.timezone,
    username: options.username,
    validate_only: options.validateOnly,
  };
}
