#!/usr/bin/env node

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ArcGISSession } from './api/arcgisClient.js';
import { parseOptions, toCreateAssignmentsInput, PASSWORD_ENV_VAR, DEFAULT_WKID } from './config/options.js';
import { createLogger, type Logger } from './logging/logger.js';
import { handleCreateAssignments } from './tools/create_assignments.js';
import { UsageError } from './types/index.js';

// Get package.json path
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');

const HELP_TEXT = `
assignment-csv-importer - create Workforce assignments from a CSV file

Usage:
  assignment-csv-importer [options]

Required:
  -u, --username <name>              Account to sign in with (must be a project dispatcher)
  -p, --password <password>          Password (or set ${PASSWORD_ENV_VAR})
  --org-url <url>                    Portal URL, e.g. https://example.maps.arcgis.com
  --project-id <id>                  Workforce project item id
  --csv-file <path>                  CSV file to import
  --log-file <path>                  Log file (appended, rotated at 10 MiB)
  --x-field <column>                 Column holding the x coordinate
  --y-field <column>                 Column holding the y coordinate
  --assignment-type-field <column>   Column holding the assignment type code
  --location-field <column>          Column holding the location text

Optional:
  --dispatcher-id-field <column>     Column holding a dispatcher id (defaults to you)
  --description-field <column>       Column holding the description
  --priority-field <column>          Column holding the priority code
  --work-order-id-field <column>     Column holding the work order id
  --due-date-field <column>          Column holding the due date
  --worker-field <column>            Column holding the worker's username
  --attachment-file-field <column>   Column holding a file path to attach
  --date-format <format>             Due date format (default: %m/%d/%Y %H:%M:%S)
  --wkid <wkid>                      Spatial reference of x/y (default: ${DEFAULT_WKID})
  --timezone <zone>                  Timezone of due dates (default: UTC)
  --validate-only                    Parse, resolve and validate without writing
  --version, -v                      Show version number
  --help, -h                         Show this help message
`;

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function main(argv: string[]): Promise<number> {
  // Handle --version and --help flags before anything else
  if (argv.includes('--version') || argv.includes('-v')) {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      ? String(packageJson.version)
      : 'unknown';
    console.log(version);
    return 0;
  }
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  let logger: Logger = createLogger();
  try {
    const options = parseOptions(argv);
    logger = createLogger({ logFile: options.logFile });

    // First step is to authenticate and find the project's layers
    logger.info('Authenticating...');
    const session = new ArcGISSession({
      orgUrl: options.orgUrl,
      username: options.username,
      password: options.password,
    });
    const project = await session.getProject(options.projectId);

    const result = await handleCreateAssignments(toCreateAssignmentsInput(options), { project, logger });
    logger.info(
      `Created ${result.created_assignments}, failed ${result.failed_assignments}, ` +
      `attachments uploaded ${result.uploaded_attachments}, attachments failed ${result.failed_attachments.length} ` +
      `(${result.execution_time_ms} ms)`
    );

    return result.failed_assignments > 0 ? EXIT_FAILURE : 0;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(`${error.message}\nRun with --help for usage.`);
      return EXIT_USAGE;
    }
    logger.error('Exception detected, script exiting', error);
    return EXIT_FAILURE;
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_FAILURE;
  }
);
