/**
 * Reference data for assignment validation
 *
 * Reads the identifiers of every dispatcher and worker and the coded-value
 * domains of the assignments layer, and resolves login names to identifiers.
 */

import {
  ConfigurationError,
  RemoteServiceError,
  ResolutionError,
  type IdentityLayer,
  type LayerField,
  type QueriedFeature,
  type ReferenceSets,
  type WorkforceProject,
} from '../types/index.js';

const OBJECT_ID_FIELD = 'OBJECTID';

/** Assignment fields whose values are checked against coded-value domains */
const DOMAIN_FIELDS = ['status', 'priority', 'assignmentType'] as const;

type DomainField = (typeof DOMAIN_FIELDS)[number];

/**
 * Fetch the reference snapshot a batch is validated against.
 * Each collection is read exactly once.
 */
export async function fetchReferenceSets(project: WorkforceProject): Promise<ReferenceSets> {
  const dispatchers = await project.dispatchers.query('1=1');
  const workers = await project.workers.query('1=1');
  const fields = await project.assignments.getFields();

  const domains = extractCodedValues(fields);

  return {
    dispatcherIds: new Set(dispatchers.map(readObjectId)),
    workerIds: new Set(workers.map(readObjectId)),
    statuses: domains.status,
    priorities: domains.priority,
    assignmentTypes: domains.assignmentType,
  };
}

/**
 * Collect the integer codes of each domain field.
 * A field without a coded-value domain maps to null.
 */
export function extractCodedValues(fields: LayerField[]): Record<DomainField, ReadonlySet<number> | null> {
  const result: Record<DomainField, ReadonlySet<number> | null> = {
    status: null,
    priority: null,
    assignmentType: null,
  };

  for (const field of fields) {
    if (!isDomainField(field.name)) {
      continue;
    }
    const codedValues = field.domain?.codedValues;
    if (!codedValues) {
      continue;
    }

    const codes = new Set<number>();
    for (const { code } of codedValues) {
      const numeric = typeof code === 'number' ? code : Number(code);
      if (Number.isInteger(numeric)) {
        codes.add(numeric);
      }
    }
    result[field.name] = codes;
  }

  return result;
}

function isDomainField(name: string): name is DomainField {
  return (DOMAIN_FIELDS as readonly string[]).includes(name);
}

/**
 * Resolve the acting user to their dispatcher record
 *
 * @throws ConfigurationError when the user is not a dispatcher of the project
 */
export async function resolveDispatcherId(dispatchers: IdentityLayer, username: string): Promise<number> {
  const matches = await dispatchers.query(userIdClause(username));
  if (matches.length === 0) {
    throw new ConfigurationError(`${username} is not a dispatcher of this project`, username);
  }
  return readObjectId(matches[0]);
}

/**
 * Resolve a worker login name to the worker's identifier
 *
 * @throws ResolutionError when no worker has that login
 */
export async function resolveWorkerId(
  workers: IdentityLayer,
  username: string,
  rowNumber: number
): Promise<number> {
  const matches = await workers.query(userIdClause(username));
  if (matches.length === 0) {
    throw new ResolutionError(`Row ${rowNumber}: ${username} is not a worker of this project`, rowNumber, username);
  }
  return readObjectId(matches[0]);
}

/**
 * SQL where clause matching a userId, with quotes escaped
 *
 * @example
 * userIdClause("o'neil") // => "userId='o''neil'"
 */
export function userIdClause(username: string): string {
  return `userId='${username.replace(/'/g, "''")}'`;
}

function readObjectId(feature: QueriedFeature): number {
  const value = feature.attributes[OBJECT_ID_FIELD];
  if (typeof value !== 'number') {
    throw new RemoteServiceError(
      `Feature is missing a numeric ${OBJECT_ID_FIELD}: ${JSON.stringify(feature.attributes)}`,
      200,
      feature
    );
  }
  return value;
}
