/**
 * ArcGIS REST Client
 *
 * HTTP client for the portal and the feature layers of a Workforce project.
 * Handles token authentication, error mapping and response validation.
 * Requests are never retried.
 */

import { openAsBlob } from 'fs';
import { basename } from 'path';
import { z } from 'zod';
import { TokenCache } from '../cache/tokenCache.js';
import {
  FileError,
  RemoteServiceError,
  UsageError,
  type AssignmentFeature,
  type AssignmentLayer,
  type EditResult,
  type LayerField,
  type QueriedFeature,
  type WorkforceProject,
} from '../types/index.js';

/**
 * Configuration for ArcGISSession
 */
export interface ArcGISSessionConfig {
  orgUrl: string;
  username: string;
  password: string;
  /** Requested token lifetime; the portal may grant less */
  tokenExpirationMinutes?: number;
  tokenCache?: TokenCache;
}

const DEFAULT_TOKEN_EXPIRATION_MINUTES = 60;

// ============================================================================
// Response Schemas
// ============================================================================

/** The REST API reports most failures with HTTP 200 and this body */
const ServiceErrorSchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string().optional(),
    details: z.array(z.string()).nullable().optional(),
  }),
});

const TokenResponseSchema = z.object({
  token: z.string().min(1),
  expires: z.number(),
});

const LayerReferenceSchema = z.object({
  url: z.string().min(1),
});

const ProjectDataSchema = z.object({
  assignments: LayerReferenceSchema,
  dispatchers: LayerReferenceSchema,
  workers: LayerReferenceSchema,
});

const FeatureSchema = z.object({
  attributes: z.record(z.string(), z.unknown()),
  geometry: z.unknown().optional(),
});

const QueryResponseSchema = z.object({
  features: z.array(FeatureSchema),
  exceededTransferLimit: z.boolean().optional(),
});

const LayerInfoSchema = z.object({
  fields: z.array(
    z.object({
      name: z.string(),
      type: z.string().optional(),
      domain: z
        .object({
          type: z.string(),
          codedValues: z
            .array(z.object({ name: z.string(), code: z.union([z.number(), z.string()]) }))
            .optional(),
        })
        .nullable()
        .optional(),
    })
  ),
});

const EditResultSchema = z.object({
  objectId: z.number().optional(),
  success: z.boolean(),
  error: z
    .object({
      code: z.number(),
      description: z.string(),
    })
    .nullable()
    .optional(),
});

const AddFeaturesResponseSchema = z.object({
  addResults: z.array(EditResultSchema),
});

const AddAttachmentResponseSchema = z.object({
  addAttachmentResult: EditResultSchema,
});

interface RequestOptions {
  method?: 'GET' | 'POST';
  params?: Record<string, string>;
  form?: FormData;
}

// ============================================================================
// Session
// ============================================================================

/**
 * ArcGISSession - authenticated access to one portal
 *
 * Features:
 * - Username/password token generation
 * - Token reuse until shortly before expiry
 * - Structured error handling (HTTP and in-body service errors)
 * - zod-validated responses
 */
export class ArcGISSession {
  readonly orgUrl: string;
  readonly username: string;
  private readonly password: string;
  private readonly tokenExpirationMinutes: number;
  private readonly tokenCache: TokenCache;

  constructor(config: ArcGISSessionConfig) {
    if (!config.orgUrl || config.orgUrl.trim() === '') {
      throw new UsageError('orgUrl is required', 'org_url');
    }
    if (!config.username || !config.password) {
      throw new UsageError('username and password are required', 'username');
    }

    this.orgUrl = config.orgUrl.trim().replace(/\/+$/, '');
    this.username = config.username;
    this.password = config.password;
    this.tokenExpirationMinutes = config.tokenExpirationMinutes ?? DEFAULT_TOKEN_EXPIRATION_MINUTES;
    this.tokenCache = config.tokenCache ?? new TokenCache();
  }

  /**
   * Get a token, generating one on first use or after expiry
   */
  async getToken(): Promise<string> {
    const key = TokenCache.key(this.orgUrl, this.username);
    const cached = this.tokenCache.get(key);
    if (cached) {
      return cached.token;
    }

    const body = new URLSearchParams({
      username: this.username,
      password: this.password,
      client: 'referer',
      referer: this.orgUrl,
      expiration: String(this.tokenExpirationMinutes),
      f: 'json',
    });

    const generated = await this.send(
      `${this.orgUrl}/sharing/rest/generateToken`,
      undefined,
      { method: 'POST', body },
      TokenResponseSchema
    );
    this.tokenCache.set(key, generated);
    return generated.token;
  }

  /**
   * Authenticated request against a portal or layer endpoint
   *
   * @param url - Endpoint without query string
   * @param schema - Expected shape of the response body
   */
  async request<T>(url: string, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    const token = await this.getToken();
    const method = options.method ?? 'GET';

    try {
      if (method === 'GET') {
        const query = new URLSearchParams({ ...options.params, f: 'json', token });
        return await this.send(url, query, { method }, schema);
      }

      if (options.form) {
        const form = options.form;
        for (const [name, value] of Object.entries(options.params ?? {})) {
          form.append(name, value);
        }
        form.append('f', 'json');
        form.append('token', token);
        return await this.send(url, undefined, { method, body: form }, schema);
      }

      const body = new URLSearchParams({ ...options.params, f: 'json', token });
      return await this.send(url, undefined, { method, body }, schema);
    } catch (error) {
      // 498 invalid token, 499 token required
      if (error instanceof RemoteServiceError && (error.statusCode === 498 || error.statusCode === 499)) {
        this.tokenCache.invalidate(TokenCache.key(this.orgUrl, this.username));
      }
      throw error;
    }
  }

  /**
   * Look up a Workforce project's layers from its item data
   */
  async getProject(projectId: string): Promise<WorkforceProject> {
    if (!projectId || projectId.trim() === '') {
      throw new UsageError('projectId is required and must be a non-empty string', 'project_id');
    }

    const data = await this.request(
      `${this.orgUrl}/sharing/rest/content/items/${encodeURIComponent(projectId.trim())}/data`,
      ProjectDataSchema
    );

    return {
      assignments: new FeatureLayerClient(this, data.assignments.url),
      dispatchers: new FeatureLayerClient(this, data.dispatchers.url),
      workers: new FeatureLayerClient(this, data.workers.url),
    };
  }

  /**
   * Perform one HTTP exchange and validate the body
   */
  private async send<T>(
    url: string,
    query: URLSearchParams | undefined,
    init: RequestInit,
    schema: z.ZodType<T>
  ): Promise<T> {
    let response: Response;

    try {
      response = await fetch(query ? `${url}?${query.toString()}` : url, init);
    } catch (error) {
      // Network errors, DNS failures, etc.
      throw new RemoteServiceError(
        `Network error calling ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        0
      );
    }

    if (!response.ok) {
      throw mapErrorStatus(response.status, response.statusText || 'Unknown error', url);
    }

    const text = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new RemoteServiceError(
        `Failed to parse JSON response from ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        response.status
      );
    }

    const serviceError = ServiceErrorSchema.safeParse(data);
    if (serviceError.success) {
      const { code, message, details } = serviceError.data.error;
      const detailText = details && details.length > 0 ? ` (${details.join('; ')})` : '';
      throw mapErrorStatus(code, `${message ?? 'Unknown error'}${detailText}`, url, data);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new RemoteServiceError(`Unexpected response from ${url}: ${issues}`, response.status, data);
    }
    return parsed.data;
  }
}

/**
 * Map HTTP and service status codes to errors
 */
function mapErrorStatus(status: number, message: string, url: string, body?: unknown): RemoteServiceError {
  switch (status) {
    case 400:
      return new RemoteServiceError(`Bad Request (${url}): ${message}`, 400, body);

    case 401:
      return new RemoteServiceError(`Unauthorized: check username and password. ${message}`, 401, body);

    case 403:
      return new RemoteServiceError(`Forbidden: insufficient permissions for ${url}. ${message}`, 403, body);

    case 404:
      return new RemoteServiceError(`Not Found (${url}): ${message}`, 404, body);

    case 498:
      return new RemoteServiceError(`Invalid or expired token: ${message}`, 498, body);

    case 499:
      return new RemoteServiceError(`Token required: ${message}`, 499, body);

    case 500:
      return new RemoteServiceError(`Internal Server Error (${url}): ${message}`, 500, body);

    default:
      return new RemoteServiceError(`HTTP ${status} (${url}): ${message}`, status, body);
  }
}

// ============================================================================
// Feature Layers
// ============================================================================

/**
 * FeatureLayerClient - one feature layer of the project
 */
export class FeatureLayerClient implements AssignmentLayer {
  readonly url: string;

  constructor(
    private readonly session: ArcGISSession,
    url: string
  ) {
    this.url = url.replace(/\/+$/, '');
  }

  /**
   * Query attributes of every matching feature, following pages while the
   * layer reports exceededTransferLimit
   */
  async query(where: string = '1=1'): Promise<QueriedFeature[]> {
    const features: QueriedFeature[] = [];

    for (;;) {
      const params: Record<string, string> = {
        where,
        outFields: '*',
        returnGeometry: 'false',
      };
      if (features.length > 0) {
        params.resultOffset = String(features.length);
      }

      const page = await this.session.request(`${this.url}/query`, QueryResponseSchema, { params });
      features.push(...page.features);

      if (!page.exceededTransferLimit || page.features.length === 0) {
        return features;
      }
    }
  }

  /**
   * Field definitions, including coded-value domains
   */
  async getFields(): Promise<LayerField[]> {
    const info = await this.session.request(this.url, LayerInfoSchema);
    return info.fields;
  }

  /**
   * Insert features in one call; results come back in submission order
   */
  async addFeatures(features: AssignmentFeature[]): Promise<EditResult[]> {
    const response = await this.session.request(`${this.url}/addFeatures`, AddFeaturesResponseSchema, {
      method: 'POST',
      params: { features: JSON.stringify(features) },
    });
    return response.addResults;
  }

  /**
   * Upload a file as an attachment of an existing feature
   */
  async addAttachment(objectId: number, filePath: string): Promise<EditResult> {
    let file: Blob;
    try {
      file = await openAsBlob(filePath);
    } catch (error) {
      throw new FileError(
        `Failed to read attachment: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }

    const form = new FormData();
    form.append('attachment', file, basename(filePath));

    const response = await this.session.request(
      `${this.url}/${objectId}/addAttachment`,
      AddAttachmentResponseSchema,
      { method: 'POST', form }
    );
    return response.addAttachmentResult;
  }
}
