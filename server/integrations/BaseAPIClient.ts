// BASE API CLIENT FOR READ-ONLY JSON INTEGRATIONS
// Builds authenticated requests, sends them once and decodes the body into a typed result.

import Ajv, { type JSONSchemaType } from 'ajv';

import { getErrorMessage } from '../types/common';
import {
  ApiError,
  DecodeError,
  RequestBuildError,
  TransportError,
  type TypeformClientError,
} from './errors';

export interface APISuccess<T> {
  success: true;
  data: T;
  statusCode: number;
  headers: Record<string, string>;
}

export interface APIFailure {
  success: false;
  error: TypeformClientError;
  /** 0 when no response was received. */
  statusCode: number;
}

export type APIResponse<T> = APISuccess<T> | APIFailure;

export interface APIClientOptions {
  /** Overrides the provider's API origin, e.g. to target a test double. */
  baseURL?: string;
  /** Transport used to send requests. Defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Aborts a request that has not completed within this many milliseconds. */
  timeoutMs?: number;
}

export interface ProviderErrorBody {
  code: string;
  description?: string | null;
}

const PROVIDER_ERROR_SCHEMA: JSONSchemaType<ProviderErrorBody> = {
  type: 'object',
  properties: {
    code: { type: 'string' },
    description: { type: 'string', nullable: true },
  },
  required: ['code'],
  additionalProperties: true,
};

const USER_AGENT = 'typeform-responses/1.0';

export abstract class BaseAPIClient {
  private static readonly ajv = new Ajv({ allErrors: true, strict: false });
  private static readonly isProviderErrorBody = BaseAPIClient.ajv.compile<ProviderErrorBody>(PROVIDER_ERROR_SCHEMA);

  protected readonly baseURL: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs?: number;

  constructor(defaultBaseURL: string, options: APIClientOptions = {}) {
    this.baseURL = options.baseURL ?? defaultBaseURL;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Get authentication headers (to be implemented by subclasses)
   */
  protected abstract getAuthHeaders(): Record<string, string>;

  /**
   * Send one authenticated GET and decode its JSON body. Never throws: every
   * failure is returned as a typed error on an unsuccessful response.
   */
  protected async get<T>(endpoint: string, decode: (payload: unknown) => T): Promise<APIResponse<T>> {
    let url: string;
    let init: RequestInit;
    try {
      url = this.buildRequestUrl(endpoint);
      init = {
        method: 'GET',
        headers: new Headers({
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
          ...this.getAuthHeaders(),
        }),
      };
      if (this.timeoutMs !== undefined) {
        init.signal = AbortSignal.timeout(this.timeoutMs);
      }
    } catch (error) {
      return { success: false, error: new RequestBuildError(getErrorMessage(error), { cause: error }), statusCode: 0 };
    }

    let response: Response;
    let responseText: string;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      return { success: false, error: new TransportError(getErrorMessage(error), { cause: error }), statusCode: 0 };
    }

    try {
      responseText = await response.text();
    } catch (error) {
      return {
        success: false,
        error: new TransportError(getErrorMessage(error), { cause: error }),
        statusCode: response.status,
      };
    }

    if (!response.ok) {
      return { success: false, error: this.toApiError(response, responseText), statusCode: response.status };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(responseText);
    } catch (error) {
      return {
        success: false,
        error: new DecodeError(`body is not valid JSON (${getErrorMessage(error)})`, [], { cause: error }),
        statusCode: response.status,
      };
    }

    try {
      return {
        success: true,
        data: decode(payload),
        statusCode: response.status,
        headers: Object.fromEntries(response.headers.entries()),
      };
    } catch (error) {
      const failure =
        error instanceof DecodeError ? error : new DecodeError(getErrorMessage(error), [], { cause: error });
      return { success: false, error: failure, statusCode: response.status };
    }
  }

  protected buildRequestUrl(endpoint: string): string {
    if (!this.baseURL) {
      throw new Error('Base URL is not configured for this API client');
    }

    const joined =
      endpoint.startsWith('/') && this.baseURL.endsWith('/')
        ? `${this.baseURL}${endpoint.slice(1)}`
        : endpoint.startsWith('/') || this.baseURL.endsWith('/')
          ? `${this.baseURL}${endpoint}`
          : `${this.baseURL}/${endpoint}`;

    return new URL(joined).toString();
  }

  /**
   * Build query string from parameters
   */
  protected buildQueryString(params: Record<string, string | number | undefined | null>): string {
    const searchParams = new URLSearchParams();

    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined && value !== null) {
        searchParams.append(key, String(value));
      }
    });

    const queryString = searchParams.toString();
    return queryString ? `?${queryString}` : '';
  }

  private toApiError(response: Response, responseText: string): ApiError {
    let body: unknown;
    try {
      body = responseText ? JSON.parse(responseText) : undefined;
    } catch {
      body = undefined;
    }

    if (BaseAPIClient.isProviderErrorBody(body)) {
      return new ApiError(response.status, {
        code: body.code,
        description: body.description ?? undefined,
        statusText: response.statusText,
      });
    }
    return new ApiError(response.status, { statusText: response.statusText });
  }
}
