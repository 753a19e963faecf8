import { type APIClientOptions, type APIResponse, BaseAPIClient } from './BaseAPIClient';
import { decodeResponses } from './typeform/decode';
import type { DecodeOptions, Responses } from './typeform/types';
import { logAction } from '../utils/actionLog';

export const DEFAULT_TYPEFORM_URL = 'https://api.typeform.com';

export interface TypeformClientOptions extends APIClientOptions, DecodeOptions {}

/**
 * Read-only client for a single form's responses.
 *
 * Paging is left to the caller: feed the `token` of the last item seen into
 * `fetchResponsesAfter` to get the next one.
 */
export class TypeformAPIClient extends BaseAPIClient {
  private readonly formId: string;
  private readonly token: string;
  private readonly decodeOptions: DecodeOptions;

  constructor(formId: string, token: string, options: TypeformClientOptions = {}) {
    super(DEFAULT_TYPEFORM_URL, options);
    this.formId = formId;
    this.token = token;
    this.decodeOptions = { strictAnswers: options.strictAnswers };
  }

  protected getAuthHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
    };
  }

  /** Retrieve the form's responses. */
  public async fetchResponses(): Promise<APIResponse<Responses>> {
    return this.fetchPage(this.responsesPath());
  }

  /** Retrieve at most one response submitted after the response with `cursorToken`. */
  public async fetchResponsesAfter(cursorToken: string): Promise<APIResponse<Responses>> {
    const query = this.buildQueryString({ after: cursorToken, page_size: 1 });
    return this.fetchPage(`${this.responsesPath()}${query}`, cursorToken);
  }

  private responsesPath(): string {
    return `/forms/${this.formId}/responses`;
  }

  private async fetchPage(endpoint: string, after?: string): Promise<APIResponse<Responses>> {
    const startedAt = Date.now();
    const result = await this.get(endpoint, payload => decodeResponses(payload, this.decodeOptions));
    const durationMs = Date.now() - startedAt;

    if (result.success) {
      logAction({
        type: 'typeform.responses.fetched',
        message: `Fetched ${result.data.items.length} Typeform response(s) for form ${this.formId}`,
        attributes: {
          formId: this.formId,
          after,
          statusCode: result.statusCode,
          itemCount: result.data.items.length,
          totalItems: result.data.total_items,
          durationMs,
        },
      });
    } else {
      logAction({
        type: 'typeform.responses.failed',
        severity: 'warn',
        message: `Typeform responses request for form ${this.formId} failed: ${result.error.message}`,
        attributes: {
          formId: this.formId,
          after,
          statusCode: result.statusCode,
          errorKind: result.error.kind,
          durationMs,
        },
      });
    }

    return result;
  }
}
