import { beforeEach, describe, expect, it, vi } from 'vitest';

import { logAction } from '../../utils/actionLog';
import { ApiError, DecodeError, RequestBuildError, TransportError } from '../errors';
import { DEFAULT_TYPEFORM_URL, TypeformAPIClient } from '../TypeformAPIClient';

vi.mock('../../utils/actionLog', () => ({
  logAction: vi.fn(),
}));

const logActionMock = vi.mocked(logAction);

type RecordedCall = { url: string; init?: RequestInit };

function stubFetch(respond: () => Response | Promise<Response>): { fetchImpl: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
  return { fetchImpl, calls };
}

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), {
    ...init,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

const responsesBody = {
  total_items: 2,
  page_count: 2,
  items: [
    {
      token: 'resp-a',
      landed_at: '2024-04-01T10:00:00Z',
      submitted_at: '2024-04-01T10:05:00Z',
      metadata: { user_agent: 'TestAgent/1.0', referer: 'https://forms.example.test', network_id: '192.0.2.9' },
      answers: [{ field: { id: 'fld_q', type: 'yes_no', ref: 'q_ref' }, type: 'boolean', boolean: true }],
      calculated: { score: 1 },
    },
  ],
};

describe('TypeformAPIClient', () => {
  beforeEach(() => {
    logActionMock.mockClear();
  });

  it('requests the form responses endpoint with bearer auth and no body', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(result.success).toBe(true);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe(`${DEFAULT_TYPEFORM_URL}/forms/abc123/responses`);
    expect(calls[0].init?.method).toBe('GET');
    expect(calls[0].init?.body).toBeUndefined();

    const headers = new Headers(calls[0].init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('accept')).toBe('application/json');
  });

  it('asks for a single response after the given cursor', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    await client.fetchResponsesAfter('tok_xyz');

    expect(calls[0].url).toBe('https://api.typeform.com/forms/abc123/responses?after=tok_xyz&page_size=1');
  });

  it('sends requests to a configured base URL', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', {
      baseURL: 'http://localhost:4010/',
      fetch: fetchImpl,
    });

    await client.fetchResponses();
    await client.fetchResponsesAfter('resp-a');

    expect(calls.map(call => call.url)).toEqual([
      'http://localhost:4010/forms/abc123/responses',
      'http://localhost:4010/forms/abc123/responses?after=resp-a&page_size=1',
    ]);
  });

  it('decodes the body into the paged collection', async () => {
    const { fetchImpl } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    if (!result.success) {
      throw result.error;
    }
    expect(result.statusCode).toBe(200);
    expect(result.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(result.data.total_items).toBe(2);
    expect(result.data.items.map(item => item.token)).toEqual(['resp-a']);
    expect(result.data.items[0].answers?.[0].boolean).toBe(true);
  });

  it('reports provider errors with their status and code', async () => {
    const { fetchImpl } = stubFetch(() =>
      jsonResponse(
        { code: 'AUTHENTICATION_FAILED', description: 'Authentication credentials not found' },
        { status: 401, statusText: 'Unauthorized' },
      ),
    );
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    if (result.success) {
      throw new Error('expected the request to fail');
    }
    expect(result.statusCode).toBe(401);
    expect(result.error).toBeInstanceOf(ApiError);
    expect(result.error.kind).toBe('api');
    expect(result.error.message).toBe('HTTP 401: AUTHENTICATION_FAILED (Authentication credentials not found)');
    if (result.error instanceof ApiError) {
      expect(result.error.code).toBe('AUTHENTICATION_FAILED');
      expect(result.error.statusCode).toBe(401);
    }
  });

  it('falls back to the status text when the error body has no provider code', async () => {
    const { fetchImpl } = stubFetch(() => new Response('upstream unavailable', { status: 502, statusText: 'Bad Gateway' }));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponsesAfter('resp-a');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.statusCode).toBe(502);
      expect(result.error.message).toBe('HTTP 502: Bad Gateway');
    }
  });

  it('surfaces a failed send as a transport error', async () => {
    const client = new TypeformAPIClient('abc123', 'test-token', {
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const result = await client.fetchResponses();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.statusCode).toBe(0);
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Failed to send get request: fetch failed');
      expect(result.error.cause).toBeInstanceOf(TypeError);
    }
  });

  it('surfaces a body that cannot be read as a transport error', async () => {
    const { fetchImpl } = stubFetch(
      () =>
        new Response(
          new ReadableStream({
            pull(controller) {
              controller.error(new Error('socket hang up'));
            },
          }),
          { status: 200 },
        ),
    );
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('transport');
      expect(result.statusCode).toBe(200);
    }
  });

  it('aborts a request that outlives the configured timeout', async () => {
    const client = new TypeformAPIClient('abc123', 'test-token', {
      timeoutMs: 10,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('no abort signal was passed'));
            return;
          }
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    });

    const result = await client.fetchResponses();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TransportError);
    }
  });

  it('surfaces a body that does not match the collection shape as a decode error', async () => {
    const { fetchImpl } = stubFetch(() => jsonResponse({ items: [{ token: 'resp-a' }] }));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof DecodeError) {
      expect(result.statusCode).toBe(200);
      expect(result.error.issues).toEqual([
        'items.0.landed_at: Required',
        'items.0.submitted_at: Required',
        'items.0.metadata: Required',
        'items.0.calculated: Required',
      ]);
    } else {
      throw new Error('expected a decode error');
    }
  });

  it('surfaces a body that is not JSON as a decode error', async () => {
    const { fetchImpl } = stubFetch(() => new Response('<html>maintenance</html>', { status: 200 }));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(DecodeError);
    }
  });

  it('checks answers against their type when configured to', async () => {
    const mismatched = {
      items: [
        {
          ...responsesBody.items[0],
          answers: [{ field: { id: 'fld_q', type: 'yes_no', ref: 'q_ref' }, type: 'boolean', text: 'yes' }],
        },
      ],
    };
    const { fetchImpl } = stubFetch(() => jsonResponse(mismatched));
    const lenient = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });
    const strict = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl, strictAnswers: true });

    expect((await lenient.fetchResponses()).success).toBe(true);

    const result = await strict.fetchResponses();
    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof DecodeError) {
      expect(result.error.issues).toEqual(['items.0.answers.0: field fld_q: missing boolean']);
    } else {
      throw new Error('expected a decode error');
    }
  });

  it('fails to build a request for a malformed base URL without sending it', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', { baseURL: 'not a url', fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(calls).toHaveLength(0);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.statusCode).toBe(0);
      expect(result.error).toBeInstanceOf(RequestBuildError);
    }
  });

  it('fails to build a request for a token that is not a valid header value', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'bad\ntoken', { fetch: fetchImpl });

    const result = await client.fetchResponses();

    expect(calls).toHaveLength(0);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('request_build');
    }
  });

  it('logs each successful fetch with its form, counts and timing', async () => {
    const { fetchImpl } = stubFetch(() => jsonResponse(responsesBody));
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    await client.fetchResponses();

    expect(logActionMock).toHaveBeenCalledTimes(1);
    expect(logActionMock).toHaveBeenCalledWith({
      type: 'typeform.responses.fetched',
      message: 'Fetched 1 Typeform response(s) for form abc123',
      attributes: {
        formId: 'abc123',
        after: undefined,
        statusCode: 200,
        itemCount: 1,
        totalItems: 2,
        durationMs: expect.any(Number),
      },
    });
    expect(logActionMock.mock.calls[0][0].severity).toBeUndefined();
  });

  it('logs a failed fetch as a warning with the error kind and cursor', async () => {
    const { fetchImpl } = stubFetch(() =>
      jsonResponse(
        { code: 'AUTHENTICATION_FAILED', description: 'Authentication credentials not found' },
        { status: 401, statusText: 'Unauthorized' },
      ),
    );
    const client = new TypeformAPIClient('abc123', 'test-token', { fetch: fetchImpl });

    await client.fetchResponsesAfter('resp-a');

    expect(logActionMock).toHaveBeenCalledTimes(1);
    expect(logActionMock).toHaveBeenCalledWith({
      type: 'typeform.responses.failed',
      severity: 'warn',
      message:
        'Typeform responses request for form abc123 failed: HTTP 401: AUTHENTICATION_FAILED (Authentication credentials not found)',
      attributes: {
        formId: 'abc123',
        after: 'resp-a',
        statusCode: 401,
        errorKind: 'api',
        durationMs: expect.any(Number),
      },
    });
  });
});
