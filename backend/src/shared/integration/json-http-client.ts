/**
 * src/shared/integration/json-http-client.ts
 *
 * WHY:
 * - The tenant and users services speak the same JSON dialect:
 *     { "success": boolean, "message": string, "data": <payload> }
 * - One client turns that dialect into typed values or DependencyErrors,
 *   so directory clients only describe paths and payload schemas.
 *
 * RULES:
 * - undici `request` only (no global fetch); a Dispatcher can be injected (tests use MockAgent).
 * - Every call has headers/body timeouts.
 * - The response body is always consumed, even on error statuses.
 * - Payloads are validated with zod; anything unexpected is `invalid_response`.
 */

import { request, type Dispatcher } from 'undici';
import { z } from 'zod';

import { DependencyError, type DependencyName } from './dependency-error';

const EnvelopeSchema = z.object({
  success: z.boolean(),
  message: z.string().nullish(),
  data: z.unknown().optional(),
});

export type JsonHttpClientOptions = {
  baseUrl: string;
  dependency: DependencyName;
  timeoutMs: number;
  dispatcher?: Dispatcher;
};

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type RawResponse = { status: number; payload: unknown };

export class JsonHttpClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: JsonHttpClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Sends a request and returns the envelope's `data`, parsed with `schema`.
   */
  async call<T>(params: {
    method: 'GET' | 'POST';
    path: string;
    body?: unknown;
    schema: PayloadSchema<T>;
  }): Promise<T> {
    const raw = await this.send(params.method, params.path, params.body);
    return this.unwrap(raw, params.schema);
  }

  /**
   * GET that maps 404 to null ("no such record").
   */
  async find<T>(path: string, schema: PayloadSchema<T>): Promise<T | null> {
    const raw = await this.send('GET', path);
    if (raw.status === 404) return null;
    return this.unwrap(raw, schema);
  }

  private async send(method: 'GET' | 'POST', path: string, body?: unknown): Promise<RawResponse> {
    let res: Dispatcher.ResponseData;
    try {
      res = await request(`${this.baseUrl}${path}`, {
        method,
        headers: {
          accept: 'application/json',
          ...(body === undefined ? {} : { 'content-type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        headersTimeout: this.opts.timeoutMs,
        bodyTimeout: this.opts.timeoutMs,
        dispatcher: this.opts.dispatcher,
      });
    } catch (err: unknown) {
      throw new DependencyError({
        dependency: this.opts.dependency,
        kind: 'unavailable',
        message: `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }

    const text = await res.body.text();
    let payload: unknown = null;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    return { status: res.statusCode, payload };
  }

  private unwrap<T>(raw: RawResponse, schema: PayloadSchema<T>): T {
    const envelope = EnvelopeSchema.safeParse(raw.payload);
    const downstreamMessage = envelope.success ? (envelope.data.message ?? null) : null;

    if (raw.status >= 500) {
      throw this.fail('unavailable', raw.status, downstreamMessage ?? `HTTP ${raw.status}`);
    }
    if (raw.status === 409) {
      throw this.fail('conflict', raw.status, downstreamMessage ?? 'Conflict');
    }
    if (raw.status >= 400) {
      throw this.fail('rejected', raw.status, downstreamMessage ?? `HTTP ${raw.status}`);
    }
    if (!envelope.success) {
      throw this.fail('invalid_response', raw.status, 'Response is not a JSON envelope');
    }
    if (!envelope.data.success) {
      throw this.fail('rejected', raw.status, downstreamMessage ?? 'Request was not successful');
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw this.fail('invalid_response', raw.status, 'Response data has an unexpected shape');
    }
    return data.data;
  }

  private fail(kind: DependencyError['kind'], status: number, message: string): DependencyError {
    return new DependencyError({ dependency: this.opts.dependency, kind, status, message });
  }
}
