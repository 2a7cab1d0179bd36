import { log } from '../log';
import { computeBackoffMs, sleep, type BackoffShape } from '../retry';
import { GatewayError } from '../survey/errors';
import type { TelnyxRequestOptions } from './types';

export interface TelnyxPreparedRequest {
  url: string;
  options: TelnyxRequestOptions & { headers: Record<string, string>; method: string };
}

export interface TelnyxClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Extra fields merged into every log line. */
  logContext?: Record<string, unknown>;
  sleep?: (ms: number) => Promise<void>;
}

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2/';
const USER_AGENT = 'voice-survey-runtime/0.1.0';

// keep small; call-control is latency-sensitive
const RETRY_BACKOFF: BackoffShape = { baseMs: 250, maxMs: 1500, jitterMs: 120 };

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function truncateForLog(value: unknown, max = 800): string {
  const s = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  if (s.length <= max) return s;
  return `${s.slice(0, max)}...(truncated)`;
}

function isCallEndedResponse(status: number, body: unknown): boolean {
  if (status !== 422) {
    return false;
  }
  return /already ended|no longer active/i.test(truncateForLog(body, 4000));
}

async function safeReadBody(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json') && text.trim() !== '') {
    try {
      return JSON.parse(text);
    } catch (error) {
      log.debug({ event: 'telnyx_body_not_json', err: error }, 'telnyx body is not valid json');
    }
  }
  return text;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

/**
 * Thin Telnyx v2 REST client: bearer auth, per-request timeout, bounded
 * retries on 429/5xx and network errors. Call-control commands against a
 * call that has already ended resolve instead of throwing.
 */
export class TelnyxClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly logContext: Record<string, unknown>;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: TelnyxClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? TELNYX_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.maxRetries = options.maxRetries ?? 2;
    this.logContext = options.logContext ?? {};
    this.wait = options.sleep ?? sleep;
  }

  public buildRequest(path: string, options: TelnyxRequestOptions = {}): TelnyxPreparedRequest {
    const url = new URL(path.replace(/^\//, ''), this.baseUrl).toString();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...options.headers,
    };

    if (options.body && !('Content-Type' in headers) && !('content-type' in headers)) {
      headers['Content-Type'] = 'application/json';
    }

    return {
      url,
      options: {
        ...options,
        method: options.method ?? 'GET',
        headers,
      },
    };
  }

  public async request(path: string, options: TelnyxRequestOptions = {}): Promise<unknown> {
    return this.requestWithRetry(path, options, 0, false);
  }

  /** POST /calls/{id}/actions/{action}. */
  public async callControl(
    callControlId: string,
    action: string,
    body?: Record<string, unknown>,
    context: Record<string, unknown> = {},
  ): Promise<unknown> {
    const payload = body && Object.keys(body).length > 0 ? JSON.stringify(body) : undefined;
    log.info(
      {
        event: 'telnyx_call_control_request',
        action,
        call_control_id: callControlId,
        telnyx_api_key_fingerprint: maskTelnyxKey(this.apiKey),
        ...this.logContext,
        ...context,
      },
      'telnyx call-control request',
    );
    return this.requestWithRetry(
      `calls/${encodeURIComponent(callControlId)}/actions/${action}`,
      { method: 'POST', body: payload },
      0,
      true,
      { action, call_control_id: callControlId, ...context },
    );
  }

  private async requestWithRetry(
    path: string,
    options: TelnyxRequestOptions,
    attempt: number,
    callControl: boolean,
    context: Record<string, unknown> = {},
  ): Promise<unknown> {
    const prepared = this.buildRequest(path, options);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();
    const logFields = { url: prepared.url, attempt, ...this.logContext, ...context };
    const action = typeof context.action === 'string' ? context.action : prepared.options.method;

    let response: Response;
    try {
      response = await fetch(prepared.url, {
        method: prepared.options.method,
        headers: prepared.options.headers,
        body: prepared.options.body,
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      // an abort means Telnyx is slow or the timeout is too low; do not pile on
      if (!isAbortError(error) && attempt < this.maxRetries) {
        const waitMs = computeBackoffMs(RETRY_BACKOFF, attempt + 1);
        log.warn({ event: 'telnyx_request_error_retry', wait_ms: waitMs, err: error, ...logFields }, 'telnyx request error retry');
        await this.wait(waitMs);
        return this.requestWithRetry(path, options, attempt + 1, callControl, context);
      }
      log.error({ event: 'telnyx_request_error', err: error, ...logFields }, 'telnyx request error');
      throw new GatewayError(action, isAbortError(error) ? `timed out after ${this.timeoutMs}ms` : String(error), {
        url: prepared.url,
      });
    }

    try {
      const body = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (response.ok) {
        log.info(
          { event: 'telnyx_request_completed', status: response.status, duration_ms: durationMs, ...logFields },
          'telnyx request completed',
        );
        return body;
      }

      const logBody = truncateForLog(body, 1000);

      if (callControl && isCallEndedResponse(response.status, body)) {
        log.warn(
          { event: 'telnyx_call_control_ignored_post_end', status: response.status, body: logBody, ...logFields },
          'telnyx call-control ignored post end',
        );
        return body;
      }

      if (shouldRetry(response.status) && attempt < this.maxRetries) {
        const waitMs = computeBackoffMs(RETRY_BACKOFF, attempt + 1);
        log.warn(
          { event: 'telnyx_request_retry', status: response.status, wait_ms: waitMs, body: logBody, ...logFields },
          'telnyx request retry',
        );
        await this.wait(waitMs);
        return this.requestWithRetry(path, options, attempt + 1, callControl, context);
      }

      log.error(
        { event: 'telnyx_request_failed', status: response.status, duration_ms: durationMs, body: logBody, ...logFields },
        'telnyx request failed',
      );
      throw new GatewayError(action, `${response.status} ${truncateForLog(body, 1200)}`, {
        status: response.status,
        url: prepared.url,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
