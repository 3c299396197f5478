import type { ConfigIssue, KindParams, NotifierSpec } from '../../../config/types';
import {
  addError,
  headersParam,
  isNonEmptyString,
  isStringRecord,
  isValidUrl,
  joinPath,
  stringParam,
} from '../../../utils/validation';
import { describeFetchError, parseRetryAfter, truncate } from '../../../utils/http';
import type { DeliveryResult, Notifier, NotifierDefinition, RenderedMessage } from '../types';

const VALID_METHODS = ['POST', 'PUT', 'PATCH'];

interface WebhookConfig {
  url: string;
  method: string;
  headers: Record<string, string>;
  contentType?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Posts the rendered body to an arbitrary HTTP endpoint. JSON templates
 * go out as application/json, anything else as plain text.
 *
 * Chat-bot style endpoints answer 200 with an `errcode` field; a non-zero
 * code is treated as a failed delivery.
 */
export class WebhookNotifier implements Notifier {
  readonly kind = 'webhook';

  constructor(private readonly config: WebhookConfig) {}

  async deliver(message: RenderedMessage, signal: AbortSignal): Promise<DeliveryResult> {
    const headers: Record<string, string> = {
      'Content-Type': this.config.contentType ?? (message.json ? 'application/json' : 'text/plain; charset=utf-8'),
      ...this.config.headers,
    };

    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: this.config.method,
        headers,
        body: message.body,
        signal,
      });
    } catch (err: unknown) {
      if (signal.aborted) throw err;
      return { success: false, error: `Webhook request failed: ${describeFetchError(err)}` };
    }

    const text = await response.text();

    if (!response.ok) {
      const result: DeliveryResult = {
        success: false,
        error: `Webhook returned ${response.status}: ${truncate(text)}`,
      };
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
      if (response.status === 429 && retryAfterMs !== undefined) {
        result.retryAfterMs = retryAfterMs;
      }
      return result;
    }

    return this.checkApplicationError(text);
  }

  private checkApplicationError(text: string): DeliveryResult {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return { success: true };
    }

    if (isRecord(body) && 'errcode' in body && body.errcode !== 0) {
      const detail = typeof body.errmsg === 'string' ? body.errmsg : 'unknown error';
      return { success: false, error: `Webhook rejected the message: errcode=${String(body.errcode)}, errmsg=${detail}` };
    }
    return { success: true };
  }
}

function validateWebhookParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!isNonEmptyString(params.url)) {
    addError(issues, joinPath(path, 'url'), 'url is required');
  } else if (!isValidUrl(params.url)) {
    addError(issues, joinPath(path, 'url'), `url must be a valid HTTP or HTTPS URL, got "${params.url}"`);
  }

  if (params.method !== undefined) {
    if (typeof params.method !== 'string' || !VALID_METHODS.includes(params.method.toUpperCase())) {
      addError(issues, joinPath(path, 'method'), `method must be one of ${VALID_METHODS.join(', ')}`);
    }
  }

  if (params.headers !== undefined && !isStringRecord(params.headers)) {
    addError(issues, joinPath(path, 'headers'), 'headers must map header names to strings');
  }

  if (params.content_type !== undefined && !isNonEmptyString(params.content_type)) {
    addError(issues, joinPath(path, 'content_type'), 'content_type must be a non-empty string');
  }

  return issues;
}

export const webhookNotifier: NotifierDefinition = {
  kind: 'webhook',
  validate: validateWebhookParams,
  create: (spec: NotifierSpec) =>
    new WebhookNotifier({
      url: stringParam(spec.params, 'url', ''),
      method: stringParam(spec.params, 'method', 'POST').toUpperCase(),
      headers: headersParam(spec.params),
      contentType: stringParam(spec.params, 'content_type'),
    }),
};
