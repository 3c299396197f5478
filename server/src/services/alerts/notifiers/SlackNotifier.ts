import type { ConfigIssue, KindParams, NotifierSpec } from '../../../config/types';
import { addError, isNonEmptyString, isValidUrl, joinPath, stringParam } from '../../../utils/validation';
import { describeFetchError, parseRetryAfter, truncate } from '../../../utils/http';
import { componentLogger } from '../../../utils/logger';
import type { DeliveryResult, Notifier, NotifierDefinition, RenderedMessage } from '../types';

const log = componentLogger('notifier:slack');

interface SlackConfig {
  webhookUrl: string;
  channel?: string;
  username?: string;
  iconEmoji?: string;
}

interface SlackPayload {
  text: string;
  channel?: string;
  username?: string;
  icon_emoji?: string;
}

/**
 * Sends alerts to Slack via incoming webhook. A JSON body template is
 * sent as the payload verbatim (for Block Kit layouts); otherwise the
 * subject becomes a bold first line above the body.
 */
export class SlackNotifier implements Notifier {
  readonly kind = 'slack';

  constructor(private readonly config: SlackConfig) {}

  async deliver(message: RenderedMessage, signal: AbortSignal): Promise<DeliveryResult> {
    let response: Response;
    try {
      response = await fetch(this.config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: message.json ? message.body : JSON.stringify(this.buildPayload(message)),
        signal,
      });
    } catch (err: unknown) {
      if (signal.aborted) throw err;
      return { success: false, error: `Slack webhook request failed: ${describeFetchError(err)}` };
    }

    if (response.ok) {
      return { success: true };
    }

    if (response.status === 429) {
      const retryAfter = response.headers.get('Retry-After');
      log.warn({ retryAfter }, 'slack webhook rate limited');
      return {
        success: false,
        error: `Rate limited by Slack (retry after ${retryAfter || 'unknown'}s)`,
        retryAfterMs: parseRetryAfter(retryAfter),
      };
    }

    const body = await response.text();
    return { success: false, error: `Slack webhook returned ${response.status}: ${truncate(body)}` };
  }

  private buildPayload(message: RenderedMessage): SlackPayload {
    const payload: SlackPayload = {
      text: message.subject ? `*${message.subject}*\n${message.body}` : message.body,
    };
    if (this.config.channel) payload.channel = this.config.channel;
    if (this.config.username) payload.username = this.config.username;
    if (this.config.iconEmoji) payload.icon_emoji = this.config.iconEmoji;
    return payload;
  }
}

function validateSlackParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!isNonEmptyString(params.webhook_url)) {
    addError(issues, joinPath(path, 'webhook_url'), 'webhook_url is required');
  } else if (!isValidUrl(params.webhook_url)) {
    addError(issues, joinPath(path, 'webhook_url'), 'webhook_url must be a valid HTTP or HTTPS URL');
  }

  for (const key of ['channel', 'username', 'icon_emoji']) {
    if (params[key] !== undefined && !isNonEmptyString(params[key])) {
      addError(issues, joinPath(path, key), `${key} must be a non-empty string`);
    }
  }

  return issues;
}

export const slackNotifier: NotifierDefinition = {
  kind: 'slack',
  validate: validateSlackParams,
  create: (spec: NotifierSpec) =>
    new SlackNotifier({
      webhookUrl: stringParam(spec.params, 'webhook_url', ''),
      channel: stringParam(spec.params, 'channel'),
      username: stringParam(spec.params, 'username'),
      iconEmoji: stringParam(spec.params, 'icon_emoji'),
    }),
};
