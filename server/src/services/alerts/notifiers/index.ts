import { KindRegistry } from '../../../utils/KindRegistry';
import type { NotifierSpec } from '../../../config/types';
import type { Notifier, NotifierDefinition, NotifierRegistry } from '../types';
import { webhookNotifier } from './WebhookNotifier';
import { slackNotifier } from './SlackNotifier';
import { logNotifier } from './LogNotifier';

export const BUILTIN_NOTIFIERS: readonly NotifierDefinition[] = [webhookNotifier, slackNotifier, logNotifier];

export function createNotifierRegistry(extra: NotifierDefinition[] = []): NotifierRegistry {
  return new KindRegistry<NotifierSpec, Notifier>('notifier', [...BUILTIN_NOTIFIERS, ...extra]);
}

export { WebhookNotifier } from './WebhookNotifier';
export { SlackNotifier } from './SlackNotifier';
export { LogNotifier } from './LogNotifier';
