export { AlertDispatcher } from './AlertDispatcher';
export type { AlertDispatcherOptions } from './AlertDispatcher';
export { CooldownTracker } from './CooldownTracker';
export { KeyedSerialQueue } from './KeyedSerialQueue';
export { ExponentialBackoff, RetryState } from './backoff';
export { buildTemplateVariables, isJsonTemplate, renderTemplate } from './TemplateRenderer';
export { BUILTIN_NOTIFIERS, createNotifierRegistry } from './notifiers';
export { DispatcherEventType } from './types';
export type {
  DeliveryAttempt,
  DeliveryRecord,
  DeliveryResult,
  DeliverySuppressedEvent,
  Notifier,
  NotifierDefinition,
  NotifierRegistry,
  RenderedMessage,
} from './types';
