import type { KindDefinition, KindRegistry } from '../../utils/KindRegistry';
import type { NotifierSpec } from '../../config/types';

/**
 * Subject and body rendered from a notifier's templates for one transition.
 */
export interface RenderedMessage {
  subject: string;
  body: string;
  /** Set when the body template is a JSON object, so the body parses as JSON. */
  json: boolean;
}

/**
 * Result of one delivery attempt through a channel.
 */
export interface DeliveryResult {
  success: boolean;
  error?: string;
  /** Channel asked the caller to back off for at least this long. */
  retryAfterMs?: number;
}

/**
 * A configured delivery channel. Implementations must stop work when
 * `signal` aborts.
 */
export interface Notifier {
  readonly kind: string;
  deliver(message: RenderedMessage, signal: AbortSignal): Promise<DeliveryResult>;
}

export type NotifierDefinition = KindDefinition<NotifierSpec, Notifier>;

export type NotifierRegistry = KindRegistry<NotifierSpec, Notifier>;

export enum DispatcherEventType {
  ATTEMPT = 'delivery:attempt',
  COMPLETE = 'delivery:complete',
  SUPPRESSED = 'delivery:suppressed',
}

export interface DeliveryAttempt {
  notifier: string;
  service: string;
  transitionId: string;
  attempt: number;
  success: boolean;
  error?: string;
  durationMs: number;
}

export interface DeliveryRecord {
  notifier: string;
  service: string;
  transitionId: string;
  success: boolean;
  attempts: number;
  error?: string;
  completedAt: string;
}

export interface DeliverySuppressedEvent {
  service: string;
  transitionId: string;
  newState: string;
  cooldownMs: number;
}
