export type ConfigIssueSeverity = 'error' | 'warning';

export interface ConfigIssue {
  severity: ConfigIssueSeverity;
  /** Dotted location of the offending entry, e.g. `services.cache-a.interval_ms`. */
  path: string;
  message: string;
}

/** Probe or channel parameters, validated by the kind that owns them. */
export type KindParams = Readonly<Record<string, unknown>>;

export interface ServiceSpec {
  name: string;
  kind: string;
  params: KindParams;
  intervalMs: number;
  timeoutMs: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  deliveryTimeoutMs: number;
}

export interface NotifierTemplates {
  subject?: string;
  body: string;
}

export interface NotifierSpec {
  name: string;
  kind: string;
  params: KindParams;
  templates: NotifierTemplates;
  retry: RetryPolicy;
  /** Ceiling on concurrent deliveries through this notifier; unbounded when absent. */
  maxConcurrent?: number;
}

export interface GlobalSettings {
  defaultIntervalMs: number;
  defaultTimeoutMs: number;
  maxConcurrentProbes: number;
  historySize: number;
  /** Consecutive non-UP outcomes required before an UP service is marked down. */
  failureThreshold: number;
  /** Suppress repeated alerts for the same service and state; 0 disables. */
  alertCooldownMs: number;
  shutdownGraceMs: number;
  deliveryLogSize: number;
}

export interface MonitorConfig {
  global: GlobalSettings;
  services: ReadonlyMap<string, ServiceSpec>;
  notifiers: ReadonlyMap<string, NotifierSpec>;
  /** sha256 of the source text the config was parsed from. */
  hash: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: MonitorConfig | null;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  defaultIntervalMs: 30_000,
  defaultTimeoutMs: 5_000,
  maxConcurrentProbes: 10,
  historySize: 100,
  failureThreshold: 1,
  alertCooldownMs: 0,
  shutdownGraceMs: 5_000,
  deliveryLogSize: 200,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1_000,
  backoffMultiplier: 2,
  maxDelayMs: 60_000,
  deliveryTimeoutMs: 10_000,
};

export const DEFAULT_SUBJECT_TEMPLATE = '[{{new_state}}] {{service_name}}';

export const DEFAULT_BODY_TEMPLATE =
  'Service {{service_name}} ({{service_kind}}) changed from {{old_state}} to {{new_state}} at {{timestamp}}. '
  + 'Latency: {{latency_ms}}ms. Error: {{error_message}}';
