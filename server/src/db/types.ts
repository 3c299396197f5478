// Row shapes as stored; JSON columns hold serialized text.

export interface ServiceStateRow {
  service: string;
  kind: string;
  status: string | null;
  last_transition_at: string | null;
  last_outcome: string | null;
  consecutive_failures: number;
  stats: string;
  updated_at: string;
}

export interface StateTransitionRow {
  id: string;
  service: string;
  kind: string;
  old_state: string | null;
  new_state: string;
  timestamp: string;
  latency_ms: number;
  error: string | null;
  metadata: string;
}
