import type { GlobalSettings, MonitorConfig, NotifierSpec, ServiceSpec } from './types';

export interface ServiceUpdate {
  spec: ServiceSpec;
  /** Probe-affecting fields changed, so the recorded state no longer applies. */
  resetState: boolean;
}

export interface ConfigDiff {
  services: {
    toAdd: ServiceSpec[];
    toRemove: string[];
    toUpdate: ServiceUpdate[];
    unchanged: string[];
  };
  notifiers: {
    toAdd: NotifierSpec[];
    toRemove: string[];
    toReplace: NotifierSpec[];
    unchanged: string[];
  };
  globalChanged: Array<keyof GlobalSettings>;
}

type ConfigSnapshot = Pick<MonitorConfig, 'global' | 'services' | 'notifiers'>;

// --- Public API ---

/**
 * Compute what must change to go from `current` to `next`.
 * Pure logic; neither snapshot is touched and no live component is consulted.
 */
export function diffConfig(current: ConfigSnapshot, next: ConfigSnapshot): ConfigDiff {
  const diff: ConfigDiff = {
    services: { toAdd: [], toRemove: [], toUpdate: [], unchanged: [] },
    notifiers: { toAdd: [], toRemove: [], toReplace: [], unchanged: [] },
    globalChanged: [],
  };

  for (const [name, spec] of next.services) {
    const existing = current.services.get(name);
    if (!existing) {
      diff.services.toAdd.push(spec);
    } else if (sameService(existing, spec)) {
      diff.services.unchanged.push(name);
    } else {
      diff.services.toUpdate.push({ spec, resetState: probeChanged(existing, spec) });
    }
  }
  for (const name of current.services.keys()) {
    if (!next.services.has(name)) diff.services.toRemove.push(name);
  }

  for (const [name, spec] of next.notifiers) {
    const existing = current.notifiers.get(name);
    if (!existing) {
      diff.notifiers.toAdd.push(spec);
    } else if (stableStringify(existing) === stableStringify(spec)) {
      diff.notifiers.unchanged.push(name);
    } else {
      diff.notifiers.toReplace.push(spec);
    }
  }
  for (const name of current.notifiers.keys()) {
    if (!next.notifiers.has(name)) diff.notifiers.toRemove.push(name);
  }

  for (const key of Object.keys(next.global)) {
    if (isGlobalKey(key, next.global) && current.global[key] !== next.global[key]) {
      diff.globalChanged.push(key);
    }
  }

  return diff;
}

export function isEmptyDiff(diff: ConfigDiff): boolean {
  const { services, notifiers } = diff;
  return services.toAdd.length === 0
    && services.toRemove.length === 0
    && services.toUpdate.length === 0
    && notifiers.toAdd.length === 0
    && notifiers.toRemove.length === 0
    && notifiers.toReplace.length === 0
    && diff.globalChanged.length === 0;
}

// --- Internal helpers ---

function isGlobalKey(key: string, settings: GlobalSettings): key is keyof GlobalSettings {
  return Object.prototype.hasOwnProperty.call(settings, key);
}

function probeChanged(a: ServiceSpec, b: ServiceSpec): boolean {
  return a.kind !== b.kind || stableStringify(a.params) !== stableStringify(b.params);
}

function sameService(a: ServiceSpec, b: ServiceSpec): boolean {
  return !probeChanged(a, b) && a.intervalMs === b.intervalMs && a.timeoutMs === b.timeoutMs;
}

/**
 * JSON with object keys sorted, so that key order in the source file does
 * not count as a change.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return val;
    const sorted: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[k] = v;
    }
    return sorted;
  });
}
