import type { ConfigIssue, KindParams } from '../config/types';
import { ConflictError, ValidationError } from './errors';
import { addError, joinPath } from './validation';

/**
 * One entry of a tagged dispatch table: validates the params of a kind
 * and builds the instance for a spec of that kind.
 */
export interface KindDefinition<TSpec, TInstance> {
  kind: string;
  validate(params: KindParams, path: string): ConfigIssue[];
  create(spec: TSpec): TInstance;
}

/**
 * Dispatch table keyed by the `kind` tag of a spec. Probe and notifier
 * kinds are resolved here once, when a configuration is loaded.
 */
export class KindRegistry<TSpec extends { name: string; kind: string }, TInstance> {
  private definitions: Map<string, KindDefinition<TSpec, TInstance>> = new Map();

  constructor(
    private readonly label: string,
    definitions: KindDefinition<TSpec, TInstance>[] = [],
  ) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: KindDefinition<TSpec, TInstance>): this {
    if (this.definitions.has(definition.kind)) {
      throw new ConflictError(`${this.label} kind "${definition.kind}" is already registered`);
    }
    this.definitions.set(definition.kind, definition);
    return this;
  }

  has(kind: string): boolean {
    return this.definitions.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.definitions.keys()).sort();
  }

  /**
   * Validate the params of an entry. `path` locates the entry itself,
   * e.g. `services.cache-a`; param issues are reported under `path.params`.
   */
  validate(kind: string, params: KindParams, path: string): ConfigIssue[] {
    const definition = this.definitions.get(kind);
    if (!definition) {
      const issues: ConfigIssue[] = [];
      addError(
        issues,
        joinPath(path, 'kind'),
        `Unknown ${this.label} kind "${kind}". Supported kinds: ${this.kinds().join(', ')}`,
      );
      return issues;
    }
    return definition.validate(params, joinPath(path, 'params'));
  }

  create(spec: TSpec): TInstance {
    const definition = this.definitions.get(spec.kind);
    if (!definition) {
      throw new ValidationError(`Unknown ${this.label} kind "${spec.kind}" for "${spec.name}"`, 'kind');
    }
    return definition.create(spec);
  }
}
