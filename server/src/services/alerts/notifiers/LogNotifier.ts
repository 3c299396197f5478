import type { Logger } from 'pino';
import type { ConfigIssue, KindParams, NotifierSpec } from '../../../config/types';
import { addError, joinPath, stringParam } from '../../../utils/validation';
import { componentLogger } from '../../../utils/logger';
import type { DeliveryResult, Notifier, NotifierDefinition, RenderedMessage } from '../types';

const LEVELS = ['info', 'warn', 'error'] as const;
type LogNotifierLevel = (typeof LEVELS)[number];

function isLevel(value: unknown): value is LogNotifierLevel {
  return typeof value === 'string' && LEVELS.some(level => level === value);
}

/**
 * Writes alerts to the process log. Useful as a fallback channel and for
 * trying out templates.
 */
export class LogNotifier implements Notifier {
  readonly kind = 'log';

  constructor(
    private readonly name: string,
    private readonly level: LogNotifierLevel,
    private readonly log: Logger = componentLogger('notifier:log'),
  ) {}

  async deliver(message: RenderedMessage): Promise<DeliveryResult> {
    this.log[this.level]({ notifier: this.name, subject: message.subject, body: message.body }, 'alert');
    return { success: true };
  }
}

function validateLogParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (params.level !== undefined && !isLevel(params.level)) {
    addError(issues, joinPath(path, 'level'), `level must be one of ${LEVELS.join(', ')}`);
  }
  return issues;
}

export const logNotifier: NotifierDefinition = {
  kind: 'log',
  validate: validateLogParams,
  create: (spec: NotifierSpec) => {
    const level = stringParam(spec.params, 'level', 'warn');
    return new LogNotifier(spec.name, isLevel(level) ? level : 'warn');
  },
};
