import type { NotifierSpec } from '../../config/types';
import type { FormattedNotifier } from './types';

/** Params are left out: they carry URLs and tokens. */
export function formatNotifier(spec: NotifierSpec): FormattedNotifier {
  return {
    name: spec.name,
    kind: spec.kind,
    maxConcurrent: spec.maxConcurrent ?? null,
    retry: { ...spec.retry },
  };
}
