import type { ConfigDiff } from '../../config/ConfigDiffer';
import type { FormattedReloadChanges } from './types';

export function formatReloadChanges(diff: ConfigDiff): FormattedReloadChanges {
  return {
    servicesAdded: diff.services.toAdd.map(spec => spec.name),
    servicesRemoved: [...diff.services.toRemove],
    servicesUpdated: diff.services.toUpdate.map(update => update.spec.name),
    servicesReset: diff.services.toUpdate.filter(update => update.resetState).map(update => update.spec.name),
    notifiersAdded: diff.notifiers.toAdd.map(spec => spec.name),
    notifiersRemoved: [...diff.notifiers.toRemove],
    notifiersReplaced: diff.notifiers.toReplace.map(spec => spec.name),
    globalChanged: [...diff.globalChanged],
  };
}
