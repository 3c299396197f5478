export { formatCheck, formatCheckStats, formatServiceStatus, formatServiceDetail } from './serviceFormatter';
export { formatReloadChanges } from './reloadFormatter';
export { formatNotifier } from './notifierFormatter';
export * from './types';
