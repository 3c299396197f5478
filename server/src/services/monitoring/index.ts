export { Scheduler } from './Scheduler';
export type { SchedulerOptions } from './Scheduler';
export { StateTracker } from './StateTracker';
export type { StateTrackerOptions, HistoryQuery } from './StateTracker';
export { ConcurrencyLimiter } from './ConcurrencyLimiter';
export * from './types';
