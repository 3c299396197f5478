export type { IServiceStateStore } from './IServiceStateStore';
export type { ITransitionStore } from './ITransitionStore';
