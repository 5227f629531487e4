export type * from './dispatch';
export type * from './events';
