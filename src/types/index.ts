export type * from './syntax';
export type * from './semantic';
