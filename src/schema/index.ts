// src/schema/index.ts

export * from './target';
export type * from './rule';
export * from './config';
export type * from './state';
