export * from './errors';
export * from './schemas';
export type * from './types';
export * from './env';
export * from './utils/time';
export * from './time/zone';
export * from './time/instant';
export * from './time/convert';
export * from './time/source';
export * from './time/format';
export * from './time/difference';
export * from './time/parse';
export * from './time/presets';
export * from './time/cities';
