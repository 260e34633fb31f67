export const name = '@foundry/shared';

export * from './types/events';
export * from './types/commands';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './config/schema';
export * from './config/validation';
