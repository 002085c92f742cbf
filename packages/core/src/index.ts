export * from './errors.js';
export * from './field.js';
export * from './schemas.js';
export * from './queue.js';
export * from './config.js';
export type { Address, Hex } from 'viem';
