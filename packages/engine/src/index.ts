export { Airdrop } from './airdrop.js';
export type { AirdropConfig } from './airdrop.js';
export { ClaimEngine, ClaimRequestSchema } from './claim.js';
export type { ClaimEngineConfig, ClaimReceipt, ClaimRequest, ClaimRequestInput } from './claim.js';
export { EventBus } from './events.js';
export type { AirdropEvent, AirdropListener } from './events.js';
export { StateSnapshotSchema, toStateSnapshot, fromStateSnapshot } from './snapshot.js';
export type { StateSnapshot } from './snapshot.js';
export { JsonFileStore } from './store.js';
