export { ProofSchema } from './proof.js';
export type { Proof, ProofVerifier, VerificationRequest } from './proof.js';
export { GroupRoots, GroupRootsSnapshotSchema } from './groups.js';
export type { GroupRootsSnapshot } from './groups.js';
export {
  Groth16Verifier,
  loadVerificationKey,
  snarkjsBackend,
  toPublicSignals,
} from './groth16.js';
export type { Groth16Backend, Groth16VerifierConfig, VerificationKey } from './groth16.js';
