import { z } from 'zod';

// snarkjs Groth16 proof as produced by groth16.fullProve
export const ProofSchema = z.object({
  pi_a: z.tuple([z.string(), z.string(), z.string()]),
  pi_b: z.tuple([
    z.tuple([z.string(), z.string()]),
    z.tuple([z.string(), z.string()]),
    z.tuple([z.string(), z.string()]),
  ]),
  pi_c: z.tuple([z.string(), z.string(), z.string()]),
  protocol: z.literal('groth16'),
  curve: z.literal('bn128'),
});

export type Proof = z.infer<typeof ProofSchema>;

export interface VerificationRequest {
  root: bigint;
  groupId: bigint;
  signal: bigint;
  nullifierHash: bigint;
  externalNullifier: bigint;
  proof: Proof;
}

/**
 * Capability the claim engine delegates membership checks to.
 * Resolves on accept, rejects with InvalidProofError on reject.
 */
export interface ProofVerifier {
  verify(request: VerificationRequest): Promise<void>;
}
