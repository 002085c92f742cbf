import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidProofError, isFieldElement } from '@semdrop/core';
import type { Proof, ProofVerifier, VerificationRequest } from './proof.js';
import type { GroupRoots } from './groups.js';

export type VerificationKey = Record<string, unknown>;

export type Groth16Backend = (
  verificationKey: VerificationKey,
  publicSignals: string[],
  proof: Proof
) => Promise<boolean>;

const VerificationKeySchema = z.record(z.unknown());

export const snarkjsBackend: Groth16Backend = async (verificationKey, publicSignals, proof) => {
  const snarkjs = await import('snarkjs');
  return snarkjs.groth16.verify(verificationKey, publicSignals, proof);
};

export interface Groth16VerifierConfig {
  groups: GroupRoots;
  verificationKeyPath?: string;
  verificationKey?: VerificationKey;
  backend?: Groth16Backend;
}

/**
 * Public signals in the order the membership circuit exposes them.
 */
export function toPublicSignals(request: Omit<VerificationRequest, 'proof' | 'groupId'>): string[] {
  return [request.root, request.nullifierHash, request.signal, request.externalNullifier].map(
    (value) => value.toString()
  );
}

export async function loadVerificationKey(path: string): Promise<VerificationKey> {
  const content = await readFile(path, 'utf8');
  return VerificationKeySchema.parse(JSON.parse(content));
}

export class Groth16Verifier implements ProofVerifier {
  private groups: GroupRoots;
  private backend: Groth16Backend;
  private keyLoader: () => Promise<VerificationKey>;
  private verificationKey: VerificationKey | undefined;

  constructor(config: Groth16VerifierConfig) {
    const { verificationKey, verificationKeyPath } = config;
    if (verificationKey) {
      this.keyLoader = async () => verificationKey;
    } else if (verificationKeyPath) {
      this.keyLoader = () => loadVerificationKey(verificationKeyPath);
    } else {
      throw new Error('Groth16Verifier needs a verificationKey or a verificationKeyPath');
    }
    this.groups = config.groups;
    this.backend = config.backend ?? snarkjsBackend;
  }

  async verify(request: VerificationRequest): Promise<void> {
    if (!this.groups.hasRoot(request.groupId, request.root)) {
      throw new InvalidProofError(`Unknown root for group ${request.groupId}`);
    }

    const signals = [request.root, request.nullifierHash, request.signal, request.externalNullifier];
    if (!signals.every(isFieldElement)) {
      throw new InvalidProofError('Public signal outside the scalar field');
    }

    const key = await this.getVerificationKey();
    let valid: boolean;
    try {
      valid = await this.backend(key, toPublicSignals(request), request.proof);
    } catch (error) {
      throw new InvalidProofError('Proof could not be verified', { cause: error });
    }
    if (!valid) {
      throw new InvalidProofError();
    }
  }

  private async getVerificationKey(): Promise<VerificationKey> {
    if (!this.verificationKey) {
      this.verificationKey = await this.keyLoader();
    }
    return this.verificationKey;
  }
}
