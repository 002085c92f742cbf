import { z } from 'zod';
import {
  AddressSchema,
  FieldElementSchema,
  InvalidAirdropError,
  InvalidNullifierError,
  TransferFailedError,
  UintSchema,
  externalNullifier,
  signalHash,
  type Address,
} from '@semdrop/core';
import type { NullifierLedger } from '@semdrop/ledger';
import type { AirdropRegistry } from '@semdrop/registry';
import type { TokenTransferAdapter } from '@semdrop/token';
import { ProofSchema, type ProofVerifier } from '@semdrop/verifier';
import type { AirdropEvent, EventBus } from './events.js';

export const ClaimRequestSchema = z.object({
  airdropId: UintSchema,
  receiver: AddressSchema,
  root: FieldElementSchema,
  nullifierHash: FieldElementSchema,
  proof: ProofSchema,
});

export type ClaimRequest = z.infer<typeof ClaimRequestSchema>;
export type ClaimRequestInput = z.input<typeof ClaimRequestSchema>;

export interface ClaimReceipt {
  airdropId: bigint;
  receiver: Address;
  token: Address;
  holder: Address;
  amount: bigint;
  nullifierHash: bigint;
}

export interface ClaimEngineConfig {
  /** Address of this deployment, mixed into every external nullifier */
  contract: Address;
  registry: AirdropRegistry;
  ledger: NullifierLedger;
  verifier: ProofVerifier;
  transfer: TokenTransferAdapter;
  events: EventBus;
}

export class ClaimEngine {
  constructor(private config: ClaimEngineConfig) {}

  /**
   * Pay out one airdrop claim.
   *
   * Order: replay check, airdrop lookup, signal and scope derivation, proof
   * verification, nullifier mark, transfer. Nothing is written before the
   * proof is accepted, and a failed transfer undoes the nullifier mark and
   * drops the pending Claimed event.
   */
  async claim(request: ClaimRequest): Promise<ClaimReceipt> {
    const { registry, ledger, verifier, transfer, events, contract } = this.config;
    const { airdropId, receiver, root, nullifierHash, proof } = request;

    if (ledger.isUsed(nullifierHash)) {
      throw new InvalidNullifierError();
    }

    // One read: amount, holder and token all come from this snapshot.
    const airdrop = airdropId === 0n ? undefined : registry.get(airdropId);
    if (!airdrop) {
      throw new InvalidAirdropError(`Airdrop ${airdropId} does not exist`);
    }

    await verifier.verify({
      root,
      groupId: airdrop.groupId,
      signal: signalHash(receiver),
      nullifierHash,
      externalNullifier: externalNullifier(contract, airdropId),
      proof,
    });

    // The ledger may have moved while the proof was being verified.
    if (ledger.isUsed(nullifierHash)) {
      throw new InvalidNullifierError();
    }
    const rollback = ledger.markUsed(nullifierHash);
    const pending: AirdropEvent[] = [{ type: 'AirdropClaimed', airdropId, receiver }];

    try {
      await transfer.transferFrom(airdrop.token, airdrop.holder, receiver, airdrop.amount);
    } catch (error) {
      rollback();
      if (error instanceof TransferFailedError) throw error;
      throw new TransferFailedError(
        `Transfer of ${airdrop.amount} from ${airdrop.holder} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }

    events.publish(...pending);

    return {
      airdropId,
      receiver,
      token: airdrop.token,
      holder: airdrop.holder,
      amount: airdrop.amount,
      nullifierHash,
    };
  }
}
