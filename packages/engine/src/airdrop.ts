import {
  AddressSchema,
  AirdropParamsSchema,
  AirdropRecordSchema,
  FieldElementSchema,
  SerialQueue,
  UintSchema,
  type Address,
  type AirdropParamsInput,
  type AirdropRecord,
  type AirdropRecordInput,
} from '@semdrop/core';
import { NullifierLedger } from '@semdrop/ledger';
import { AirdropRegistry } from '@semdrop/registry';
import type { TokenTransferAdapter } from '@semdrop/token';
import type { ProofVerifier } from '@semdrop/verifier';
import { ClaimEngine, ClaimRequestSchema, type ClaimReceipt, type ClaimRequestInput } from './claim.js';
import { EventBus, type AirdropListener } from './events.js';
import { fromStateSnapshot, toStateSnapshot, type StateSnapshot } from './snapshot.js';

export interface AirdropConfig {
  contract: string;
  verifier: ProofVerifier;
  transfer: TokenTransferAdapter;
  registry?: AirdropRegistry;
  ledger?: NullifierLedger;
}

type UintInput = bigint | number | string;

/**
 * Caller-facing airdrop service. State-changing calls run one at a time, so
 * a claim sees one consistent record and two claims with the same nullifier
 * cannot both pass the replay check.
 */
export class Airdrop {
  readonly contract: Address;
  private registry: AirdropRegistry;
  private ledger: NullifierLedger;
  private engine: ClaimEngine;
  private events: EventBus = new EventBus();
  private queue: SerialQueue = new SerialQueue();

  constructor(config: AirdropConfig) {
    this.contract = AddressSchema.parse(config.contract);
    this.registry = config.registry ?? new AirdropRegistry();
    this.ledger = config.ledger ?? new NullifierLedger();
    this.engine = new ClaimEngine({
      contract: this.contract,
      registry: this.registry,
      ledger: this.ledger,
      verifier: config.verifier,
      transfer: config.transfer,
      events: this.events,
    });
  }

  async createAirdrop(caller: string, params: AirdropParamsInput): Promise<bigint> {
    const manager = AddressSchema.parse(caller);
    const parsed = AirdropParamsSchema.parse(params);

    return this.queue.run(() => {
      const { id, record } = this.registry.create(manager, parsed);
      this.events.publish({ type: 'AirdropCreated', airdropId: id, airdrop: record });
      return id;
    });
  }

  async claim(request: ClaimRequestInput): Promise<ClaimReceipt> {
    const parsed = ClaimRequestSchema.parse(request);
    return this.queue.run(() => this.engine.claim(parsed));
  }

  async updateDetails(caller: string, airdropId: UintInput, record: AirdropRecordInput): Promise<AirdropRecord> {
    const sender = AddressSchema.parse(caller);
    const id = UintSchema.parse(airdropId);
    const parsed = AirdropRecordSchema.parse(record);

    return this.queue.run(() => {
      const updated = this.registry.update(sender, id, parsed);
      this.events.publish({ type: 'AirdropUpdated', airdropId: id, airdrop: updated });
      return updated;
    });
  }

  getAirdrop(airdropId: UintInput): AirdropRecord | undefined {
    return this.registry.get(UintSchema.parse(airdropId));
  }

  isNullifierUsed(nullifierHash: UintInput): boolean {
    return this.ledger.isUsed(FieldElementSchema.parse(nullifierHash));
  }

  get nextId(): bigint {
    return this.registry.nextId;
  }

  on(listener: AirdropListener): () => void {
    return this.events.on(listener);
  }

  /**
   * Snapshot taken between operations, never in the middle of a claim.
   */
  async snapshot(): Promise<StateSnapshot> {
    return this.queue.run(() => toStateSnapshot(this.registry, this.ledger));
  }

  static restore(snapshot: StateSnapshot, config: Omit<AirdropConfig, 'registry' | 'ledger'>): Airdrop {
    const { registry, ledger } = fromStateSnapshot(snapshot);
    return new Airdrop({ ...config, registry, ledger });
  }
}
