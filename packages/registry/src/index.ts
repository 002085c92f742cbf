import {
  UnauthorizedError,
  sameAddress,
  type Address,
  type AirdropParams,
  type AirdropRecord,
} from '@semdrop/core';

export interface RegistryEntry {
  id: bigint;
  record: AirdropRecord;
}

export interface RegistrySnapshot {
  nextId: bigint;
  entries: RegistryEntry[];
}

const FIRST_ID = 1n;

/**
 * Airdrop records keyed by id. Ids start at 1 and are never reused;
 * 0 means "no such airdrop".
 */
export class AirdropRegistry {
  private records: Map<bigint, AirdropRecord> = new Map();
  private counter: bigint = FIRST_ID;

  /**
   * Store a new record managed by the caller. No field is validated beyond
   * its type; a bad token or an unfunded holder surfaces at claim time.
   */
  create(caller: Address, params: AirdropParams): RegistryEntry {
    const id = this.counter;
    this.counter = id + 1n;

    const record: AirdropRecord = Object.freeze({ ...params, manager: caller });
    this.records.set(id, record);
    return { id, record };
  }

  get(id: bigint): AirdropRecord | undefined {
    return this.records.get(id);
  }

  /**
   * Replace the whole record, manager included. Only the current manager
   * may do this; an unknown id has no manager and always fails.
   */
  update(caller: Address, id: bigint, record: AirdropRecord): AirdropRecord {
    const current = this.records.get(id);
    if (!current || !sameAddress(current.manager, caller)) {
      throw new UnauthorizedError();
    }

    const replacement: AirdropRecord = Object.freeze({ ...record });
    this.records.set(id, replacement);
    return replacement;
  }

  get nextId(): bigint {
    return this.counter;
  }

  entries(): RegistryEntry[] {
    return Array.from(this.records.entries(), ([id, record]) => ({ id, record }));
  }

  snapshot(): RegistrySnapshot {
    return { nextId: this.counter, entries: this.entries() };
  }

  static from(snapshot: RegistrySnapshot): AirdropRegistry {
    const registry = new AirdropRegistry();
    for (const { id, record } of snapshot.entries) {
      if (id < FIRST_ID || id >= snapshot.nextId) {
        throw new Error(`Airdrop id ${id} is outside the assigned range`);
      }
      if (registry.records.has(id)) {
        throw new Error(`Airdrop id ${id} appears more than once`);
      }
      registry.records.set(id, Object.freeze({ ...record }));
    }
    registry.counter = snapshot.nextId < FIRST_ID ? FIRST_ID : snapshot.nextId;
    return registry;
  }
}
