import { z } from 'zod';
import { AirdropRecordSchema, FieldElementSchema, UintSchema, serializeRecord } from '@semdrop/core';
import { NullifierLedger } from '@semdrop/ledger';
import { AirdropRegistry } from '@semdrop/registry';

const DecimalSchema = z.string().regex(/^[0-9]+$/, 'Expected a decimal integer');

export const StateSnapshotSchema = z.object({
  version: z.literal(1),
  nextId: DecimalSchema,
  airdrops: z.array(
    z.object({
      id: DecimalSchema,
      groupId: DecimalSchema,
      token: z.string(),
      manager: z.string(),
      holder: z.string(),
      amount: DecimalSchema,
    })
  ),
  nullifiers: z.array(DecimalSchema),
});

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

export function toStateSnapshot(registry: AirdropRegistry, ledger: NullifierLedger): StateSnapshot {
  return {
    version: 1,
    nextId: registry.nextId.toString(),
    airdrops: registry.entries().map(({ id, record }) => ({
      id: id.toString(),
      ...serializeRecord(record),
    })),
    nullifiers: ledger.list().map((nullifier) => nullifier.toString()),
  };
}

export function fromStateSnapshot(snapshot: StateSnapshot): {
  registry: AirdropRegistry;
  ledger: NullifierLedger;
} {
  const parsed = StateSnapshotSchema.parse(snapshot);
  const registry = AirdropRegistry.from({
    nextId: UintSchema.parse(parsed.nextId),
    entries: parsed.airdrops.map(({ id, ...record }) => ({
      id: UintSchema.parse(id),
      record: AirdropRecordSchema.parse(record),
    })),
  });
  const ledger = NullifierLedger.from(parsed.nullifiers.map((value) => FieldElementSchema.parse(value)));
  return { registry, ledger };
}
