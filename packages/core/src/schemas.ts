import { getAddress, isAddress, type Address } from 'viem';
import { z } from 'zod';
import { SNARK_SCALAR_FIELD } from './field.js';

export const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'Invalid address' })
  .transform((value): Address => getAddress(value));

export const UintSchema = z
  .union([
    z.bigint(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/, 'Expected a decimal or 0x hex integer'),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n, { message: 'Must be non-negative' });

export const FieldElementSchema = UintSchema.refine((value) => value < SNARK_SCALAR_FIELD, {
  message: 'Must be below the SNARK scalar field',
});

export const AirdropParamsSchema = z.object({
  groupId: UintSchema,
  token: AddressSchema,
  holder: AddressSchema,
  amount: UintSchema,
});

export type AirdropParams = z.infer<typeof AirdropParamsSchema>;
export type AirdropParamsInput = z.input<typeof AirdropParamsSchema>;

export const AirdropRecordSchema = AirdropParamsSchema.extend({
  manager: AddressSchema,
});

export type AirdropRecord = z.infer<typeof AirdropRecordSchema>;
export type AirdropRecordInput = z.input<typeof AirdropRecordSchema>;

export interface SerializedAirdropRecord {
  groupId: string;
  token: Address;
  manager: Address;
  holder: Address;
  amount: string;
}

export function serializeRecord(record: AirdropRecord): SerializedAirdropRecord {
  return {
    groupId: record.groupId.toString(),
    token: record.token,
    manager: record.manager,
    holder: record.holder,
    amount: record.amount.toString(),
  };
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
