import { z, ZodError } from 'zod';
import {
  AddressSchema,
  AirdropParamsSchema,
  AirdropRecordSchema,
  FieldElementSchema,
  UintSchema,
  isAirdropError,
  serializeRecord,
} from '@semdrop/core';
import { ClaimRequestSchema, type Airdrop, type AirdropEvent, type ClaimReceipt } from '@semdrop/engine';
import { logAudit } from './audit.js';

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcError = NonNullable<JsonRpcResponse['error']>;

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params: Record<string, unknown>;
}

export const RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  AIRDROP_ERROR: -32000,
} as const;

const CreateParamsSchema = AirdropParamsSchema.extend({ caller: AddressSchema });
const GetParamsSchema = z.object({ id: UintSchema });
const UpdateParamsSchema = z.object({
  caller: AddressSchema,
  id: UintSchema,
  record: AirdropRecordSchema,
});
const NullifierParamsSchema = z.object({ nullifierHash: FieldElementSchema });

export function serializeReceipt(receipt: ClaimReceipt): Record<string, string> {
  return {
    airdropId: receipt.airdropId.toString(),
    receiver: receipt.receiver,
    token: receipt.token,
    holder: receipt.holder,
    amount: receipt.amount.toString(),
    nullifierHash: receipt.nullifierHash.toString(),
  };
}

export function serializeEvent(event: AirdropEvent): Record<string, unknown> {
  switch (event.type) {
    case 'AirdropClaimed':
      return { type: event.type, airdropId: event.airdropId.toString(), receiver: event.receiver };
    case 'AirdropCreated':
    case 'AirdropUpdated':
      return {
        type: event.type,
        airdropId: event.airdropId.toString(),
        airdrop: serializeRecord(event.airdrop),
      };
  }
}

export function toRpcError(err: unknown): JsonRpcError {
  if (err instanceof ZodError) {
    return { code: RPC_ERRORS.INVALID_PARAMS, message: 'Invalid params', data: err.issues };
  }
  if (isAirdropError(err)) {
    return { code: RPC_ERRORS.AIRDROP_ERROR, message: err.message, data: { code: err.code } };
  }
  return {
    code: RPC_ERRORS.INTERNAL_ERROR,
    message: 'Internal error',
    data: err instanceof Error ? err.message : String(err),
  };
}

export interface RpcHandlerOptions {
  auditLogPath?: string;
  /** Runs after every successful state change, e.g. to persist a snapshot */
  onCommit?: () => Promise<void>;
}

export type RpcHandler = (req: JsonRpcRequest) => Promise<JsonRpcResponse>;

export function createRpcHandler(airdrop: Airdrop, options: RpcHandlerOptions = {}): RpcHandler {
  const commit = async (): Promise<void> => {
    if (!options.onCommit) return;
    try {
      await options.onCommit();
    } catch (err) {
      console.error('Failed to persist state after commit:', err);
    }
  };

  const audit = async (entry: Record<string, unknown>): Promise<void> => {
    if (!options.auditLogPath) return;
    try {
      await logAudit(options.auditLogPath, entry);
    } catch (err) {
      console.error('Failed to write audit log:', err);
    }
  };

  const claim = async (params: Record<string, unknown>): Promise<unknown> => {
    const request = ClaimRequestSchema.parse(params);
    const context = {
      method: 'airdrop_claim',
      airdropId: request.airdropId.toString(),
      receiver: request.receiver,
      nullifierHash: request.nullifierHash.toString(),
    };
    let receipt: ClaimReceipt;
    try {
      receipt = await airdrop.claim(request);
    } catch (err) {
      await audit({
        ...context,
        status: 'rejected',
        code: isAirdropError(err) ? err.code : 'INTERNAL',
      });
      throw err;
    }
    // The payout has happened; nothing after this point may fail the request
    await commit();
    await audit({ ...context, status: 'success', amount: receipt.amount.toString() });
    return serializeReceipt(receipt);
  };

  const methods: Record<string, (params: Record<string, unknown>) => Promise<unknown>> = {
    airdrop_create: async (params) => {
      const { caller, ...rest } = CreateParamsSchema.parse(params);
      const id = await airdrop.createAirdrop(caller, rest);
      await commit();
      return { id: id.toString() };
    },
    airdrop_get: async (params) => {
      const { id } = GetParamsSchema.parse(params);
      const record = airdrop.getAirdrop(id);
      return record ? serializeRecord(record) : null;
    },
    airdrop_update: async (params) => {
      const { caller, id, record } = UpdateParamsSchema.parse(params);
      const updated = await airdrop.updateDetails(caller, id, record);
      await commit();
      return serializeRecord(updated);
    },
    airdrop_claim: claim,
    nullifier_isUsed: async (params) => {
      const { nullifierHash } = NullifierParamsSchema.parse(params);
      return airdrop.isNullifierUsed(nullifierHash);
    },
  };

  return async (req: JsonRpcRequest): Promise<JsonRpcResponse> => {
    const method = Object.hasOwn(methods, req.method) ? methods[req.method] : undefined;
    if (!method) {
      return {
        jsonrpc: '2.0',
        id: req.id,
        error: { code: RPC_ERRORS.METHOD_NOT_FOUND, message: 'Method not found' },
      };
    }

    try {
      const result = await method(req.params ?? {});
      return { jsonrpc: '2.0', id: req.id, result };
    } catch (err) {
      const error = toRpcError(err);
      if (error.code === RPC_ERRORS.INTERNAL_ERROR) {
        console.error(`${req.method} failed:`, err);
      }
      return { jsonrpc: '2.0', id: req.id, error };
    }
  };
}
