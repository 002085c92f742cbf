export const AirdropErrorCodes = [
  'UNAUTHORIZED',
  'INVALID_NULLIFIER',
  'INVALID_AIRDROP',
  'INVALID_PROOF',
  'TRANSFER_FAILED',
] as const;

export type AirdropErrorCode = (typeof AirdropErrorCodes)[number];

/**
 * Base class for every terminal failure of an airdrop operation.
 * None of these are retried internally.
 */
export class AirdropError extends Error {
  readonly code: AirdropErrorCode;

  constructor(code: AirdropErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnauthorizedError extends AirdropError {
  constructor(message = 'Caller is not the airdrop manager') {
    super('UNAUTHORIZED', message);
  }
}

export class InvalidNullifierError extends AirdropError {
  constructor(message = 'Nullifier has already been used') {
    super('INVALID_NULLIFIER', message);
  }
}

export class InvalidAirdropError extends AirdropError {
  constructor(message = 'Airdrop does not exist') {
    super('INVALID_AIRDROP', message);
  }
}

export class InvalidProofError extends AirdropError {
  constructor(message = 'Proof verification failed', options?: ErrorOptions) {
    super('INVALID_PROOF', message, options);
  }
}

export class TransferFailedError extends AirdropError {
  constructor(message = 'Token transfer failed', options?: ErrorOptions) {
    super('TRANSFER_FAILED', message, options);
  }
}

export function isAirdropError(error: unknown): error is AirdropError {
  return error instanceof AirdropError;
}
