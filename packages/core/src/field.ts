import { encodePacked, hexToBigInt, keccak256, type Address, type Hex } from 'viem';

// BN254 scalar field modulus
export const SNARK_SCALAR_FIELD =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

/**
 * keccak256 shifted right by 8 bits so the result always fits the field.
 */
export function hashToField(data: Hex): bigint {
  return hexToBigInt(keccak256(data)) >> 8n;
}

/**
 * Binds a proof to the address that receives the payout.
 */
export function signalHash(receiver: Address): bigint {
  return hashToField(encodePacked(['address'], [receiver]));
}

/**
 * Scopes nullifiers to one airdrop of one deployment.
 */
export function externalNullifier(contract: Address, airdropId: bigint): bigint {
  return hashToField(encodePacked(['address', 'uint256'], [contract, airdropId]));
}

export function isFieldElement(value: bigint): boolean {
  return value >= 0n && value < SNARK_SCALAR_FIELD;
}
