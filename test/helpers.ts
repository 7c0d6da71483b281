import {Address} from '../src/address';
import {checkpointHashFromBytes} from '../src/checkpoint-hash';
import type {CheckpointHash} from '../src/checkpoint-hash';
import {Keypair} from '../src/keypair';

/**
 * An address whose 32 bytes all equal `fill`
 */
export function filledAddress(fill: number): Address {
  return new Address(new Uint8Array(32).fill(fill));
}

export function filledCheckpointHash(fill: number): CheckpointHash {
  return checkpointHashFromBytes(new Uint8Array(32).fill(fill));
}

export function createTestKeys(count: number): Array<Address> {
  return new Array(count).fill(0).map(() => Address.unique());
}

/**
 * A deterministic keypair derived from a seed of 32 `fill` bytes
 */
export function seededKeypair(fill: number): Keypair {
  return Keypair.fromSeed(new Uint8Array(32).fill(fill));
}
