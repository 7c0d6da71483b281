import bs58 from 'bs58';

import {WireFormatError} from './errors';

/**
 * Hash of a recent, agreed-upon network state, as a base-58 encoded string.
 * Embedded verbatim in every message for replay protection.
 */
export type CheckpointHash = string;

export const CHECKPOINT_HASH_LENGTH = 32;

/**
 * Decode a checkpoint hash, rejecting anything that is not exactly 32 bytes
 */
export function checkpointHashToBytes(checkpointHash: CheckpointHash): Uint8Array {
  let decoded: Uint8Array;
  try {
    decoded = bs58.decode(checkpointHash);
  } catch (err) {
    throw new WireFormatError(
      `Invalid checkpoint hash: ${checkpointHash}; ${err}`,
    );
  }
  if (decoded.length !== CHECKPOINT_HASH_LENGTH) {
    throw new WireFormatError(
      `Invalid checkpoint hash: expected ${CHECKPOINT_HASH_LENGTH} bytes, got ${decoded.length}`,
    );
  }
  return decoded;
}

export function checkpointHashFromBytes(bytes: Uint8Array): CheckpointHash {
  if (bytes.length !== CHECKPOINT_HASH_LENGTH) {
    throw new WireFormatError(
      `Invalid checkpoint hash: expected ${CHECKPOINT_HASH_LENGTH} bytes, got ${bytes.length}`,
    );
  }
  return bs58.encode(bytes);
}
