import {WireFormatError} from '../errors';

/**
 * Largest length the compact-array prefix can carry
 */
export const MAX_SHORTVEC_LENGTH = 0xffff;

const MAX_ENCODING_LENGTH = 3;

/**
 * Consume a compact-array length prefix from the front of `bytes`.
 */
export function decodeLength(bytes: Array<number>): number {
  let len = 0;
  let size = 0;
  for (;;) {
    const elem = bytes.shift();
    if (elem === undefined) {
      throw new WireFormatError('truncated compact-array length');
    }
    len |= (elem & 0x7f) << (size * 7);
    size += 1;
    if ((elem & 0x80) === 0) {
      if (size > 1 && elem === 0) {
        throw new WireFormatError(
          'compact-array length is not minimally encoded',
        );
      }
      break;
    }
    if (size === MAX_ENCODING_LENGTH) {
      throw new WireFormatError('compact-array length is longer than 3 bytes');
    }
  }
  if (len > MAX_SHORTVEC_LENGTH) {
    throw new WireFormatError(`compact-array length ${len} overflows u16`);
  }
  return len;
}

/**
 * Append the compact-array encoding of `len` to `bytes`: seven bits per
 * byte, least significant group first, high bit set on all but the last.
 */
export function encodeLength(bytes: Array<number>, len: number) {
  if (!Number.isInteger(len) || len < 0 || len > MAX_SHORTVEC_LENGTH) {
    throw new RangeError(`compact-array length out of range: ${len}`);
  }
  let remLen = len;
  for (;;) {
    let elem = remLen & 0x7f;
    remLen >>= 7;
    if (remLen == 0) {
      bytes.push(elem);
      break;
    } else {
      elem |= 0x80;
      bytes.push(elem);
    }
  }
}
