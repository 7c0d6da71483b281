import {WireFormatError} from '../errors';

/**
 * Remove and return the first `count` bytes, failing on short input
 */
export function takeBytes(
  byteArray: Array<number>,
  count: number,
  what: string,
): Array<number> {
  if (byteArray.length < count) {
    throw new WireFormatError(
      `truncated ${what}: need ${count} bytes, ${byteArray.length} left`,
    );
  }
  return byteArray.splice(0, count);
}

export function takeByte(byteArray: Array<number>, what: string): number {
  const [byte] = takeBytes(byteArray, 1, what);
  return byte;
}
