import * as BufferLayout from '@solana/buffer-layout';

/**
 * Layout for an address
 */
export const address = (property: string = 'address') => {
  return BufferLayout.blob(32, property);
};

/**
 * Layout for a compact-array length prefix that has already been encoded
 */
export const shortvecPrefix = (prefix: ArrayLike<number>, property: string) => {
  return BufferLayout.blob(prefix.length, property);
};
