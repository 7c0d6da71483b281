import {Buffer} from 'buffer';

import type {Address} from './address';

/**
 * One instruction's requirement for one account
 */
export type AccountMeta = {
  /** The account's address */
  pubkey: Address;
  /** True if an instruction requires a transaction signature matching `pubkey` */
  isSigner: boolean;
  /** True if the `pubkey` can be loaded as a read-write account. */
  isWritable: boolean;
};

/**
 * List of TransactionInstruction object fields that may be initialized at construction
 */
export type TransactionInstructionCtorFields = {
  keys: Array<AccountMeta>;
  programId: Address;
  data?: Uint8Array;
};

/**
 * A single program invocation. `data` is opaque to this library.
 */
export class TransactionInstruction {
  /**
   * Accounts the program reads or writes, in the order it expects them
   */
  keys: Array<AccountMeta>;

  /**
   * Program Id to execute
   */
  programId: Address;

  /**
   * Program input
   */
  data: Buffer = Buffer.alloc(0);

  constructor(opts: TransactionInstructionCtorFields) {
    this.programId = opts.programId;
    this.keys = opts.keys;
    if (opts.data) {
      this.data = Buffer.from(opts.data);
    }
  }
}
