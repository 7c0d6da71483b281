import type {Address} from '../address';
import {TransactionBuildError, TransactionErrorCode} from '../errors';
import type {TransactionInstruction} from '../instruction';
import {MAX_ACCOUNT_KEYS} from '../transaction/constants';
import assert from '../utils/assert';
import type {MessageHeader} from './index';

/**
 * One entry per unique address, with signer and writable flags OR-ed
 * across every reference to it
 */
export type ResolvedAccount = {
  address: Address;
  isSigner: boolean;
  isWritable: boolean;
};

// writable signers, read-only signers, writable non-signers, read-only non-signers
type Buckets = [Array<Address>, Array<Address>, Array<Address>, Array<Address>];

function bucketIndex({isSigner, isWritable}: ResolvedAccount): 0 | 1 | 2 | 3 {
  if (isSigner) {
    return isWritable ? 0 : 1;
  }
  return isWritable ? 2 : 3;
}

export class CompiledKeys {
  readonly payer: Address;
  private readonly accounts: ReadonlyArray<ResolvedAccount>;

  constructor(payer: Address, accounts: ReadonlyArray<ResolvedAccount>) {
    this.payer = payer;
    this.accounts = accounts.map(account => ({...account}));
  }

  /**
   * Collect and deduplicate every account referenced by `instructions`.
   *
   * The payer comes first as a writable signer. Each instruction then
   * contributes its program id, as a read-only non-signer, followed by its
   * account metas. Flags on a repeated address only ever escalate.
   */
  static compile(
    instructions: ReadonlyArray<TransactionInstruction>,
    payer: Address,
  ): CompiledKeys {
    const accounts: Array<ResolvedAccount> = [];
    const positions = new Map<string, number>();

    const reference = (
      address: Address,
      isSigner: boolean,
      isWritable: boolean,
    ) => {
      const key = address.toBase58();
      const position = positions.get(key);
      if (position === undefined) {
        positions.set(key, accounts.length);
        accounts.push({address, isSigner, isWritable});
        return;
      }
      const account = accounts[position];
      account.isSigner ||= isSigner;
      account.isWritable ||= isWritable;
    };

    reference(payer, true, true);
    for (const ix of instructions) {
      reference(ix.programId, false, false);
      for (const {pubkey, isSigner, isWritable} of ix.keys) {
        reference(pubkey, isSigner, isWritable);
      }
    }

    return new CompiledKeys(payer, accounts);
  }

  /**
   * The deduplicated accounts in first-seen order
   */
  resolvedAccounts(): Array<ResolvedAccount> {
    return this.accounts.map(account => ({...account}));
  }

  /**
   * Stable-partition the accounts into the four signer/writable buckets and
   * size the header from them.
   */
  getMessageComponents(): [MessageHeader, Array<Address>] {
    if (this.accounts.length > MAX_ACCOUNT_KEYS) {
      throw new TransactionBuildError(
        TransactionErrorCode.TooManyAccountKeys,
        `${this.accounts.length} unique account keys exceed the limit of ${MAX_ACCOUNT_KEYS}`,
      );
    }

    const buckets: Buckets = [[], [], [], []];
    for (const account of this.accounts) {
      buckets[bucketIndex(account)].push(account.address);
    }
    const [writableSigners, readonlySigners, , readonlyNonSigners] = buckets;

    assert(
      writableSigners.length > 0 && writableSigners[0].equals(this.payer),
      'Expected the fee payer to be the first writable signer',
    );

    const header: MessageHeader = {
      numRequiredSignatures: writableSigners.length + readonlySigners.length,
      numReadonlySignedAccounts: readonlySigners.length,
      numReadonlyUnsignedAccounts: readonlyNonSigners.length,
    };
    return [header, buckets.flat()];
  }
}
