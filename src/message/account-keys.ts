import {Address} from '../address';
import {TransactionBuildError, TransactionErrorCode} from '../errors';
import type {TransactionInstruction} from '../instruction';
import {MAX_ACCOUNT_KEYS} from '../transaction/constants';
import type {CompiledInstruction} from './index';

/**
 * The ordered address list of a message, with index lookup
 */
export class MessageAccountKeys {
  readonly staticAccountKeys: ReadonlyArray<Address>;
  private readonly keyIndexMap: Map<string, number>;

  constructor(staticAccountKeys: ReadonlyArray<Address>) {
    this.staticAccountKeys = staticAccountKeys;
    this.keyIndexMap = new Map();
    staticAccountKeys.forEach((key, index) => {
      const address = key.toBase58();
      // keep the first position if a key is repeated
      if (!this.keyIndexMap.has(address)) {
        this.keyIndexMap.set(address, index);
      }
    });
  }

  get(index: number): Address | undefined {
    return this.staticAccountKeys[index];
  }

  get length(): number {
    return this.staticAccountKeys.length;
  }

  indexOf(address: Address): number {
    return this.keyIndexMap.get(address.toBase58()) ?? -1;
  }

  /**
   * Rewrite each instruction's program id and account metas as indexes into
   * the ordered key list, keeping instruction and account order.
   */
  compileInstructions(
    instructions: ReadonlyArray<TransactionInstruction>,
  ): Array<CompiledInstruction> {
    // Bail early if any account indexes would overflow a u8
    if (this.length > MAX_ACCOUNT_KEYS) {
      throw new TransactionBuildError(
        TransactionErrorCode.TooManyAccountKeys,
        `${this.length} account keys exceed the limit of ${MAX_ACCOUNT_KEYS}`,
      );
    }

    const findKeyIndex = (key: Address): number => {
      const keyIndex = this.indexOf(key);
      if (keyIndex < 0) {
        throw new TransactionBuildError(
          TransactionErrorCode.AccountNotFound,
          `instruction references ${key.toBase58()}, which is not in the account keys`,
        );
      }
      return keyIndex;
    };

    return instructions.map((instruction): CompiledInstruction => {
      return {
        programIdIndex: findKeyIndex(instruction.programId),
        accountKeyIndexes: instruction.keys.map(meta =>
          findKeyIndex(meta.pubkey),
        ),
        data: Uint8Array.from(instruction.data),
      };
    });
  }
}
