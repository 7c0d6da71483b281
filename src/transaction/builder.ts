import type {Address} from '../address';
import {checkpointHashToBytes} from '../checkpoint-hash';
import type {CheckpointHash} from '../checkpoint-hash';
import {TransactionBuildError, TransactionErrorCode} from '../errors';
import {TransactionInstruction} from '../instruction';
import type {TransactionInstructionCtorFields} from '../instruction';
import {Message} from '../message';
import type {Signer} from '../signer';
import {BuiltTransaction} from './built-transaction';

/**
 * Fluent builder for transactions.
 *
 * Accounts are deduplicated across instructions and ordered as writable
 * signers (fee payer first), read-only signers, writable non-signers, then
 * read-only non-signers.
 *
 * ```ts
 * const transaction = new TransactionBuilder()
 *   .setFeePayer(payer.publicKey)
 *   .setCheckpointHash(checkpointHash)
 *   .addInstruction(instruction)
 *   .buildSigned([payer]);
 * ```
 */
export class TransactionBuilder {
  private feePayer: Address | null = null;
  private checkpointHash: CheckpointHash | null = null;
  private instructions: Array<TransactionInstruction> = [];

  /**
   * Set the account that pays the fee. It always signs and is always the
   * first account key.
   */
  setFeePayer(feePayer: Address): this {
    this.feePayer = feePayer;
    return this;
  }

  setCheckpointHash(checkpointHash: CheckpointHash): this {
    checkpointHashToBytes(checkpointHash);
    this.checkpointHash = checkpointHash;
    return this;
  }

  /**
   * Append an instruction. Instructions execute in the order they are added.
   */
  addInstruction(
    instruction: TransactionInstruction | TransactionInstructionCtorFields,
  ): this {
    this.instructions.push(
      instruction instanceof TransactionInstruction
        ? instruction
        : new TransactionInstruction(instruction),
    );
    return this;
  }

  addInstructions(
    instructions: ReadonlyArray<
      TransactionInstruction | TransactionInstructionCtorFields
    >,
  ): this {
    instructions.forEach(instruction => this.addInstruction(instruction));
    return this;
  }

  /**
   * Compile an unsigned transaction.
   */
  build(): BuiltTransaction {
    const {feePayer, checkpointHash} = this;
    if (feePayer === null) {
      throw new TransactionBuildError(
        TransactionErrorCode.NoFeePayer,
        'a fee payer is required',
      );
    }
    if (checkpointHash === null) {
      throw new TransactionBuildError(
        TransactionErrorCode.NoRecentCheckpoint,
        'a recent checkpoint hash is required',
      );
    }
    if (this.instructions.length === 0) {
      throw new TransactionBuildError(
        TransactionErrorCode.NoInstructions,
        'at least one instruction is required',
      );
    }

    const message = Message.compile({
      payerKey: feePayer,
      checkpointHash,
      instructions: this.instructions,
    });
    return new BuiltTransaction(message);
  }

  /**
   * Compile, sign with `signers`, and verify. Every required signer,
   * including the fee payer, must be among `signers`.
   */
  buildSigned(signers: ReadonlyArray<Signer>): BuiltTransaction {
    const transaction = this.build();
    transaction.sign(signers);
    transaction.verify();
    return transaction;
  }
}
