import * as BufferLayout from '@solana/buffer-layout';
import {Buffer} from 'buffer';

import {Address} from './address';
import type {CheckpointHash} from './checkpoint-hash';
import {TransactionInstruction} from './instruction';
import type {Signer} from './signer';
import {BuiltTransaction, TransactionBuilder} from './transaction';

/**
 * Address of the native program that owns plain wallet accounts
 */
export const SYSTEM_PROGRAM_ID = new Address('11111111111111111111111111111111');

/**
 * Transfer system transaction params
 */
export type TransferParams = {
  /** Account that will transfer lamports */
  fromPubkey: Address;
  /** Account that will receive transferred lamports */
  toPubkey: Address;
  /** Amount of lamports to transfer */
  lamports: number;
};

type TransferInstructionData = {
  instruction: number;
  lamports: number;
};

/**
 * An enumeration of valid system InstructionType's
 * @internal
 */
export const SYSTEM_INSTRUCTION_LAYOUTS = Object.freeze({
  Transfer: {
    index: 2,
    layout: BufferLayout.struct<TransferInstructionData>([
      BufferLayout.u32('instruction'),
      BufferLayout.nu64('lamports'),
    ]),
  },
});

/**
 * Instruction encoders for the system program
 */
export class SystemProgram {
  /**
   * @internal
   */
  constructor() {}

  /**
   * Address that identifies the System program
   */
  static programId: Address = SYSTEM_PROGRAM_ID;

  /**
   * Generate a transaction instruction that transfers lamports from one
   * account to another
   */
  static transfer(params: TransferParams): TransactionInstruction {
    if (!Number.isSafeInteger(params.lamports) || params.lamports < 0) {
      throw new RangeError(`invalid lamports amount: ${params.lamports}`);
    }
    const type = SYSTEM_INSTRUCTION_LAYOUTS.Transfer;
    const data = Buffer.alloc(type.layout.span);
    type.layout.encode(
      {instruction: type.index, lamports: params.lamports},
      data,
    );

    return new TransactionInstruction({
      keys: [
        {pubkey: params.fromPubkey, isSigner: true, isWritable: true},
        {pubkey: params.toPubkey, isSigner: false, isWritable: true},
      ],
      programId: this.programId,
      data,
    });
  }

  /**
   * Decode a transfer instruction and retrieve the instruction params.
   */
  static decodeTransfer(instruction: TransactionInstruction): TransferParams {
    if (!instruction.programId.equals(SYSTEM_PROGRAM_ID)) {
      throw new Error('invalid instruction; programId is not SystemProgram');
    }
    if (instruction.keys.length < 2) {
      throw new Error(
        `invalid instruction; found ${instruction.keys.length} keys, expected at least 2`,
      );
    }
    const type = SYSTEM_INSTRUCTION_LAYOUTS.Transfer;
    let decoded: TransferInstructionData;
    try {
      decoded = type.layout.decode(instruction.data);
    } catch (err) {
      throw new Error('invalid instruction; ' + err);
    }
    if (decoded.instruction !== type.index) {
      throw new Error(
        `invalid instruction; instruction index mismatch ${decoded.instruction} != ${type.index}`,
      );
    }
    return {
      fromPubkey: instruction.keys[0].pubkey,
      toPubkey: instruction.keys[1].pubkey,
      lamports: decoded.lamports,
    };
  }
}

/**
 * Build a transfer paid for and signed by `from`.
 */
export function createTransfer(
  from: Signer,
  to: Address,
  lamports: number,
  checkpointHash: CheckpointHash,
): BuiltTransaction {
  return new TransactionBuilder()
    .setFeePayer(from.publicKey)
    .setCheckpointHash(checkpointHash)
    .addInstruction(
      SystemProgram.transfer({
        fromPubkey: from.publicKey,
        toPubkey: to,
        lamports,
      }),
    )
    .buildSigned([from]);
}
