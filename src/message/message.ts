import {Buffer} from 'buffer';
import * as BufferLayout from '@solana/buffer-layout';

import {Address, ADDRESS_LENGTH} from '../address';
import {
  CHECKPOINT_HASH_LENGTH,
  checkpointHashFromBytes,
  checkpointHashToBytes,
} from '../checkpoint-hash';
import type {CheckpointHash} from '../checkpoint-hash';
import {TransactionBuildError, TransactionErrorCode, WireFormatError} from '../errors';
import type {TransactionInstruction} from '../instruction';
import * as Layout from '../layout';
import {VERSION_PREFIX_MASK} from '../transaction/constants';
import * as shortvec from '../utils/shortvec-encoding';
import {takeByte, takeBytes} from '../utils/take-bytes';
import {CompiledKeys} from './compiled-keys';
import {MessageAccountKeys} from './account-keys';
import type {CompiledInstruction, MessageHeader} from './index';

const U8_MAX = 255;

/**
 * Message constructor arguments
 */
export type MessageArgs = {
  /** The message header, identifying signed and read-only `accountKeys` */
  header: MessageHeader;
  /** All the account keys used by this transaction, in canonical order */
  accountKeys: ReadonlyArray<string | Address>;
  /** The hash of a recent network checkpoint */
  checkpointHash: CheckpointHash;
  /** Instructions that will be executed in sequence and committed in one atomic transaction if all succeed. */
  instructions: ReadonlyArray<CompiledInstruction>;
};

export type CompileMessageArgs = {
  payerKey: Address;
  instructions: ReadonlyArray<TransactionInstruction>;
  checkpointHash: CheckpointHash;
};

function encodeInstruction(instruction: CompiledInstruction): Buffer {
  const {programIdIndex, accountKeyIndexes, data} = instruction;

  const keyIndicesCount: number[] = [];
  shortvec.encodeLength(keyIndicesCount, accountKeyIndexes.length);

  const dataCount: number[] = [];
  shortvec.encodeLength(dataCount, data.length);

  const instructionLayout = BufferLayout.struct<
    Readonly<{
      data: Uint8Array;
      dataLength: Uint8Array;
      keyIndices: number[];
      keyIndicesCount: Uint8Array;
      programIdIndex: number;
    }>
  >([
    BufferLayout.u8('programIdIndex'),
    Layout.shortvecPrefix(keyIndicesCount, 'keyIndicesCount'),
    BufferLayout.seq(
      BufferLayout.u8('keyIndex'),
      accountKeyIndexes.length,
      'keyIndices',
    ),
    Layout.shortvecPrefix(dataCount, 'dataLength'),
    BufferLayout.blob(data.length, 'data'),
  ]);

  const encoded = Buffer.alloc(instructionLayout.span);
  instructionLayout.encode(
    {
      programIdIndex,
      keyIndicesCount: Uint8Array.from(keyIndicesCount),
      keyIndices: accountKeyIndexes,
      dataLength: Uint8Array.from(dataCount),
      data: Uint8Array.from(data),
    },
    encoded,
  );
  return encoded;
}

/**
 * List of instructions to be processed atomically, with every account they
 * touch resolved to a position in `accountKeys`.
 *
 * Everything except `checkpointHash` is fixed once built. Changing the
 * checkpoint hash invalidates any signature made over the message.
 */
export class Message {
  readonly header: Readonly<MessageHeader>;
  readonly accountKeys: ReadonlyArray<Address>;
  checkpointHash: CheckpointHash;
  readonly instructions: ReadonlyArray<CompiledInstruction>;

  private indexToProgramIds: Map<number, Address> = new Map<number, Address>();

  constructor(args: MessageArgs) {
    this.header = {...args.header};
    this.accountKeys = args.accountKeys.map(account =>
      typeof account === 'string' ? new Address(account) : account,
    );
    this.checkpointHash = args.checkpointHash;
    this.instructions = args.instructions.map(ix => ({
      programIdIndex: ix.programIdIndex,
      accountKeyIndexes: [...ix.accountKeyIndexes],
      data: Uint8Array.from(ix.data),
    }));
    this.instructions.forEach(ix => {
      const programId = this.accountKeys[ix.programIdIndex];
      if (programId !== undefined) {
        this.indexToProgramIds.set(ix.programIdIndex, programId);
      }
    });
  }

  /**
   * Resolve, order and index the accounts of `instructions` into a message.
   */
  static compile(args: CompileMessageArgs): Message {
    const compiledKeys = CompiledKeys.compile(args.instructions, args.payerKey);
    const [header, orderedAddresses] = compiledKeys.getMessageComponents();
    if (header.numRequiredSignatures > U8_MAX) {
      throw new TransactionBuildError(
        TransactionErrorCode.TooManyAccountKeys,
        `${header.numRequiredSignatures} required signers do not fit in the header`,
      );
    }
    const accountKeys = new MessageAccountKeys(orderedAddresses);
    const instructions = accountKeys.compileInstructions(args.instructions);
    return new Message({
      header,
      accountKeys: orderedAddresses,
      checkpointHash: args.checkpointHash,
      instructions,
    });
  }

  isAccountSigner(index: number): boolean {
    return index < this.header.numRequiredSignatures;
  }

  isAccountWritable(index: number): boolean {
    const numSignedAccounts = this.header.numRequiredSignatures;
    if (index >= this.header.numRequiredSignatures) {
      const unsignedAccountIndex = index - numSignedAccounts;
      const numUnsignedAccounts = this.accountKeys.length - numSignedAccounts;
      const numWritableUnsignedAccounts =
        numUnsignedAccounts - this.header.numReadonlyUnsignedAccounts;
      return unsignedAccountIndex < numWritableUnsignedAccounts;
    } else {
      const numWritableSignedAccounts =
        numSignedAccounts - this.header.numReadonlySignedAccounts;
      return index < numWritableSignedAccounts;
    }
  }

  isProgramId(index: number): boolean {
    return this.indexToProgramIds.has(index);
  }

  programIds(): Address[] {
    return [...this.indexToProgramIds.values()];
  }

  nonProgramIds(): Address[] {
    return this.accountKeys.filter((_, index) => !this.isProgramId(index));
  }

  /**
   * The signed keys: the first `numRequiredSignatures` account keys
   */
  signerKeys(): Address[] {
    return this.accountKeys.slice(0, this.header.numRequiredSignatures);
  }

  /**
   * Encode the message in the wire format: header, compact-array of
   * addresses, checkpoint hash, compact-array of instructions.
   */
  serialize(): Buffer {
    const numKeys = this.accountKeys.length;

    const keyCount: number[] = [];
    shortvec.encodeLength(keyCount, numKeys);

    const instructionCount: number[] = [];
    shortvec.encodeLength(instructionCount, this.instructions.length);

    const signDataLayout = BufferLayout.struct<
      Readonly<{
        checkpointHash: Uint8Array;
        instructionCount: Uint8Array;
        keyCount: Uint8Array;
        keys: Uint8Array[];
        numReadonlySignedAccounts: number;
        numReadonlyUnsignedAccounts: number;
        numRequiredSignatures: number;
      }>
    >([
      BufferLayout.u8('numRequiredSignatures'),
      BufferLayout.u8('numReadonlySignedAccounts'),
      BufferLayout.u8('numReadonlyUnsignedAccounts'),
      Layout.shortvecPrefix(keyCount, 'keyCount'),
      BufferLayout.seq(Layout.address('key'), numKeys, 'keys'),
      Layout.address('checkpointHash'),
      Layout.shortvecPrefix(instructionCount, 'instructionCount'),
    ]);

    const signData = Buffer.alloc(signDataLayout.span);
    signDataLayout.encode(
      {
        numRequiredSignatures: this.header.numRequiredSignatures,
        numReadonlySignedAccounts: this.header.numReadonlySignedAccounts,
        numReadonlyUnsignedAccounts: this.header.numReadonlyUnsignedAccounts,
        keyCount: Uint8Array.from(keyCount),
        keys: this.accountKeys.map(key => key.toBytes()),
        checkpointHash: checkpointHashToBytes(this.checkpointHash),
        instructionCount: Uint8Array.from(instructionCount),
      },
      signData,
    );

    return Buffer.concat([
      signData,
      ...this.instructions.map(instruction => encodeInstruction(instruction)),
    ]);
  }

  /**
   * Decode a serialized message into a Message object.
   */
  static from(buffer: Uint8Array | Array<number>): Message {
    const byteArray = [...buffer];
    const message = Message.decode(byteArray);
    if (byteArray.length > 0) {
      throw new WireFormatError(
        `${byteArray.length} unexpected trailing bytes after message`,
      );
    }
    return message;
  }

  /**
   * Decode a message from the front of `byteArray`, consuming its bytes.
   * @internal
   */
  static decode(byteArray: Array<number>): Message {
    const numRequiredSignatures = takeByte(byteArray, 'message header');
    if (
      numRequiredSignatures !==
      (numRequiredSignatures & VERSION_PREFIX_MASK)
    ) {
      throw new WireFormatError(
        'versioned messages are not supported; expected a legacy message header',
      );
    }
    const numReadonlySignedAccounts = takeByte(byteArray, 'message header');
    const numReadonlyUnsignedAccounts = takeByte(byteArray, 'message header');

    const accountCount = shortvec.decodeLength(byteArray);
    const accountKeys: Address[] = [];
    for (let i = 0; i < accountCount; i++) {
      const account = takeBytes(byteArray, ADDRESS_LENGTH, 'account key');
      accountKeys.push(new Address(account));
    }

    const checkpointHash = takeBytes(
      byteArray,
      CHECKPOINT_HASH_LENGTH,
      'checkpoint hash',
    );

    const instructionCount = shortvec.decodeLength(byteArray);
    const instructions: CompiledInstruction[] = [];
    for (let i = 0; i < instructionCount; i++) {
      const programIdIndex = takeByte(byteArray, 'instruction');
      const accountIndexCount = shortvec.decodeLength(byteArray);
      const accountKeyIndexes = takeBytes(
        byteArray,
        accountIndexCount,
        'instruction accounts',
      );
      const dataLength = shortvec.decodeLength(byteArray);
      const data = Uint8Array.from(
        takeBytes(byteArray, dataLength, 'instruction data'),
      );
      instructions.push({
        programIdIndex,
        accountKeyIndexes,
        data,
      });
    }

    return new Message({
      header: {
        numRequiredSignatures,
        numReadonlySignedAccounts,
        numReadonlyUnsignedAccounts,
      },
      checkpointHash: checkpointHashFromBytes(Uint8Array.from(checkpointHash)),
      accountKeys,
      instructions,
    });
  }
}
