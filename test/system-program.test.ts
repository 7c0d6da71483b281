import {expect} from 'chai';

import {
  SYSTEM_PROGRAM_ID,
  SystemProgram,
  TransactionInstruction,
  createTransfer,
} from '../src';
import {filledAddress, filledCheckpointHash, seededKeypair} from './helpers';

describe('SystemProgram', () => {
  it('programId is the all-zero address', () => {
    expect([...SystemProgram.programId.toBytes()]).to.eql(new Array(32).fill(0));
    expect(SystemProgram.programId.equals(SYSTEM_PROGRAM_ID)).to.be.true;
  });

  it('transfer', () => {
    const fromPubkey = filledAddress(1);
    const toPubkey = filledAddress(2);
    const instruction = SystemProgram.transfer({
      fromPubkey,
      toPubkey,
      lamports: 1000000,
    });

    expect(instruction.programId.equals(SYSTEM_PROGRAM_ID)).to.be.true;
    expect(instruction.keys).to.eql([
      {pubkey: fromPubkey, isSigner: true, isWritable: true},
      {pubkey: toPubkey, isSigner: false, isWritable: true},
    ]);
    expect([...instruction.data]).to.eql([
      2, 0, 0, 0, 0x40, 0x42, 0x0f, 0, 0, 0, 0, 0,
    ]);
    expect(SystemProgram.decodeTransfer(instruction)).to.eql({
      fromPubkey,
      toPubkey,
      lamports: 1000000,
    });
  });

  it('transfer rejects invalid amounts', () => {
    const params = {fromPubkey: filledAddress(1), toPubkey: filledAddress(2)};
    expect(() => SystemProgram.transfer({...params, lamports: -1})).to.throw(
      RangeError,
    );
    expect(() => SystemProgram.transfer({...params, lamports: 1.5})).to.throw(
      RangeError,
    );
  });

  it('decodeTransfer rejects other programs', () => {
    const instruction = new TransactionInstruction({
      programId: filledAddress(3),
      keys: [],
    });
    expect(() => SystemProgram.decodeTransfer(instruction)).to.throw(
      'programId is not SystemProgram',
    );
  });

  it('decodeTransfer rejects other instructions', () => {
    const instruction = new TransactionInstruction({
      programId: SYSTEM_PROGRAM_ID,
      keys: [
        {pubkey: filledAddress(1), isSigner: true, isWritable: true},
        {pubkey: filledAddress(2), isSigner: false, isWritable: true},
      ],
      data: Uint8Array.from([3, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0]),
    });
    expect(() => SystemProgram.decodeTransfer(instruction)).to.throw(
      'instruction index mismatch 3 != 2',
    );
  });

  it('createTransfer', () => {
    const from = seededKeypair(1);
    const to = filledAddress(5);
    const transaction = createTransfer(from, to, 1000, filledCheckpointHash(2));

    const {message} = transaction;
    expect(message.accountKeys.map(key => key.toBase58())).to.eql([
      from.publicKey.toBase58(),
      to.toBase58(),
      SYSTEM_PROGRAM_ID.toBase58(),
    ]);
    expect(message.header).to.eql({
      numRequiredSignatures: 1,
      numReadonlySignedAccounts: 0,
      numReadonlyUnsignedAccounts: 1,
    });
    expect(message.instructions).to.have.length(1);
    expect(message.instructions[0].programIdIndex).to.eq(2);
    expect(message.instructions[0].accountKeyIndexes).to.eql([0, 1]);
    expect(transaction.isSigned()).to.be.true;
    expect(() => transaction.verify()).not.to.throw();
  });
});
