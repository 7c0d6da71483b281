import {expect} from 'chai';

import {TransactionBuildError, TransactionErrorCode} from '../../src/errors';
import {TransactionInstruction} from '../../src/instruction';
import {MessageAccountKeys} from '../../src/message/account-keys';
import {createTestKeys} from '../helpers';

describe('MessageAccountKeys', () => {
  it('get and length', () => {
    const keys = createTestKeys(3);
    const accountKeys = new MessageAccountKeys(keys);
    expect(accountKeys.length).to.eq(3);
    expect(accountKeys.get(1)).to.eq(keys[1]);
    expect(accountKeys.get(3)).to.be.undefined;
  });

  it('indexOf', () => {
    const keys = createTestKeys(3);
    const accountKeys = new MessageAccountKeys(keys);
    expect(accountKeys.indexOf(keys[2])).to.eq(2);
    expect(accountKeys.indexOf(createTestKeys(1)[0])).to.eq(-1);
  });

  it('compileInstructions', () => {
    const keys = createTestKeys(3);
    const accountKeys = new MessageAccountKeys(keys);

    const instruction = new TransactionInstruction({
      programId: keys[0],
      keys: [
        {pubkey: keys[1], isSigner: true, isWritable: true},
        {pubkey: keys[2], isSigner: true, isWritable: true},
        {pubkey: keys[1], isSigner: false, isWritable: false},
      ],
      data: Uint8Array.from([4, 5]),
    });

    const [compiledInstruction] = accountKeys.compileInstructions([
      instruction,
    ]);
    expect(compiledInstruction.programIdIndex).to.eq(0);
    expect(compiledInstruction.accountKeyIndexes).to.eql([1, 2, 1]);
    expect([...compiledInstruction.data]).to.eql([4, 5]);
  });

  it('compileInstructions with unknown key', () => {
    const keys = createTestKeys(3);
    const accountKeys = new MessageAccountKeys(keys);
    const unknownKey = createTestKeys(1)[0];
    const testInstructions = [
      new TransactionInstruction({
        programId: unknownKey,
        keys: [],
      }),
      new TransactionInstruction({
        programId: keys[0],
        keys: [
          {pubkey: keys[1], isSigner: true, isWritable: true},
          {pubkey: unknownKey, isSigner: false, isWritable: false},
        ],
      }),
    ];

    for (const instruction of testInstructions) {
      expect(() => accountKeys.compileInstructions([instruction]))
        .to.throw(TransactionBuildError, unknownKey.toBase58())
        .with.property('code', TransactionErrorCode.AccountNotFound);
    }
  });

  it('compileInstructions with too many account keys', () => {
    const keys = createTestKeys(257);
    expect(() => new MessageAccountKeys(keys).compileInstructions([]))
      .to.throw(TransactionBuildError)
      .with.property('code', TransactionErrorCode.TooManyAccountKeys);
  });
});
