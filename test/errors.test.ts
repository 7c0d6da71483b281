import {expect} from 'chai';

import {
  TransactionBuildError,
  TransactionError,
  TransactionErrorCode,
  TransactionSignerError,
  WireFormatError,
} from '../src';
import {filledAddress} from './helpers';

describe('errors', () => {
  it('WireFormatError names itself once', () => {
    const error = new WireFormatError('truncated signature');
    expect(error.message).to.eq('truncated signature');
    expect(String(error)).to.eq('WireFormatError: truncated signature');
    expect(error.code).to.eq(TransactionErrorCode.WireFormatError);
    expect(error).to.be.instanceOf(TransactionError);
  });

  it('TransactionBuildError carries its code', () => {
    const error = new TransactionBuildError(
      TransactionErrorCode.NoFeePayer,
      'a fee payer is required',
    );
    expect(String(error)).to.eq(
      'TransactionBuildError: a fee payer is required',
    );
    expect(error.code).to.eq(TransactionErrorCode.NoFeePayer);
  });

  it('TransactionSignerError carries the offending address', () => {
    const address = filledAddress(1);
    const error = new TransactionSignerError(
      TransactionErrorCode.MissingSigner,
      'no signature',
      address,
    );
    expect(error.address).to.eq(address);
    expect(error.name).to.eq('TransactionSignerError');
  });
});
