import {expect} from 'chai';

import {WireFormatError} from '../src/errors';
import {decodeLength, encodeLength} from '../src/utils/shortvec-encoding';

function encoded(len: number): number[] {
  const bytes: number[] = [];
  encodeLength(bytes, len);
  return bytes;
}

describe('shortvec', () => {
  it('encodeLength', () => {
    expect(encoded(0)).to.eql([0x00]);
    expect(encoded(5)).to.eql([0x05]);
    expect(encoded(0x7f)).to.eql([0x7f]);
    expect(encoded(0x80)).to.eql([0x80, 0x01]);
    expect(encoded(200)).to.eql([0xc8, 0x01]);
    expect(encoded(0x3fff)).to.eql([0xff, 0x7f]);
    expect(encoded(0x4000)).to.eql([0x80, 0x80, 0x01]);
    expect(encoded(0xffff)).to.eql([0xff, 0xff, 0x03]);
  });

  it('encodeLength appends', () => {
    const bytes = [9];
    encodeLength(bytes, 0x80);
    expect(bytes).to.eql([9, 0x80, 0x01]);
  });

  it('encodeLength rejects lengths that do not fit', () => {
    expect(() => encoded(0x10000)).to.throw(RangeError);
    expect(() => encoded(-1)).to.throw(RangeError);
  });

  it('decodeLength', () => {
    expect(decodeLength([0x00])).to.eq(0);
    expect(decodeLength([0x7f])).to.eq(0x7f);
    expect(decodeLength([0x80, 0x01])).to.eq(0x80);
    expect(decodeLength([0xff, 0x7f])).to.eq(0x3fff);
    expect(decodeLength([0x80, 0x80, 0x01])).to.eq(0x4000);
    expect(decodeLength([0xff, 0xff, 0x03])).to.eq(0xffff);
  });

  it('decodeLength consumes only the prefix', () => {
    const bytes = [0x80, 0x01, 0x05];
    expect(decodeLength(bytes)).to.eq(0x80);
    expect(bytes).to.eql([0x05]);
  });

  it('decodeLength rejects truncated input', () => {
    expect(() => decodeLength([])).to.throw(WireFormatError);
    expect(() => decodeLength([0x80])).to.throw(WireFormatError);
  });

  it('decodeLength rejects overlong encodings', () => {
    expect(() => decodeLength([0x80, 0x80, 0x80, 0x01])).to.throw(
      WireFormatError,
      'longer than 3 bytes',
    );
    expect(() => decodeLength([0xff, 0xff, 0x07])).to.throw(
      WireFormatError,
      'overflows u16',
    );
  });

  it('decodeLength rejects padded encodings', () => {
    expect(() => decodeLength([0x82, 0x00])).to.throw(
      WireFormatError,
      'not minimally encoded',
    );
    expect(() => decodeLength([0x80, 0x80, 0x00])).to.throw(
      WireFormatError,
      'not minimally encoded',
    );
    expect(decodeLength([0x00])).to.eq(0);
  });
});
