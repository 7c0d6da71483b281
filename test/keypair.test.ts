import {expect} from 'chai';

import {Keypair} from '../src';
import {verify} from '../src/utils/ed25519';

describe('Keypair', () => {
  it('new keypair', () => {
    const keypair = new Keypair();
    expect(keypair.secretKey).to.have.length(64);
    expect(keypair.publicKey.toBytes()).to.have.length(32);
  });

  it('generate new keypair', () => {
    const keypair = Keypair.generate();
    expect(keypair.secretKey).to.have.length(64);
    expect([...keypair.secretKey.slice(32)]).to.eql([
      ...keypair.publicKey.toBytes(),
    ]);
  });

  it('create keypair from secret key', () => {
    const original = Keypair.generate();
    const keypair = Keypair.fromSecretKey(original.secretKey);
    expect(keypair.publicKey.equals(original.publicKey)).to.be.true;
  });

  it('creating keypair from invalid secret key throws error', () => {
    const secretKey = Keypair.generate().secretKey;
    secretKey[63] ^= 0x01;
    expect(() => {
      Keypair.fromSecretKey(secretKey);
    }).to.throw('provided secretKey is invalid');
  });

  it('creating keypair from invalid secret key succeeds if validation is skipped', () => {
    const secretKey = Keypair.generate().secretKey;
    secretKey[63] ^= 0x01;
    const keypair = Keypair.fromSecretKey(secretKey, {skipValidation: true});
    expect([...keypair.publicKey.toBytes()]).to.eql([
      ...secretKey.slice(32),
    ]);
  });

  it('rejects secret keys of the wrong size', () => {
    expect(() => Keypair.fromSecretKey(new Uint8Array(32))).to.throw(
      'bad secret key size',
    );
  });

  it('generate keypair from seed', () => {
    const seed = Uint8Array.from(Array(32).fill(8));
    const first = Keypair.fromSeed(seed);
    const second = Keypair.fromSeed(seed);
    expect(first.publicKey.equals(second.publicKey)).to.be.true;
    expect([...first.secretKey.slice(0, 32)]).to.eql([...seed]);
  });

  it('signs as a Signer', () => {
    const keypair = Keypair.generate();
    const message = Uint8Array.from([1, 2, 3]);
    const signature = keypair.sign(message);
    expect(signature).to.have.length(64);
    expect(verify(signature, message, keypair.publicKey.toBytes())).to.be.true;
    expect(verify(signature, Uint8Array.from([1, 2]), keypair.publicKey.toBytes()))
      .to.be.false;
    expect(keypair.isInteractive()).to.be.false;
  });
});
