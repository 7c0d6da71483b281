import {Address} from './address';
import type {Signer} from './signer';
import {
  Ed25519Keypair,
  generateKeypair,
  getPublicKey,
  sign,
} from './utils/ed25519';

/**
 * An in-memory ed25519 keypair used for signing transactions.
 */
export class Keypair implements Signer {
  private _keypair: Ed25519Keypair;

  /**
   * Create a new keypair instance.
   * Generate random keypair if no {@link Ed25519Keypair} is provided.
   *
   * @param keypair ed25519 keypair
   */
  constructor(keypair?: Ed25519Keypair) {
    this._keypair = keypair ?? generateKeypair();
  }

  /**
   * Generate a new random keypair
   */
  static generate(): Keypair {
    return new Keypair(generateKeypair());
  }

  /**
   * Create a keypair from a raw 64 byte secret key (private scalar followed
   * by the public key).
   *
   * @throws error if the provided secret key is invalid and validation is not skipped.
   */
  static fromSecretKey(
    secretKey: Uint8Array,
    options?: {skipValidation?: boolean},
  ): Keypair {
    if (secretKey.byteLength !== 64) {
      throw new Error('bad secret key size');
    }
    const publicKey = secretKey.slice(32, 64);
    if (!options || !options.skipValidation) {
      const computedPublicKey = getPublicKey(secretKey.slice(0, 32));
      for (let ii = 0; ii < 32; ii++) {
        if (publicKey[ii] !== computedPublicKey[ii]) {
          throw new Error('provided secretKey is invalid');
        }
      }
    }
    return new Keypair({publicKey, secretKey: secretKey.slice()});
  }

  /**
   * Generate a keypair from a 32 byte seed.
   */
  static fromSeed(seed: Uint8Array): Keypair {
    if (seed.byteLength !== 32) {
      throw new Error('bad seed size');
    }
    const publicKey = getPublicKey(seed);
    const secretKey = new Uint8Array(64);
    secretKey.set(seed);
    secretKey.set(publicKey, 32);
    return new Keypair({publicKey, secretKey});
  }

  get publicKey(): Address {
    return new Address(this._keypair.publicKey);
  }

  /**
   * The raw secret key for this keypair
   */
  get secretKey(): Uint8Array {
    return new Uint8Array(this._keypair.secretKey);
  }

  sign(message: Uint8Array): Uint8Array {
    return sign(message, this._keypair.secretKey);
  }

  isInteractive(): boolean {
    return false;
  }
}
