import {Address} from './address';
import {TransactionErrorCode, TransactionSignerError} from './errors';
import {SIGNATURE_LENGTH_IN_BYTES} from './transaction/constants';

/**
 * Anything that can produce a signature for one address.
 *
 * `sign` must be synchronous and return a 64 byte signature over the exact
 * bytes it is given.
 */
export interface Signer {
  readonly publicKey: Address;
  sign(message: Uint8Array): Uint8Array;
  /** True for signers that prompt a person, e.g. a hardware wallet */
  isInteractive(): boolean;
}

/**
 * A signer holding a signature computed elsewhere, for offline and
 * multi-party workflows. The message passed to `sign` is ignored.
 */
export class Presigner implements Signer {
  readonly publicKey: Address;
  private readonly _signature: Uint8Array;

  constructor(publicKey: Address, signature: Uint8Array) {
    if (signature.length !== SIGNATURE_LENGTH_IN_BYTES) {
      throw new TransactionSignerError(
        TransactionErrorCode.InvalidSignature,
        `presigned signature must be ${SIGNATURE_LENGTH_IN_BYTES} bytes, got ${signature.length}`,
        publicKey,
      );
    }
    this.publicKey = publicKey;
    this._signature = Uint8Array.from(signature);
  }

  sign(_message: Uint8Array): Uint8Array {
    return Uint8Array.from(this._signature);
  }

  isInteractive(): boolean {
    return false;
  }
}

/**
 * A placeholder signer that always produces the all-zero signature, which
 * leaves its slot marked as unsigned.
 */
export class NullSigner implements Signer {
  readonly publicKey: Address;

  constructor(publicKey: Address) {
    this.publicKey = publicKey;
  }

  sign(_message: Uint8Array): Uint8Array {
    return new Uint8Array(SIGNATURE_LENGTH_IN_BYTES);
  }

  isInteractive(): boolean {
    return false;
  }
}

/**
 * Sign `message` with every signer, in order
 */
export function signMessage(
  message: Uint8Array,
  signers: ReadonlyArray<Signer>,
): Array<Uint8Array> {
  return signers.map(signer => signer.sign(message));
}
