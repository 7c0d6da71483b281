import {Buffer} from 'buffer';

import type {Address} from '../address';
import {checkpointHashToBytes} from '../checkpoint-hash';
import type {CheckpointHash} from '../checkpoint-hash';
import {
  TransactionErrorCode,
  TransactionSignerError,
  WireFormatError,
} from '../errors';
import {Message} from '../message';
import type {Signer} from '../signer';
import {verify} from '../utils/ed25519';
import * as shortvec from '../utils/shortvec-encoding';
import {takeBytes} from '../utils/take-bytes';
import {SIGNATURE_LENGTH_IN_BYTES} from './constants';

/**
 * Configuration object for BuiltTransaction.serialize()
 */
export type SerializeConfig = {
  /** Require all transaction signatures be present (default: false) */
  requireAllSignatures?: boolean;
  /** Verify provided signatures (default: false) */
  verifySignatures?: boolean;
};

/**
 * Default (empty) signature, marking a slot as unsigned
 */
export const DEFAULT_SIGNATURE = Buffer.alloc(SIGNATURE_LENGTH_IN_BYTES);

export function isDefaultSignature(signature: Uint8Array): boolean {
  return signature.every(byte => byte === 0);
}

/**
 * A compiled message plus its signature slots.
 *
 * Slot `i` holds the signature of `message.accountKeys[i]`. `signatures`
 * stays null until the first signing call allocates one zeroed slot per
 * required signer. A transaction is not safe to sign from two call chains
 * at once.
 */
export class BuiltTransaction {
  message: Message;
  signatures: Array<Buffer> | null;

  constructor(message: Message, signatures: Array<Uint8Array> | null = null) {
    this.message = message;
    this.signatures =
      signatures === null ? null : signatures.map(sig => Buffer.from(sig));
  }

  /**
   * The first (fee payer) signature, which identifies the transaction
   */
  get signature(): Buffer | null {
    if (this.signatures !== null && this.signatures.length > 0) {
      return this.signatures[0];
    }
    return null;
  }

  /**
   * The addresses that must sign, in slot order
   */
  get requiredSigners(): Address[] {
    return this.message.signerKeys();
  }

  /**
   * Point the message at another checkpoint hash. Every existing signature
   * covers the old hash, so all slots are reset to unsigned.
   */
  setCheckpointHash(checkpointHash: CheckpointHash) {
    if (this.message.checkpointHash === checkpointHash) {
      return;
    }
    checkpointHashToBytes(checkpointHash);
    this.message.checkpointHash = checkpointHash;
    if (this.signatures !== null) {
      this.signatures = this.signatures.map(() => Buffer.from(DEFAULT_SIGNATURE));
    }
  }

  /**
   * Sign with every signer whose address is a required signer. Signers for
   * any other address are skipped. Slots not covered by `signers` keep
   * whatever they held, so disjoint signer sets can be applied one call at a
   * time.
   */
  sign(signers: ReadonlyArray<Signer>) {
    const signatures = this._allocateSignatures();
    const signerKeys = this.message.signerKeys();
    const signData = this.message.serialize();

    for (const signer of signers) {
      const index = signerKeys.findIndex(key => key.equals(signer.publicKey));
      if (index < 0) {
        continue;
      }
      const signature = signer.sign(signData);
      if (signature.length !== SIGNATURE_LENGTH_IN_BYTES) {
        throw new TransactionSignerError(
          TransactionErrorCode.InvalidSignature,
          `signer produced a ${signature.length} byte signature`,
          signer.publicKey,
        );
      }
      signatures[index] = Buffer.from(signature);
    }
  }

  /**
   * Presence check only: true when every required slot holds non-zero bytes.
   *
   * This says nothing about whether those bytes are a valid signature; use
   * {@link BuiltTransaction.verify} before trusting a transaction.
   */
  isSigned(): boolean {
    const {signatures} = this;
    const numRequired = this.message.header.numRequiredSignatures;
    if (signatures === null || signatures.length < numRequired) {
      return false;
    }
    return signatures
      .slice(0, numRequired)
      .every(signature => !isDefaultSignature(signature));
  }

  /**
   * Check that every required signature is present and cryptographically
   * valid for its address over the current message bytes.
   */
  verify() {
    this._verifySignatures(this.message.serialize(), true);
  }

  /**
   * @internal
   */
  _verifySignatures(signData: Buffer, requireAllSignatures: boolean) {
    const numRequired = this.message.header.numRequiredSignatures;
    const signatures = this.signatures ?? [];
    const signerKeys = this.message.signerKeys();

    if (requireAllSignatures) {
      if (signatures.length < numRequired) {
        throw new TransactionSignerError(
          TransactionErrorCode.NotEnoughSigners,
          `${signatures.length} signature slots for ${numRequired} required signers`,
        );
      }
      signerKeys.forEach((key, index) => {
        if (isDefaultSignature(signatures[index])) {
          throw new TransactionSignerError(
            TransactionErrorCode.MissingSigner,
            `no signature for required signer ${key.toBase58()}`,
            key,
          );
        }
      });
    }

    signerKeys.forEach((key, index) => {
      const signature = signatures[index];
      if (signature === undefined || isDefaultSignature(signature)) {
        return;
      }
      if (!verify(signature, signData, key.toBytes())) {
        throw new TransactionSignerError(
          TransactionErrorCode.SignatureVerificationFailed,
          `signature for ${key.toBase58()} does not match the message`,
          key,
        );
      }
    });
  }

  /**
   * Serialize the transaction in the wire format: compact-array of
   * signatures followed by the message. Slots are written as they are,
   * unsigned ones included, unless `config` asks for checks first.
   */
  serialize(config?: SerializeConfig): Buffer {
    const {requireAllSignatures, verifySignatures} = Object.assign(
      {requireAllSignatures: false, verifySignatures: false},
      config,
    );

    const signData = this.message.serialize();
    if (verifySignatures) {
      this._verifySignatures(signData, requireAllSignatures);
    } else if (requireAllSignatures && !this.isSigned()) {
      throw new TransactionSignerError(
        TransactionErrorCode.NotEnoughSigners,
        'transaction is missing required signatures',
      );
    }

    return this._serialize(signData);
  }

  /**
   * @internal
   */
  _serialize(signData: Buffer): Buffer {
    const signatures = this.signatures ?? [];
    const signatureCount: number[] = [];
    shortvec.encodeLength(signatureCount, signatures.length);
    return Buffer.concat([Buffer.from(signatureCount), ...signatures, signData]);
  }

  /**
   * Parse a wire transaction into a BuiltTransaction object.
   */
  static from(buffer: Uint8Array | Array<number>): BuiltTransaction {
    const byteArray = [...buffer];

    const signatureCount = shortvec.decodeLength(byteArray);
    const signatures: Buffer[] = [];
    for (let i = 0; i < signatureCount; i++) {
      signatures.push(
        Buffer.from(takeBytes(byteArray, SIGNATURE_LENGTH_IN_BYTES, 'signature')),
      );
    }

    const message = Message.decode(byteArray);
    if (byteArray.length > 0) {
      throw new WireFormatError(
        `${byteArray.length} unexpected trailing bytes after transaction`,
      );
    }

    const {numRequiredSignatures} = message.header;
    if (signatureCount > 0 && signatureCount !== numRequiredSignatures) {
      console.warn(
        `Decoded transaction carries ${signatureCount} signatures but its ` +
          `message requires ${numRequiredSignatures}; the network will reject it as is.`,
      );
    }

    return new BuiltTransaction(
      message,
      signatureCount > 0 ? signatures : null,
    );
  }

  /**
   * @internal
   */
  _allocateSignatures(): Array<Buffer> {
    const numRequired = this.message.header.numRequiredSignatures;
    const signatures = this.signatures ?? [];
    while (signatures.length < numRequired) {
      signatures.push(Buffer.from(DEFAULT_SIGNATURE));
    }
    this.signatures = signatures;
    return signatures;
  }
}
