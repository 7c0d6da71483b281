import type {CheckpointHash} from '../checkpoint-hash';
import {TransactionErrorCode, TransactionSignerError} from '../errors';
import type {Message} from '../message';
import type {Signer} from '../signer';
import type {BuiltTransaction} from './built-transaction';
import {isDefaultSignature} from './built-transaction';

/**
 * Sign a transaction with a subset of its required signers.
 *
 * If `checkpointHash` differs from the message's, the message is updated
 * and every existing signature is cleared first. Otherwise slots filled by
 * earlier calls are left alone, so parties can sign one after another.
 * Signers that are not required by the message are skipped.
 */
export function partialSignTransaction(
  transaction: BuiltTransaction,
  signers: ReadonlyArray<Signer>,
  checkpointHash: CheckpointHash,
) {
  transaction.setCheckpointHash(checkpointHash);
  transaction.sign(signers);
}

/**
 * Sign a transaction and require that every signature slot ends up filled.
 *
 * @throws {TransactionSignerError} `NotEnoughSigners` naming the first
 * required signer that is still unsigned
 */
export function signTransaction(
  transaction: BuiltTransaction,
  signers: ReadonlyArray<Signer>,
  checkpointHash: CheckpointHash,
) {
  partialSignTransaction(transaction, signers, checkpointHash);

  if (!transaction.isSigned()) {
    const signatures = transaction.signatures ?? [];
    const unsigned = transaction.requiredSigners.filter((_, index) => {
      const signature = signatures[index];
      return signature === undefined || isDefaultSignature(signature);
    });
    throw new TransactionSignerError(
      TransactionErrorCode.NotEnoughSigners,
      `missing signatures for ${unsigned.map(key => key.toBase58()).join(', ')}`,
      unsigned[0],
    );
  }
}

/**
 * Verify every required signature of a transaction.
 */
export function verifyTransaction(transaction: BuiltTransaction) {
  transaction.verify();
}

/**
 * For each signer, its slot index among the message's required signers,
 * or null if the message does not require its signature.
 */
export function getSignerPositions(
  message: Message,
  signers: ReadonlyArray<Pick<Signer, 'publicKey'>>,
): Array<number | null> {
  const signerKeys = message.signerKeys();
  return signers.map(signer => {
    const index = signerKeys.findIndex(key => key.equals(signer.publicKey));
    return index < 0 ? null : index;
  });
}
