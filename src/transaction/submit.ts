import bs58 from 'bs58';

import type {CheckpointHash} from '../checkpoint-hash';
import {WireFormatError} from '../errors';
import type {Signer} from '../signer';
import type {BuiltTransaction} from './built-transaction';
import {isDefaultSignature} from './built-transaction';
import {PACKET_DATA_SIZE} from './constants';
import {signTransaction} from './signing';

/**
 * Transaction signature as base-58 encoded string
 */
export type TransactionSignature = string;

/**
 * Supplies the current checkpoint hash, e.g. from a node's RPC endpoint
 */
export interface CheckpointHashSource {
  getLatestCheckpointHash(): Promise<CheckpointHash>;
}

/**
 * Hands a base64 encoded wire transaction to the network
 */
export interface TransactionSubmitter {
  sendRawTransaction(
    encodedTransaction: string,
    options: {encoding: 'base64'},
  ): Promise<TransactionSignature>;
}

/**
 * The base-58 fee payer signature that identifies a transaction, or null
 * while the fee payer has not signed.
 */
export function getTransactionId(
  transaction: BuiltTransaction,
): TransactionSignature | null {
  const {signature} = transaction;
  if (signature === null || isDefaultSignature(signature)) {
    return null;
  }
  return bs58.encode(signature);
}

/**
 * Fetch the latest checkpoint hash and fully sign `transaction` against it.
 */
export async function signWithLatestCheckpoint(
  source: CheckpointHashSource,
  transaction: BuiltTransaction,
  signers: ReadonlyArray<Signer>,
): Promise<BuiltTransaction> {
  const checkpointHash = await source.getLatestCheckpointHash();
  signTransaction(transaction, signers, checkpointHash);
  return transaction;
}

/**
 * Verify, serialize and submit a fully signed transaction. Retrying is up
 * to the submitter.
 *
 * Rejects transactions that do not fit in one network packet.
 */
export async function submitTransaction(
  submitter: TransactionSubmitter,
  transaction: BuiltTransaction,
): Promise<TransactionSignature> {
  const wireTransaction = transaction.serialize({
    requireAllSignatures: true,
    verifySignatures: true,
  });
  if (wireTransaction.length > PACKET_DATA_SIZE) {
    throw new WireFormatError(
      `Transaction too large: ${wireTransaction.length} > ${PACKET_DATA_SIZE}`,
    );
  }
  return await submitter.sendRawTransaction(
    wireTransaction.toString('base64'),
    {encoding: 'base64'},
  );
}
