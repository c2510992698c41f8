/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export enum VerificationResultReason {
  BLOCK_TAMPERED = 'Block hash does not match its contents',
  EMPTY_CHAIN = 'Chain has no genesis block',
  INVALID_GENESIS_BLOCK = 'Genesis block has been altered',
  INVALID_SIGNATURE = 'Signature does not verify against the sender',
  INVALID_TRANSACTION = 'Block contains an invalid transaction',
  MISSING_SIGNATURE = 'Transaction is missing a signature',
  PREV_HASH_MISMATCH = 'Previous block hash does not match expected hash',
}

/**
 * Indicate whether some entity is valid, and if not, provide a reason.
 */
export interface VerificationResult {
  valid: boolean
  reason?: VerificationResultReason
}

export interface BlockVerificationResult extends VerificationResult {
  // position of the first failing transaction inside the block
  transactionIndex?: number
}

export interface ChainVerificationResult extends BlockVerificationResult {
  // position of the first failing block inside the chain
  index?: number
}
