/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Block } from '../primitives/block'
import { Transaction } from '../primitives/transaction'
import {
  BlockVerificationResult,
  ChainVerificationResult,
  VerificationResult,
  VerificationResultReason,
} from './verificationResult'

/**
 * Reports, rather than throws, why a transaction, block or chain is invalid.
 */
export class Verifier {
  static verifyTransaction(transaction: Transaction): VerificationResult {
    return transaction.verify()
  }

  /**
   * Verify a block against the block before it:
   *  *  previous hash links to the parent's cached hash
   *  *  every transaction is valid
   *  *  the cached hash matches a fresh hash of the contents
   *
   * Proof of work is not checked against any difficulty. A block stays valid
   * when the chain's difficulty is raised after it was mined.
   */
  static verifyBlock(block: Block, previous: Block): BlockVerificationResult {
    if (block.previousHash !== previous.hash) {
      return { valid: false, reason: VerificationResultReason.PREV_HASH_MISMATCH }
    }

    const transactionIndex = block.findInvalidTransaction()
    if (transactionIndex !== null) {
      return {
        valid: false,
        reason: VerificationResultReason.INVALID_TRANSACTION,
        transactionIndex,
      }
    }

    if (!block.isWellFormed() || block.computeHash() !== block.hash) {
      return { valid: false, reason: VerificationResultReason.BLOCK_TAMPERED }
    }

    return { valid: true }
  }

  static verifyGenesisBlock(genesis: Block): VerificationResult {
    if (
      !genesis.isGenesis() ||
      !genesis.isWellFormed() ||
      genesis.computeHash() !== genesis.hash
    ) {
      return { valid: false, reason: VerificationResultReason.INVALID_GENESIS_BLOCK }
    }

    return { valid: true }
  }

  static verifyChain(blocks: ReadonlyArray<Block>): ChainVerificationResult {
    if (blocks.length === 0) {
      return { valid: false, reason: VerificationResultReason.EMPTY_CHAIN }
    }

    const genesisResult = Verifier.verifyGenesisBlock(blocks[0])
    if (!genesisResult.valid) {
      return { ...genesisResult, index: 0 }
    }

    for (let index = 1; index < blocks.length; index++) {
      const result = Verifier.verifyBlock(blocks[index], blocks[index - 1])
      if (!result.valid) {
        return { ...result, index }
      }
    }

    return { valid: true }
  }
}
