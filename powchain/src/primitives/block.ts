/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { assertValidDifficulty, meetsDifficulty } from '../consensus/difficulty'
import { VerificationResultReason } from '../consensus/verificationResult'
import { InvalidBlockError, InvalidTransactionError } from '../errors'
import { appendNonce, serializeBlockPartial } from '../serde/canonical'
import { sha256Hex } from '../utils/hash'
import { SerializedTransaction, Transaction } from './transaction'

export type BlockHash = string

/**
 * The previous hash of the genesis block, which has no parent
 */
export const GENESIS_BLOCK_PREVIOUS: BlockHash = '0'.repeat(64)

export type SerializedBlock = {
  transactions: SerializedTransaction[]
  timestamp: number
  previousHash: BlockHash
  nonce: number
  hash: BlockHash
}

function isU64(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

export class Block {
  /**
   * Ordered transactions. The order is part of the block hash.
   */
  transactions: Transaction[]

  /**
   * The hash of the previous block in the chain
   */
  previousHash: BlockHash

  readonly timestamp: Date

  private _nonce: number

  /**
   * The hash cached when the block was created or mined. Validation compares
   * it with a fresh `computeHash()` to detect changes made afterwards.
   */
  private _hash: BlockHash

  constructor(
    transactions: Transaction[],
    previousHash: BlockHash,
    timestamp: Date | undefined = undefined,
    nonce = 0,
    hash?: BlockHash,
  ) {
    timestamp = timestamp || new Date()

    // Both are written as u64 when hashing
    if (!isU64(timestamp.getTime())) {
      throw new InvalidBlockError('timestamp', timestamp.getTime())
    }
    if (!isU64(nonce)) {
      throw new InvalidBlockError('nonce', nonce)
    }

    this.transactions = transactions
    this.previousHash = previousHash
    this.timestamp = timestamp
    this._nonce = nonce
    this._hash = hash || this.computeHash()
  }

  get nonce(): number {
    return this._nonce
  }

  get hash(): BlockHash {
    return this._hash
  }

  /**
   * False when the timestamp was changed in place to a value the block
   * encoding cannot hold
   */
  isWellFormed(): boolean {
    return isU64(this.timestamp.getTime()) && isU64(this._nonce)
  }

  isGenesis(): boolean {
    return this.previousHash === GENESIS_BLOCK_PREVIOUS && this.transactions.length === 0
  }

  /**
   * Serialize everything but the nonce. This is used both for mining and for
   * verifying the hash.
   */
  serializePartial(): Buffer {
    return serializeBlockPartial(this)
  }

  computeHash(): BlockHash {
    return sha256Hex(appendNonce(this.serializePartial(), this._nonce))
  }

  meetsDifficulty(difficulty: number): boolean {
    return meetsDifficulty(this._hash, difficulty)
  }

  /**
   * Proof of work: increment the nonce until the hash starts with
   * `difficulty` zero hex characters. There is no iteration limit, and the
   * loop never yields.
   */
  mine(difficulty: number): BlockHash {
    assertValidDifficulty(difficulty)
    this.assertValidTransactions()

    const partial = this.serializePartial()

    let nonce = this._nonce
    let hash = sha256Hex(appendNonce(partial, nonce))

    while (!meetsDifficulty(hash, difficulty)) {
      nonce++
      hash = sha256Hex(appendNonce(partial, nonce))
    }

    this._nonce = nonce
    this._hash = hash
    return hash
  }

  /**
   * @returns the index of the first transaction that fails verification, or null
   */
  findInvalidTransaction(): number | null {
    const index = this.transactions.findIndex((transaction) => !transaction.isValid())
    return index === -1 ? null : index
  }

  validateTransactions(): boolean {
    return this.findInvalidTransaction() === null
  }

  assertValidTransactions(): void {
    const index = this.findInvalidTransaction()

    if (index !== null) {
      const reason = this.transactions[index].verify().reason
      throw new InvalidTransactionError(
        reason ?? VerificationResultReason.INVALID_TRANSACTION,
        index,
      )
    }
  }

  serialize(): SerializedBlock {
    return {
      transactions: this.transactions.map((t) => t.serialize()),
      timestamp: this.timestamp.getTime(),
      previousHash: this.previousHash,
      nonce: this._nonce,
      hash: this._hash,
    }
  }

  /**
   * Restores a block with its stored hash, so a block whose contents no
   * longer match that hash is still detected by validation.
   */
  static deserialize(serialized: SerializedBlock): Block {
    return new Block(
      serialized.transactions.map((t) => Transaction.deserialize(t)),
      serialized.previousHash,
      new Date(serialized.timestamp),
      serialized.nonce,
      serialized.hash,
    )
  }
}
