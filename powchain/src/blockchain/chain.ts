/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Config } from '../config/config'
import { assertValidDifficulty } from '../consensus/difficulty'
import {
  ChainVerificationResult,
  VerificationResultReason,
} from '../consensus/verificationResult'
import { Verifier } from '../consensus/verifier'
import { Address } from '../crypto/keys'
import {
  BlockTamperError,
  ChainLinkageError,
  EmptyChainError,
  InvalidAmountError,
  InvalidTransactionError,
} from '../errors'
import { Event } from '../event'
import { createRootLogger, Logger } from '../logger'
import { Block, GENESIS_BLOCK_PREVIOUS } from '../primitives/block'
import { Transaction } from '../primitives/transaction'
import { ErrorUtils } from '../utils/error'

export type ChainOptions = {
  /**
   * Initial difficulty. Falls back to the config's `difficulty`.
   */
  difficulty?: number
  /**
   * Falls back to the config's `minerReward`.
   */
  minerReward?: number
  config?: Config
  logger?: Logger
}

/**
 * Owns the blocks and the pool of pending transactions. Not safe for
 * concurrent callers: mining runs synchronously and blocks until a nonce is
 * found.
 */
export class Chain {
  readonly logger: Logger
  readonly minerReward: number

  /**
   * Index 0 is always the genesis block
   */
  readonly blocks: Block[] = []

  // When ever a transaction is accepted into the pool
  readonly onTransactionAdded = new Event<[transaction: Transaction]>()
  // When ever a mined block is appended to the chain
  readonly onConnectBlock = new Event<[block: Block]>()

  private pool: Transaction[] = []
  private _difficulty: number

  constructor(options: ChainOptions = {}) {
    const config = options.config ?? new Config()
    this.logger = (options.logger ?? createRootLogger()).withTag('chain')

    const difficulty = options.difficulty ?? config.get('difficulty')
    assertValidDifficulty(difficulty)
    this._difficulty = difficulty

    const minerReward = options.minerReward ?? config.get('minerReward')
    if (!Number.isFinite(minerReward) || minerReward < 0) {
      throw new InvalidAmountError(minerReward)
    }
    this.minerReward = minerReward === 0 ? 0 : minerReward

    this.blocks.push(Chain.createGenesisBlock())
  }

  /**
   * The genesis block has no transactions and is never mined
   */
  static createGenesisBlock(timestamp?: Date): Block {
    return new Block([], GENESIS_BLOCK_PREVIOUS, timestamp)
  }

  get difficulty(): number {
    return this._difficulty
  }

  get pendingTransactions(): ReadonlyArray<Transaction> {
    return this.pool
  }

  get length(): number {
    return this.blocks.length
  }

  get genesis(): Block {
    const genesis = this.blocks[0]
    if (genesis === undefined) {
      throw new EmptyChainError()
    }
    return genesis
  }

  get head(): Block {
    const head = this.blocks[this.blocks.length - 1]
    if (head === undefined) {
      throw new EmptyChainError()
    }
    return head
  }

  getBlock(index: number): Block | null {
    return this.blocks[index] ?? null
  }

  /**
   * Only takes effect for blocks mined afterwards. Existing blocks are not
   * checked against the new value.
   */
  setDifficulty(difficulty: number): void {
    assertValidDifficulty(difficulty)

    if (difficulty !== this._difficulty) {
      this.logger.debug(`Difficulty changed from ${this._difficulty} to ${difficulty}`)
    }

    this._difficulty = difficulty
  }

  addTransaction(transaction: Transaction): void {
    if (transaction.isMinersReward()) {
      throw new InvalidTransactionError('Mining rewards can only be created by the chain')
    }

    if (!(transaction.amount > 0)) {
      throw new InvalidAmountError(transaction.amount, 'greater than zero')
    }

    const result = transaction.verify()
    if (!result.valid) {
      throw new InvalidTransactionError(
        result.reason ?? VerificationResultReason.INVALID_TRANSACTION,
      )
    }

    this.pool.push(transaction)
    this.logger.debug(
      `Added transaction ${transaction.computeHash()} to the pool (${this.pool.length} pending)`,
    )
    this.onTransactionAdded.emit(transaction)
  }

  /**
   * Mines the pending pool into a new block and appends it. The block holds
   * whatever reward a previous call queued; the reward for this block is
   * queued for the next one.
   */
  mineTransactionPool(minerAddress: Address): Block {
    const previous = this.head
    const reward = Transaction.minersReward(minerAddress, this.minerReward)

    const block = new Block([...this.pool], previous.hash)

    const start = Date.now()
    try {
      block.mine(this._difficulty)
    } catch (error: unknown) {
      this.logger.error(`Could not mine the pending pool: ${ErrorUtils.renderError(error)}`)
      throw error
    }
    const elapsed = Date.now() - start

    this.blocks.push(block)
    this.pool = [reward]

    this.logger.info(
      `Mined block ${this.blocks.length - 1} ${block.hash} with ${
        block.transactions.length
      } transactions (nonce ${block.nonce}, difficulty ${this._difficulty}, ${elapsed}ms)`,
    )

    this.onConnectBlock.emit(block)
    return block
  }

  /**
   * Re-derives every block hash and re-checks every signature. Difficulty is
   * not checked retroactively.
   */
  verifyChain(): ChainVerificationResult {
    return Verifier.verifyChain(this.blocks)
  }

  validateChain(): boolean {
    const result = this.verifyChain()

    if (!result.valid) {
      this.logger.warn(
        `Chain is invalid at block ${String(result.index)}: ${String(result.reason)}`,
      )
    }

    return result.valid
  }

  assertValidChain(): void {
    const result = this.verifyChain()

    if (result.valid) {
      return
    }

    const index = result.index ?? 0

    switch (result.reason) {
      case VerificationResultReason.PREV_HASH_MISMATCH:
        throw new ChainLinkageError(index)
      case VerificationResultReason.INVALID_TRANSACTION:
        throw new InvalidTransactionError(
          `block ${index} failed verification`,
          result.transactionIndex ?? null,
        )
      case VerificationResultReason.EMPTY_CHAIN:
        throw new EmptyChainError()
      default:
        throw new BlockTamperError(index)
    }
  }
}
