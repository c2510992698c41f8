/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Assert } from '../assert'
import { Config } from '../config/config'
import { VerificationResultReason } from '../consensus/verificationResult'
import { generateKey } from '../crypto/keys'
import {
  BlockTamperError,
  ChainLinkageError,
  EmptyChainError,
  InvalidAmountError,
  InvalidDifficultyError,
  InvalidTransactionError,
} from '../errors'
import { Block, GENESIS_BLOCK_PREVIOUS, SerializedBlock } from '../primitives/block'
import { Transaction } from '../primitives/transaction'
import {
  createTestChain,
  createTestLogger,
  useSignedTxFixture,
  useTamperedTxFixture,
} from '../testUtilities'
import { Chain } from './chain'

describe('Chain', () => {
  const alice = generateKey()
  const bob = generateKey()
  const miner = generateKey()

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('starts with only a genesis block', () => {
    const chain = createTestChain()

    expect(chain.length).toBe(1)
    expect(chain.genesis).toBe(chain.head)
    expect(chain.genesis.previousHash).toEqual(GENESIS_BLOCK_PREVIOUS)
    expect(chain.genesis.transactions).toHaveLength(0)
    expect(chain.pendingTransactions).toHaveLength(0)
    expect(chain.validateChain()).toBe(true)
  })

  it('uses the default difficulty and reward', () => {
    const chain = new Chain({ logger: createTestLogger() })

    expect(chain.difficulty).toBe(4)
    expect(chain.minerReward).toBe(50)
  })

  it('reads difficulty and reward from the config', () => {
    const config = new Config({ difficulty: 2, minerReward: 25 })
    const chain = new Chain({ config, logger: createTestLogger() })

    expect(chain.difficulty).toBe(2)
    expect(chain.minerReward).toBe(25)
  })

  it('prefers options over the config', () => {
    const config = new Config({ difficulty: 2 })
    const chain = new Chain({ config, difficulty: 3, logger: createTestLogger() })

    expect(chain.difficulty).toBe(3)
  })

  it('throws on an invalid initial difficulty or reward', () => {
    expect(() => createTestChain({ difficulty: 0 })).toThrow(InvalidDifficultyError)
    expect(() => createTestChain({ minerReward: -1 })).toThrow(InvalidAmountError)
  })

  describe('addTransaction', () => {
    it('adds a signed transaction to the pool', () => {
      const chain = createTestChain()
      const onTransactionAdded = jest.fn()
      chain.onTransactionAdded.on(onTransactionAdded)

      const transaction = useSignedTxFixture(alice, bob.address)
      chain.addTransaction(transaction)

      expect(chain.pendingTransactions).toEqual([transaction])
      expect(onTransactionAdded).toHaveBeenCalledTimes(1)
      expect(onTransactionAdded).toHaveBeenCalledWith(transaction)
    })

    it('rejects mining rewards', () => {
      const chain = createTestChain()

      expect(() => chain.addTransaction(Transaction.minersReward(bob.address, 50))).toThrow(
        InvalidTransactionError,
      )
      expect(chain.pendingTransactions).toHaveLength(0)
    })

    it('rejects a zero amount', () => {
      const chain = createTestChain()

      expect(() => chain.addTransaction(useSignedTxFixture(alice, bob.address, 0))).toThrow(
        InvalidAmountError,
      )
      expect(chain.pendingTransactions).toHaveLength(0)
    })

    it('rejects unsigned transactions', () => {
      const chain = createTestChain()
      const onTransactionAdded = jest.fn()
      chain.onTransactionAdded.on(onTransactionAdded)

      expect(() => chain.addTransaction(new Transaction(alice.address, bob.address, 5))).toThrow(
        `Invalid transaction: ${VerificationResultReason.MISSING_SIGNATURE}`,
      )
      expect(chain.pendingTransactions).toHaveLength(0)
      expect(onTransactionAdded).not.toHaveBeenCalled()
    })

    it('rejects transactions with a bad signature', () => {
      const chain = createTestChain()
      const tampered = useTamperedTxFixture(useSignedTxFixture(alice, bob.address, 5), {
        amount: 500,
      })

      expect(() => chain.addTransaction(tampered)).toThrow(
        `Invalid transaction: ${VerificationResultReason.INVALID_SIGNATURE}`,
      )
    })
  })

  describe('mineTransactionPool', () => {
    it('mines the pool and queues the reward for the next block', () => {
      const chain = createTestChain()
      const transaction = useSignedTxFixture(alice, bob.address, 10)
      chain.addTransaction(transaction)

      const block = chain.mineTransactionPool(miner.address)

      expect(chain.length).toBe(2)
      expect(chain.head).toBe(block)
      expect(block.previousHash).toEqual(chain.genesis.hash)
      expect(block.transactions).toEqual([transaction])
      expect(block.hash.startsWith('0')).toBe(true)

      expect(chain.pendingTransactions).toHaveLength(1)
      const reward = chain.pendingTransactions[0]
      expect(reward.isMinersReward()).toBe(true)
      expect(reward.sender).toBeNull()
      expect(reward.recipient).toEqual(miner.address)
      expect(reward.amount).toBe(50)

      expect(chain.validateChain()).toBe(true)
    })

    it('includes the previous reward in the next block', () => {
      const chain = createTestChain()
      chain.mineTransactionPool(miner.address)

      const transaction = useSignedTxFixture(alice, bob.address, 3)
      chain.addTransaction(transaction)
      const block = chain.mineTransactionPool(bob.address)

      expect(block.transactions).toHaveLength(2)
      expect(block.transactions[0].isMinersReward()).toBe(true)
      expect(block.transactions[0].recipient).toEqual(miner.address)
      expect(block.transactions[1]).toBe(transaction)

      const reward = chain.pendingTransactions[0]
      Assert.isNotUndefined(reward)
      expect(reward.recipient).toEqual(bob.address)
      expect(chain.validateChain()).toBe(true)
    })

    it('mines an empty pool', () => {
      const chain = createTestChain()

      const block = chain.mineTransactionPool(miner.address)

      expect(block.transactions).toHaveLength(0)
      expect(chain.length).toBe(2)
      expect(chain.validateChain()).toBe(true)
    })

    it('emits the connected block', () => {
      const chain = createTestChain()
      const onConnectBlock = jest.fn()
      chain.onConnectBlock.on(onConnectBlock)

      const block = chain.mineTransactionPool(miner.address)

      expect(onConnectBlock).toHaveBeenCalledTimes(1)
      expect(onConnectBlock).toHaveBeenCalledWith(block)
    })

    it('leaves the chain unchanged when mining fails', () => {
      const chain = createTestChain()
      const transaction = useSignedTxFixture(alice, bob.address)
      chain.addTransaction(transaction)
      const error = jest.spyOn(chain.logger, 'error')

      jest.spyOn(Block.prototype, 'mine').mockImplementation(() => {
        throw new Error('interrupted')
      })

      expect(() => chain.mineTransactionPool(miner.address)).toThrow('interrupted')
      expect(chain.length).toBe(1)
      expect(chain.pendingTransactions).toEqual([transaction])
      expect(error).toHaveBeenCalledWith('Could not mine the pending pool: interrupted')
    })

    it('keeps a zero reward valid across a JSON round trip', () => {
      const chain = createTestChain({ minerReward: -0 })
      chain.mineTransactionPool(miner.address)
      const block = chain.mineTransactionPool(miner.address)

      const json: SerializedBlock = JSON.parse(JSON.stringify(block.serialize()))
      const restored = Block.deserialize(json)

      expect(chain.minerReward).toBe(0)
      expect(restored.transactions[0].amount).toBe(0)
      expect(restored.computeHash()).toEqual(block.hash)
    })

    it('mines at the difficulty set afterwards', () => {
      const chain = createTestChain()
      chain.setDifficulty(3)

      const block = chain.mineTransactionPool(miner.address)

      expect(block.hash.slice(0, 3)).toBe('000')
    })
  })

  describe('setDifficulty', () => {
    it('throws on values outside 1 to 64', () => {
      const chain = createTestChain()

      expect(() => chain.setDifficulty(0)).toThrow(InvalidDifficultyError)
      expect(() => chain.setDifficulty(65)).toThrow(InvalidDifficultyError)
      expect(() => chain.setDifficulty(2.5)).toThrow(InvalidDifficultyError)
      expect(chain.difficulty).toBe(1)
    })

    it('does not invalidate blocks mined at a lower difficulty', () => {
      const chain = createTestChain()
      chain.mineTransactionPool(miner.address)

      chain.setDifficulty(64)

      expect(chain.difficulty).toBe(64)
      expect(chain.validateChain()).toBe(true)
    })
  })

  describe('validateChain', () => {
    function buildChain(): Chain {
      const chain = createTestChain()
      chain.addTransaction(useSignedTxFixture(alice, bob.address, 10))
      chain.mineTransactionPool(miner.address)
      chain.addTransaction(useSignedTxFixture(bob, alice.address, 4))
      chain.mineTransactionPool(miner.address)
      return chain
    }

    it('detects a tampered transaction', () => {
      const chain = buildChain()
      const block = chain.blocks[1]
      block.transactions[0] = useTamperedTxFixture(block.transactions[0], { amount: 1000 })

      expect(chain.validateChain()).toBe(false)
      expect(chain.verifyChain()).toEqual({
        valid: false,
        reason: VerificationResultReason.INVALID_TRANSACTION,
        transactionIndex: 0,
        index: 1,
      })
      expect(() => chain.assertValidChain()).toThrow(InvalidTransactionError)
    })

    it('detects a broken link', () => {
      const chain = buildChain()
      chain.blocks[2].previousHash = 'ab'.repeat(32)

      expect(chain.verifyChain()).toMatchObject({
        valid: false,
        reason: VerificationResultReason.PREV_HASH_MISMATCH,
        index: 2,
      })
      expect(() => chain.assertValidChain()).toThrow(ChainLinkageError)
    })

    it('detects a transaction added after mining', () => {
      const chain = buildChain()
      chain.blocks[1].transactions.push(Transaction.minersReward(alice.address, 1000))

      expect(chain.verifyChain()).toMatchObject({
        valid: false,
        reason: VerificationResultReason.BLOCK_TAMPERED,
        index: 1,
      })
      expect(() => chain.assertValidChain()).toThrow(BlockTamperError)
    })

    it('detects an altered genesis block', () => {
      const chain = buildChain()
      chain.blocks[0].transactions.push(Transaction.minersReward(alice.address, 1000))

      expect(chain.verifyChain()).toEqual({
        valid: false,
        reason: VerificationResultReason.INVALID_GENESIS_BLOCK,
        index: 0,
      })
      expect(() => chain.assertValidChain()).toThrow(BlockTamperError)
    })

    it('reports a timestamp the encoding cannot hold', () => {
      const chain = buildChain()
      chain.blocks[1].timestamp.setTime(NaN)

      expect(chain.validateChain()).toBe(false)
      expect(chain.verifyChain()).toEqual({
        valid: false,
        reason: VerificationResultReason.BLOCK_TAMPERED,
        index: 1,
      })
    })

    it('warns about the invalid block', () => {
      const chain = buildChain()
      chain.blocks[2].previousHash = 'ab'.repeat(32)
      const warn = jest.spyOn(chain.logger, 'warn')

      chain.validateChain()

      expect(warn).toHaveBeenCalledWith(
        `Chain is invalid at block 2: ${VerificationResultReason.PREV_HASH_MISMATCH}`,
      )
    })

    it('throws when every block has been removed', () => {
      const chain = buildChain()
      chain.blocks.splice(0)

      expect(chain.validateChain()).toBe(false)
      expect(() => chain.assertValidChain()).toThrow(EmptyChainError)
      expect(() => chain.head).toThrow(EmptyChainError)
      expect(() => chain.mineTransactionPool(miner.address)).toThrow(EmptyChainError)
    })
  })
})
