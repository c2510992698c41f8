/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import consola, { LogLevel } from 'consola'
import { Chain, ChainOptions } from '../blockchain'
import { Address, generateKey, Key } from '../crypto/keys'
import { Logger } from '../logger'
import { Transaction } from '../primitives/transaction'

/**
 * A logger with no reporters, so tests stay quiet
 */
export function createTestLogger(): Logger {
  return consola.create({ reporters: [], level: LogLevel.Silent })
}

/**
 * A chain at difficulty 1 so mining in tests takes a handful of hashes
 */
export function createTestChain(options: ChainOptions = {}): Chain {
  return new Chain({ difficulty: 1, logger: createTestLogger(), ...options })
}

export function useSignedTxFixture(
  from: Key,
  to: Address = generateKey().address,
  amount = 10,
): Transaction {
  const transaction = new Transaction(from.address, to, amount)
  transaction.sign(from.privateKey)
  return transaction
}

/**
 * Builds a copy of a signed transaction with some fields changed but the
 * original signature kept
 */
export function useTamperedTxFixture(
  transaction: Transaction,
  changes: Partial<{ recipient: Address; amount: number }>,
): Transaction {
  return Transaction.deserialize({ ...transaction.serialize(), ...changes })
}
