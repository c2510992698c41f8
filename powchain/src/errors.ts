/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export class InvalidSignerError extends Error {
  name = this.constructor.name

  constructor(sender: string | null) {
    super()
    this.message =
      sender === null
        ? 'Mining reward transactions cannot be signed'
        : `Private key does not belong to sender ${sender}`
  }
}

export class MissingSignatureError extends Error {
  name = this.constructor.name

  constructor() {
    super()
    this.message = 'Transaction is missing a signature'
  }
}

export class InvalidSignatureError extends Error {
  name = this.constructor.name

  constructor(sender: string) {
    super()
    this.message = `Signature does not verify against sender ${sender}`
  }
}

export class TransactionAlreadySignedError extends Error {
  name = this.constructor.name

  constructor() {
    super()
    this.message = 'Transaction has already been signed; create a new transaction instead'
  }
}

export class InvalidAmountError extends Error {
  name = this.constructor.name
  amount: number

  constructor(amount: number, requirement = 'a finite, non-negative number') {
    super()
    this.amount = amount
    this.message = `Transaction amount ${String(amount)} must be ${requirement}`
  }
}

export class InvalidAddressError extends Error {
  name = this.constructor.name

  constructor(field: 'sender' | 'recipient') {
    super()
    this.message = `Transaction ${field} must be a non-empty address`
  }
}

export class InvalidTransactionError extends Error {
  name = this.constructor.name
  reason: string
  index: number | null

  constructor(reason: string, index: number | null = null) {
    super()
    this.reason = reason
    this.index = index
    this.message =
      index === null
        ? `Invalid transaction: ${reason}`
        : `Invalid transaction at index ${index}: ${reason}`
  }
}

export class InvalidBlockError extends Error {
  name = this.constructor.name

  constructor(field: 'timestamp' | 'nonce', value: number) {
    super()
    this.message = `Block ${field} ${String(value)} must be a non-negative safe integer`
  }
}

export class ChainLinkageError extends Error {
  name = this.constructor.name
  index: number

  constructor(index: number) {
    super()
    this.index = index
    this.message = `Block ${index} does not link to the hash of block ${index - 1}`
  }
}

export class BlockTamperError extends Error {
  name = this.constructor.name
  index: number

  constructor(index: number) {
    super()
    this.index = index
    this.message = `Block ${index} hash does not match its contents`
  }
}

export class InvalidDifficultyError extends Error {
  name = this.constructor.name
  difficulty: number

  constructor(difficulty: number, min: number, max: number) {
    super()
    this.difficulty = difficulty
    this.message = `Difficulty ${String(difficulty)} must be an integer from ${min} to ${max}`
  }
}

export class EmptyChainError extends Error {
  name = this.constructor.name

  constructor() {
    super()
    this.message = 'Chain has no blocks; it must be created with a genesis block'
  }
}
