/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  VerificationResult,
  VerificationResultReason,
} from '../consensus/verificationResult'
import {
  Address,
  addressFromPrivateKey,
  isValidPrivateKey,
  PrivateKey,
  signDigest,
  verifyDigest,
} from '../crypto/keys'
import {
  InvalidAddressError,
  InvalidAmountError,
  InvalidSignatureError,
  InvalidSignerError,
  MissingSignatureError,
  TransactionAlreadySignedError,
} from '../errors'
import { serializeTransactionPayload } from '../serde/canonical'
import { sha256Digest } from '../utils/hash'

export type TransactionHash = string

export type SerializedTransaction = {
  sender: Address | null
  recipient: Address
  amount: number
  signature: string | null
}

export class Transaction {
  /**
   * The payer's address, or null for a mining reward which has no payer
   */
  readonly sender: Address | null
  readonly recipient: Address
  readonly amount: number

  private _signature: Buffer | null

  constructor(
    sender: Address | null,
    recipient: Address,
    amount: number,
    signature: Buffer | null = null,
  ) {
    if (sender !== null && (typeof sender !== 'string' || sender.length === 0)) {
      throw new InvalidAddressError('sender')
    }

    if (typeof recipient !== 'string' || recipient.length === 0) {
      throw new InvalidAddressError('recipient')
    }

    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidAmountError(amount)
    }

    // Hex addresses compare by value, and -0 would hash differently from 0
    this.sender = sender === null ? null : sender.toLowerCase()
    this.recipient = recipient.toLowerCase()
    this.amount = amount === 0 ? 0 : amount
    this._signature = signature
  }

  static minersReward(recipient: Address, amount: number): Transaction {
    return new Transaction(null, recipient, amount)
  }

  get signature(): Buffer | null {
    return this._signature
  }

  isMinersReward(): boolean {
    return this.sender === null
  }

  private digest(): Uint8Array {
    return sha256Digest(serializeTransactionPayload(this))
  }

  computeHash(): TransactionHash {
    return Buffer.from(this.digest()).toString('hex')
  }

  /**
   * Signs the transaction hash with the sender's private key. A transaction
   * can only be signed once.
   */
  sign(privateKey: PrivateKey): Buffer {
    if (this.sender === null) {
      throw new InvalidSignerError(this.sender)
    }

    if (this._signature !== null) {
      throw new TransactionAlreadySignedError()
    }

    if (!isValidPrivateKey(privateKey) || addressFromPrivateKey(privateKey) !== this.sender) {
      throw new InvalidSignerError(this.sender)
    }

    const signature = signDigest(this.digest(), privateKey)
    this._signature = signature
    return signature
  }

  verify(): VerificationResult {
    if (this.sender === null) {
      return { valid: true }
    }

    if (this._signature === null) {
      return { valid: false, reason: VerificationResultReason.MISSING_SIGNATURE }
    }

    if (!verifyDigest(this._signature, this.digest(), this.sender)) {
      return { valid: false, reason: VerificationResultReason.INVALID_SIGNATURE }
    }

    return { valid: true }
  }

  isValid(): boolean {
    return this.verify().valid
  }

  assertValid(): void {
    const result = this.verify()

    if (result.reason === VerificationResultReason.MISSING_SIGNATURE) {
      throw new MissingSignatureError()
    }

    if (!result.valid && this.sender !== null) {
      throw new InvalidSignatureError(this.sender)
    }
  }

  serialize(): SerializedTransaction {
    return {
      sender: this.sender,
      recipient: this.recipient,
      amount: this.amount,
      signature: this._signature ? this._signature.toString('hex') : null,
    }
  }

  static deserialize(serialized: SerializedTransaction): Transaction {
    return new Transaction(
      serialized.sender,
      serialized.recipient,
      serialized.amount,
      serialized.signature === null ? null : Buffer.from(serialized.signature, 'hex'),
    )
  }
}
