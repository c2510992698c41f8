/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import bufio from 'bufio'

// IMPORTANT: these layouts are what gets hashed and signed. Changing the
// field order or encoding changes every hash and invalidates existing chains.

export type TransactionFields = {
  sender: string | null
  recipient: string
  amount: number
}

export type BlockFields = {
  transactions: ReadonlyArray<TransactionFields & { signature: Buffer | null }>
  timestamp: Date
  previousHash: string
}

/**
 * The bytes a transaction hash commits to: sender, recipient and amount.
 * The signature is not included, since it signs this hash.
 */
export function serializeTransactionPayload(transaction: TransactionFields): Buffer {
  const bw = bufio.write()

  if (transaction.sender === null) {
    bw.writeU8(0)
  } else {
    bw.writeU8(1)
    bw.writeVarString(transaction.sender, 'utf8')
  }

  bw.writeVarString(transaction.recipient, 'utf8')
  bw.writeDouble(transaction.amount)
  return bw.render()
}

/**
 * Everything in a block hash except the nonce. Mining serializes this once
 * and appends each candidate nonce to it.
 */
export function serializeBlockPartial(block: BlockFields): Buffer {
  const bw = bufio.write()

  bw.writeVarint(block.transactions.length)
  for (const transaction of block.transactions) {
    const record = bufio.write()
    record.writeVarBytes(serializeTransactionPayload(transaction))
    record.writeVarBytes(transaction.signature ?? Buffer.alloc(0))
    bw.writeVarBytes(record.render())
  }

  bw.writeU64(block.timestamp.getTime())
  bw.writeVarString(block.previousHash, 'utf8')
  return bw.render()
}

export function appendNonce(partial: Buffer, nonce: number): Buffer {
  return bufio.write(partial.byteLength + 8).writeBytes(partial).writeU64(nonce).render()
}
