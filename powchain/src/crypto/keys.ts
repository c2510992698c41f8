/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { hmac } from '@noble/hashes/hmac'
import { sha256 } from '@noble/hashes/sha256'
import { bytesToHex } from '@noble/hashes/utils'
import * as secp from '@noble/secp256k1'

// Synchronous signing needs an HMAC for RFC 6979 nonces
secp.utils.hmacSha256Sync = (key: Uint8Array, ...messages: Uint8Array[]): Uint8Array =>
  hmac(sha256, key, secp.utils.concatBytes(...messages))

/**
 * Hex encoding of a compressed secp256k1 public key (33 bytes, 66 characters)
 */
export type Address = string

/**
 * A secp256k1 private key as raw bytes or a 64 character hex string
 */
export type PrivateKey = Uint8Array | string

export type Key = {
  privateKey: string
  address: Address
}

export function generateKey(): Key {
  const privateKey = secp.utils.randomPrivateKey()

  return {
    privateKey: bytesToHex(privateKey),
    address: addressFromPrivateKey(privateKey),
  }
}

export function isValidPrivateKey(privateKey: PrivateKey): boolean {
  return secp.utils.isValidPrivateKey(privateKey)
}

export function addressFromPrivateKey(privateKey: PrivateKey): Address {
  return bytesToHex(secp.getPublicKey(privateKey, true))
}

/**
 * Produces a DER encoded, low-s ECDSA signature over a 32 byte digest
 */
export function signDigest(digest: Uint8Array, privateKey: PrivateKey): Buffer {
  return Buffer.from(secp.signSync(digest, privateKey))
}

/**
 * Returns false, rather than throwing, when the signature or the address
 * cannot be decoded.
 */
export function verifyDigest(signature: Uint8Array, digest: Uint8Array, address: Address): boolean {
  return secp.verify(signature, digest, address)
}

export const KeyUtils = {
  generateKey,
  isValidPrivateKey,
  addressFromPrivateKey,
  signDigest,
  verifyDigest,
}
