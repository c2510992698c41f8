/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { sha256 } from '@noble/hashes/sha256'
import { bytesToHex } from '@noble/hashes/utils'

export function sha256Digest(data: Uint8Array): Uint8Array {
  return sha256(data)
}

export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256(data))
}

export const HashUtils = { sha256Digest, sha256Hex }
