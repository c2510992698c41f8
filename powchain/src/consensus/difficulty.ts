/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { InvalidDifficultyError } from '../errors'

export const MIN_DIFFICULTY = 1

/**
 * A SHA-256 hex digest is 64 characters, so no hash can carry more leading
 * zeros than that and mining above it would never finish.
 */
export const MAX_DIFFICULTY = 64

export function isValidDifficulty(difficulty: number): boolean {
  return (
    Number.isInteger(difficulty) && difficulty >= MIN_DIFFICULTY && difficulty <= MAX_DIFFICULTY
  )
}

export function assertValidDifficulty(difficulty: number): void {
  if (!isValidDifficulty(difficulty)) {
    throw new InvalidDifficultyError(difficulty, MIN_DIFFICULTY, MAX_DIFFICULTY)
  }
}

/**
 * Difficulty is the number of leading zero hex characters a block hash needs.
 */
export function meetsDifficulty(hash: string, difficulty: number): boolean {
  return hash.startsWith('0'.repeat(difficulty))
}
