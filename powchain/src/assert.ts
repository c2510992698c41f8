/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export class Assert {
  static isNotUndefined<T>(x: undefined | T, message?: string): asserts x is T {
    if (x === undefined) {
      throw new Error(message || `Expected value not to be undefined`)
    }
  }

  static isNotNull<T>(x: null | T, message?: string): asserts x is T {
    if (x === null) {
      throw new Error(message || `Expected value not to be null`)
    }
  }
}
