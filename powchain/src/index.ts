/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export * from './assert'
export * from './blockchain'
export * from './config'
export * from './consensus'
export * from './crypto'
export * from './errors'
export * from './event'
export * from './logger'
export * from './primitives'
export * from './serde/canonical'
export * from './utils'
