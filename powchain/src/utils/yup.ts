/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import * as yup from 'yup'
import { UnwrapPromise } from './types'

// The context stays open so object schemas with an `AnyObject` context fit
export type YupSchema = yup.AnySchema

export type YupSchemaResult<S extends YupSchema> = UnwrapPromise<
  ReturnType<S['validate']>
>

export class YupUtils {
  static isDifficulty = yup.number().integer().min(1).max(64)
  static isNonNegativeAmount = yup.number().min(0)

  static tryValidateSync<S extends YupSchema>(
    schema: S,
    value: unknown,
    options?: yup.ValidateOptions<unknown>,
  ):
    | { result: YupSchemaResult<S>; error: null }
    | { result: null; error: yup.ValidationError } {
    if (!options) {
      options = { stripUnknown: true }
    }

    if (options.stripUnknown === undefined) {
      options.stripUnknown = true
    }

    try {
      const result = schema.validateSync(value, options) as YupSchemaResult<S>
      return { result: result, error: null }
    } catch (e) {
      if (e instanceof yup.ValidationError) {
        return { result: null, error: e }
      }
      throw e
    }
  }
}
