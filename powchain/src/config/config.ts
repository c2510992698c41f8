/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import * as yup from 'yup'
import { Event } from '../event'
import { parseLogLevelConfig } from '../logger/logLevelParser'
import { YupUtils } from '../utils/yup'

export const DEFAULT_DIFFICULTY = 4
export const DEFAULT_MINER_REWARD = 50
export const DEFAULT_LOG_LEVEL = '*:info'

export type ConfigOptions = {
  /**
   * The number of leading zero hex characters a newly mined block hash needs.
   * Changing it only affects blocks mined afterwards.
   */
  difficulty: number
  /**
   * The amount credited to the miner after each mined block. The reward is
   * queued into the next block, not the one just mined.
   */
  minerReward: number
  /**
   * Log levels are formatted like so:
   * `*:warn,tag:info`
   *
   * ex: `warn` or `*:warn` displays only logs that are warns or errors.
   *
   * ex: `*:warn,chain:debug` displays warns and errors, as well as debug
   *     logs from the chain.
   */
  logLevel: string
  /**
   * String to be prefixed to all logs. Accepts the following replacements:
   * %time% : The time of the log
   * %tag% : The tags on the log
   * %level% : The log level
   *
   * ex: `[%time%] [%level%] [%tag%]`
   */
  logPrefix: string
  jsonLogs: boolean
  colorLogs: boolean
}

export const ConfigOptionsSchema: yup.ObjectSchema<Partial<ConfigOptions>> = yup
  .object({
    difficulty: YupUtils.isDifficulty,
    minerReward: YupUtils.isNonNegativeAmount,
    logLevel: yup.string().test('logLevel', 'logLevel must look like *:warn,tag:debug', (val) => {
      if (val == null) {
        return true
      }

      try {
        parseLogLevelConfig(val)
        return true
      } catch {
        return false
      }
    }),
    logPrefix: yup.string(),
    jsonLogs: yup.boolean(),
    colorLogs: yup.boolean(),
  })
  .defined()

export class Config {
  readonly defaults: ConfigOptions
  private loaded: Partial<ConfigOptions> = {}
  private overrides: Partial<ConfigOptions> = {}

  readonly onConfigChange: Event<
    [key: keyof ConfigOptions, value: ConfigOptions[keyof ConfigOptions]]
  > = new Event()

  constructor(overrides: Partial<ConfigOptions> = {}) {
    this.defaults = Config.GetDefaults()

    const validated = Config.validate(overrides)
    this.overrides = Config.definedOnly(validated)
  }

  static GetDefaults(): ConfigOptions {
    return {
      difficulty: DEFAULT_DIFFICULTY,
      minerReward: DEFAULT_MINER_REWARD,
      logLevel: DEFAULT_LOG_LEVEL,
      logPrefix: '',
      jsonLogs: false,
      colorLogs: false,
    }
  }

  get config(): Readonly<ConfigOptions> {
    return { ...this.defaults, ...this.loaded, ...this.overrides }
  }

  /**
   * Replaces the loaded values with `data`, which may come from a parsed
   * config file or any other untrusted source. Unknown keys are dropped.
   */
  load(data: unknown): void {
    const validated = Config.validate(data)
    const previous = this.config

    this.loaded = Config.definedOnly(validated)
    this.emitChanges(previous)
  }

  get<T extends keyof ConfigOptions>(key: T): ConfigOptions[T] {
    return this.config[key]
  }

  set<T extends keyof ConfigOptions>(key: T, value: ConfigOptions[T]): void {
    const validated = Config.validate({ [key]: value })
    const previous = this.config

    this.loaded = { ...this.loaded, ...Config.definedOnly(validated) }
    this.overrides = Config.without(this.overrides, key)
    this.emitChanges(previous)
  }

  setMany(params: Partial<ConfigOptions>): void {
    const validated = Config.validate(params)
    const previous = this.config

    this.loaded = { ...this.loaded, ...Config.definedOnly(validated) }

    let key: keyof ConfigOptions
    for (key in validated) {
      this.overrides = Config.without(this.overrides, key)
    }
    this.emitChanges(previous)
  }

  /**
   * Overrides take precedence over loaded values, e.g. for command line flags.
   */
  setOverride<T extends keyof ConfigOptions>(key: T, value: ConfigOptions[T]): void {
    const validated = Config.validate({ [key]: value })
    const previous = this.config

    this.overrides = { ...this.overrides, ...Config.definedOnly(validated) }
    this.emitChanges(previous)
  }

  clear<T extends keyof ConfigOptions>(key: T): void {
    const previous = this.config

    this.loaded = Config.without(this.loaded, key)
    this.overrides = Config.without(this.overrides, key)
    this.emitChanges(previous)
  }

  /**
   * Returns true if the key is set, or false if its value is from the defaults
   */
  isSet<T extends keyof ConfigOptions>(key: T): boolean {
    return this.loaded[key] !== undefined || this.overrides[key] !== undefined
  }

  private emitChanges(previous: Readonly<ConfigOptions>): void {
    const current = this.config

    let key: keyof ConfigOptions
    for (key in current) {
      if (previous[key] !== current[key]) {
        this.onConfigChange.emit(key, current[key])
      }
    }
  }

  private static validate(data: unknown): Partial<ConfigOptions> {
    const validation = YupUtils.tryValidateSync(ConfigOptionsSchema, data ?? {})

    if (validation.error !== null) {
      throw new Error(validation.error.message)
    }

    return validation.result
  }

  private static definedOnly(options: Partial<ConfigOptions>): Partial<ConfigOptions> {
    const defined: Partial<ConfigOptions> = {}

    let key: keyof ConfigOptions
    for (key in options) {
      if (options[key] !== undefined) {
        Object.assign(defined, { [key]: options[key] })
      }
    }

    return defined
  }

  private static without<T extends keyof ConfigOptions>(
    options: Partial<ConfigOptions>,
    key: T,
  ): Partial<ConfigOptions> {
    const copy = { ...options }
    delete copy[key]
    return copy
  }
}
