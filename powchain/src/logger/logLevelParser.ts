/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'

const configToLogLevel: Readonly<Record<string, LogLevel | undefined>> = Object.freeze({
  fatal: LogLevel.Fatal,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  log: LogLevel.Log,
  info: LogLevel.Info,
  success: LogLevel.Success,
  debug: LogLevel.Debug,
  trace: LogLevel.Trace,
  silent: LogLevel.Silent,
  verbose: LogLevel.Verbose,
})

/**
 * @throws `level` is not one of the names in `configToLogLevel`
 */
const configLevelToLogLevel = (level: string): LogLevel => {
  const configLevel = configToLogLevel[level.toLowerCase()]

  if (configLevel === undefined) {
    throw new Error(
      `Log level ${level} should be one of the following: ${Object.keys(configToLogLevel).join(
        ', ',
      )}`,
    )
  }

  return configLevel
}

/**
 * Parses a log level config string into tags and log levels.
 *
 * ex: `*:warn,chain:debug`
 */
export const parseLogLevelConfig = (
  logLevelConfig: string,
): ReadonlyArray<[string, LogLevel]> => {
  return logLevelConfig.split(',').map((entry) => {
    const parts = entry.trim().split(':')

    // A bare level applies to every tag
    if (parts.length === 1) {
      parts.unshift('*')
    }

    if (parts.length !== 2) {
      throw new Error('Log levels must have format tag:level')
    }

    return [parts[0].toLowerCase(), configLevelToLogLevel(parts[1])]
  })
}
