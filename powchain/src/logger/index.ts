/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Consola } from 'consola'
import consola, { LogLevel } from 'consola'
import { Config } from '../config/config'
import { parseLogLevelConfig } from './logLevelParser'
import { ConsoleReporter } from './reporters/console'

export type Logger = Consola

export const ConsoleReporterInstance = new ConsoleReporter()

/**
 * Updates the reporter's log levels from a config string.
 *
 * Format is like so: `*:warn,chain:debug`
 */
export const setLogLevelFromConfig = (logLevelConfig: string): void => {
  for (const [tag, level] of parseLogLevelConfig(logLevelConfig)) {
    ConsoleReporterInstance.setLogLevel(tag, level)
  }
}

/**
 * Format is like so: `[%time%] [%level%] [%tag%]`
 */
export const setLogPrefixFromConfig = (logPrefix: string): void => {
  ConsoleReporterInstance.logPrefix = logPrefix
}

export const setJSONLoggingFromConfig = (enabled: boolean): void => {
  ConsoleReporterInstance.logToJSON = enabled
}

export const setLogColorEnabledFromConfig = (enabled: boolean): void => {
  ConsoleReporterInstance.colorEnabled = enabled
}

/**
 * Applies the logging options from the config, and keeps applying them as
 * they change.
 */
export const configureLogging = (config: Config): void => {
  setLogLevelFromConfig(config.get('logLevel'))
  setLogPrefixFromConfig(config.get('logPrefix'))
  setJSONLoggingFromConfig(config.get('jsonLogs'))
  setLogColorEnabledFromConfig(config.get('colorLogs'))

  config.onConfigChange.on((key) => {
    switch (key) {
      case 'logLevel':
        return setLogLevelFromConfig(config.get('logLevel'))
      case 'logPrefix':
        return setLogPrefixFromConfig(config.get('logPrefix'))
      case 'jsonLogs':
        return setJSONLoggingFromConfig(config.get('jsonLogs'))
      case 'colorLogs':
        return setLogColorEnabledFromConfig(config.get('colorLogs'))
    }
  })
}

/**
 * Creates a logger instance with the desired default settings.
 */
export const createRootLogger = (): Logger => {
  return consola.create({
    reporters: [ConsoleReporterInstance],
    // Filtering happens per tag in the reporter, so let everything through here
    level: LogLevel.Verbose,
  })
}
