/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

// The reporter intentionally logs to the console, so disable the lint
/* eslint-disable no-console */

import { ConsolaReporterLogObject, logType } from 'consola'
import { TextReporter } from './text'

const silentLogger = (): void => {
  /* noop */
}

export const loggers: Record<logType, typeof console.log> = {
  fatal: console.error,
  error: console.error,
  warn: console.warn,
  log: console.log,
  info: console.info,
  success: console.info,
  debug: console.debug,
  trace: console.trace,
  verbose: console.debug,
  ready: console.info,
  start: console.info,
  silent: silentLogger,
}

export const logObjToJSON = (logObj: ConsolaReporterLogObject): string => {
  const fields: Record<string, unknown> = {}
  const words: string[] = []

  for (const arg of logObj.args) {
    if (arg !== null && typeof arg === 'object' && !(arg instanceof Error)) {
      Object.assign(fields, arg)
    } else {
      words.push(arg instanceof Error ? arg.message : String(arg))
    }
  }

  return JSON.stringify({
    ...fields,
    level: logObj.type,
    tag: logObj.tag,
    date: logObj.date.toISOString(),
    message: words.join(' '),
  })
}

export class ConsoleReporter extends TextReporter {
  logToJSON = false

  logText(logObj: ConsolaReporterLogObject, args: unknown[]): void {
    const logger = loggers[logObj.type]
    this.logToJSON ? logger(logObjToJSON(logObj)) : logger(...args)
  }
}
