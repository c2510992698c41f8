/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import colors from 'colors/safe'
import { ConsolaReporter, ConsolaReporterLogObject, LogLevel } from 'consola'
import { format as formatDate } from 'date-fns'

const TAG_COLORS = [colors.green, colors.yellow, colors.blue, colors.magenta, colors.cyan]

/**
 * Picks a stable color per tag so the same tag always renders the same way.
 */
export function colorForTag(tag: string): (text: string) => string {
  let hash = 0
  for (const char of tag) {
    hash = (hash * 31 + char.charCodeAt(0)) >>> 0
  }
  return TAG_COLORS[hash % TAG_COLORS.length]
}

export abstract class TextReporter implements ConsolaReporter {
  /**
   * Maps tags to log level overrides.
   */
  readonly tagToLogLevelMap: Map<string, LogLevel> = new Map<string, LogLevel>()

  /**
   * The default minimum log level to display (inclusive),
   * if no specific overrides apply.
   */
  defaultMinimumLogLevel: LogLevel = LogLevel.Info

  /**
   * Template prepended to every log, see `ConfigOptions.logPrefix`
   */
  logPrefix = ''

  colorEnabled = false

  /**
   * `*` as a tag sets `defaultMinimumLogLevel`.
   */
  setLogLevel(tag: string, level: LogLevel): void {
    if (tag === '*') {
      this.defaultMinimumLogLevel = level
    } else {
      this.tagToLogLevelMap.set(tag, level)
    }
  }

  /**
   * Child loggers join their tags with ':'. Checks go from the least to the
   * most specific tag, and the last override found wins.
   */
  shouldLog(logObj: ConsolaReporterLogObject): boolean {
    let level: LogLevel = this.defaultMinimumLogLevel

    for (const tag of logObj.tag.split(':')) {
      const tagLevel = this.tagToLogLevelMap.get(tag)
      if (tagLevel !== undefined) {
        level = tagLevel
      }
    }

    return logObj.level <= level
  }

  buildLogPrefix(logObj: ConsolaReporterLogObject): string {
    const formattedDate = formatDate(logObj.date, 'HH:mm:ss.SSS')
    let formattedTag = logObj.tag

    if (this.colorEnabled && formattedTag) {
      formattedTag = colorForTag(logObj.tag)(logObj.tag)
    }

    return this.logPrefix
      .replace(/%time%/g, formattedDate)
      .replace(/%level%/g, logObj.type)
      .replace(/%tag%/g, formattedTag)
  }

  abstract logText(logObj: ConsolaReporterLogObject, args: unknown[]): void

  log(logObj: ConsolaReporterLogObject): void {
    if (!this.shouldLog(logObj)) {
      return
    }

    const args = [...logObj.args]

    if (this.logPrefix) {
      args.unshift(this.buildLogPrefix(logObj))
    }

    this.logText(logObj, args)
  }
}
