/**
 * Date helpers for normalizing upstream date strings before persistence.
 *
 * Malformed values are a data-quality issue, not a failure: they are logged
 * once and mapped to null so the surrounding item can still be imported.
 */

import { logger } from "./logger.js"

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

// Date or date-time: "T" or space separator, optional seconds and fraction,
// optional Z or ±HH:MM / ±HHMM offset.
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(?:(Z)|([+-])(\d{2}):?(\d{2}))?$/

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  return day <= daysInMonth
}

function logInvalid(functionName: string, value: string, message: string): void {
  logger.warn({ function: functionName, value }, message)
}

/**
 * Parse a YYYY-MM-DD date. Returns the normalized date string (suitable for a
 * DATE column) or null.
 */
export function parseIsoDate(value: string | null | undefined): string | null {
  if (!value) return null

  const match = DATE_PATTERN.exec(value)
  if (!match) {
    logInvalid("parseIsoDate", value, `Invalid date format: ${value}`)
    return null
  }

  const [, year, month, day] = match
  if (!isValidCalendarDate(Number(year), Number(month), Number(day))) {
    logInvalid("parseIsoDate", value, `Invalid date format: ${value}`)
    return null
  }
  return `${year}-${month}-${day}`
}

/**
 * Parse an ISO 8601 date-time such as "2014-12-10T14:23:31.880000Z".
 * A trailing "Z" means UTC; values without an offset are also read as UTC.
 * Fractions beyond milliseconds are truncated.
 */
export function parseIsoDateTime(value: string | null | undefined): Date | null {
  if (!value) return null

  const match = DATETIME_PATTERN.exec(value)
  if (!match) {
    logInvalid("parseIsoDateTime", value, `Invalid datetime format: ${value}`)
    return null
  }

  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", zulu, sign, offH, offM] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = Number(s)

  const offsetHours = offH === undefined ? 0 : Number(offH)
  const offsetMinutesPart = offM === undefined ? 0 : Number(offM)

  if (
    !isValidCalendarDate(year, month, day) ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetHours > 23 ||
    offsetMinutesPart > 59
  ) {
    logInvalid("parseIsoDateTime", value, `Invalid datetime format: ${value}`)
    return null
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0
  const offsetMinutes = zulu || sign === undefined ? 0 : (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMinutesPart)

  const utcMillis = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMinutes * 60_000
  return new Date(utcMillis)
}
