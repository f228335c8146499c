import { ParseError } from "./error"
import type { JSONValue } from "./json"
import { isLong, isObject } from "./utils"

/**
 * The kinds of value a JSON tree node can hold.
 */
export type ValueKind = "object" | "array" | "string" | "number" | "boolean" | "null"

/**
 * Outcome of a typed read. A type mismatch is a result, not an exception,
 * so typed readers can fold it into "no value".
 */
export type ReadResult<T> =
  | { status: "found"; value: T }
  | { status: "absent" }
  | { status: "mismatch"; expected: string; actual: ValueKind }

export function kindOf(value: JSONValue): ValueKind {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (isObject(value)) return "object"
  switch (typeof value) {
    case "string":
      return "string"
    case "number":
      return "number"
    default:
      return "boolean"
  }
}

const ABSENT: ReadResult<never> = { status: "absent" }

function match<T extends JSONValue>(
  value: JSONValue | undefined,
  expected: string,
  guard: (v: JSONValue) => v is T
): ReadResult<T> {
  // A stored null reads the same as a missing value.
  if (value === undefined || value === null) {
    return ABSENT
  }
  if (guard(value)) {
    return { status: "found", value }
  }
  return { status: "mismatch", expected, actual: kindOf(value) }
}

export function matchAny(value: JSONValue | undefined): ReadResult<JSONValue> {
  return match(value, "any", (v): v is JSONValue => true)
}

export function matchString(value: JSONValue | undefined): ReadResult<string> {
  return match(value, "string", (v): v is string => typeof v === "string")
}

export function matchLong(value: JSONValue | undefined): ReadResult<number> {
  return match(value, "long", isLong)
}

export function matchLongList(value: JSONValue | undefined): ReadResult<number[]> {
  return match(value, "list of longs", (v): v is number[] => Array.isArray(v) && v.every(isLong))
}

/**
 * Folds a read result into a plain optional value.
 */
export function valueOf<T>(result: ReadResult<T>): T | undefined {
  return result.status === "found" ? result.value : undefined
}

const LONG_REGEX = /^[+-]?\d+$/

/**
 * Parses a whole number. Throws a {@link ParseError} for anything else.
 */
export function parseLong(raw: string): number {
  const value = Number(raw)
  if (!LONG_REGEX.test(raw) || !Number.isSafeInteger(value)) {
    throw new ParseError(`Not a whole number: "${raw}"`, raw)
  }
  return value
}

const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Parses a `yyyy-MM-dd` date into the epoch milliseconds of that day's start in UTC.
 */
export function parseDateToEpochMillis(raw: string): number {
  const parts = DATE_REGEX.exec(raw)
  if (!parts) {
    throw new ParseError(`Date must be in yyyy-MM-dd format: "${raw}"`, raw)
  }
  const year = Number.parseInt(parts[1], 10)
  const month = Number.parseInt(parts[2], 10)
  const day = Number.parseInt(parts[3], 10)

  // setUTCFullYear, unlike Date.UTC, does not remap years 0-99 onto the 1900s
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new ParseError(`Not a calendar date: "${raw}"`, raw)
  }
  return date.getTime()
}

export function epochMillisToDate(epochMillis: number): Date {
  return new Date(epochMillis)
}

/**
 * Formats the UTC calendar day of a date as `yyyy-MM-dd`.
 */
export function formatDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0")
  const month = String(date.getUTCMonth() + 1).padStart(2, "0")
  const day = String(date.getUTCDate()).padStart(2, "0")
  return `${year}-${month}-${day}`
}

/**
 * Renders a list of longs as `[1, 2, 3]`.
 */
export function formatLongList(list: readonly number[]): string {
  return `[${list.join(", ")}]`
}
