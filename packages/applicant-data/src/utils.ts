import equal from "fast-deep-equal"
import type { JSONRecord, JSONValue } from "./json"

/**
 * Deep equality check for JSONValues.
 * Used to decide whether a merged scalar conflicts with the existing one.
 */
export function deepEqual(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a JSON value is a record (a non-array object).
 */
export function isRecord(value: JSONValue | undefined): value is JSONRecord {
  return isObject(value) && !Array.isArray(value)
}

/**
 * Checks if a value is an integer that survives a JSON round trip unchanged.
 */
export function isLong(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value)
}
