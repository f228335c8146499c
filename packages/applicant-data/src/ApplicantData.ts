import {
  type ApplicantDataOptions,
  DEFAULT_LOCALE,
  EMPTY_APPLICANT_DATA_JSON,
  parseApplicantJson,
  parseLocale,
} from "./config"
import { Currency } from "./Currency"
import { ApplicantDataError, LockedError } from "./error"
import type { JSONRecord, JSONValue } from "./json"
import { createLogger } from "./logger"
import { mergeTrees } from "./merge"
import type { Path } from "./Path"
import type { JsonPathPredicate } from "./predicate"
import { createJsonPathQueryEngine } from "./queryEngine"
import { Scalar } from "./Scalar"
import {
  epochMillisToDate,
  formatLongList,
  matchAny,
  matchLong,
  matchLongList,
  matchString,
  parseDateToEpochMillis,
  parseLong,
  valueOf,
} from "./scalars"
import { lookup, ensureParent, removeAt, writeAt } from "./tree"
import { WellKnownPaths } from "./WellKnownPaths"

export const ANONYMOUS_APPLICANT_NAME = "<Anonymous Applicant>"

/**
 * Brokers access to one applicant's answers.
 *
 * The answers live in a single JSON document rooted at `applicant`, but this interface speaks
 * in terms of {@link Path}s and typed values rather than raw JSON.
 *
 * An instance starts mutable and may be locked once. After `lock()` every mutating method
 * throws a {@link LockedError}; reads keep working.
 */
export interface ApplicantData {
  // --- Lifecycle ---

  /**
   * Makes this instance immutable. It cannot be unlocked.
   */
  lock(): void

  isLocked(): boolean

  // --- Locale & name ---

  hasPreferredLocale(): boolean

  /**
   * The applicant's preferred locale, or {@link DEFAULT_LOCALE} if they have not set one.
   */
  preferredLocale(): string

  setPreferredLocale(locale: string): void

  /**
   * `"Last, First"`, or just `"First"`, or {@link ANONYMOUS_APPLICANT_NAME} when no first name
   * is stored.
   */
  getApplicantName(): string

  /**
   * Splits a display name on spaces into first/middle/last. Two words are first and last,
   * three are first, middle and last; anything else goes into the first name.
   */
  setUserName(displayName: string): void

  /**
   * Writes each name part only if the applicant has not answered it yet.
   */
  setUserNameParts(firstName: string, middleName?: string, lastName?: string): void

  // --- Probes ---

  /**
   * True if anything, including null, is stored at the path; i.e. the question was answered
   * at some point.
   */
  hasPath(path: Path): boolean

  /**
   * True if a non-null value is stored at the path.
   */
  hasValueAtPath(path: Path): boolean

  // --- Writes ---

  /**
   * Writes a value, creating any missing ancestor objects and arrays on the way.
   *
   * Array indices along the path never leave gaps: writing `list[3]` into an empty document
   * first fills `list[0]` to `list[2]` with empty objects.
   */
  put(path: Path, value: JSONValue): void

  /**
   * Writes the string. An empty string clears the answer instead.
   */
  putString(path: Path, value: string): void

  /**
   * Writes a whole number. A string is parsed first; an empty string clears the answer.
   */
  putLong(path: Path, value: number | string): void

  /**
   * Stores a `yyyy-MM-dd` date as the epoch milliseconds of that day's start in UTC.
   * An empty string clears the answer.
   */
  putDate(path: Path, dateString: string): void

  /**
   * Stores a dollars amount such as `"1,234.50"` as cents. An empty string clears
   * the answer.
   */
  putCurrencyDollars(path: Path, dollars: string): void

  putCurrencyCents(path: Path, cents: number): void

  /**
   * Writes the name of each repeated entity at `path[i].entity_name`, leaving other data of
   * those entities untouched. An empty list stores an empty array.
   */
  putRepeatedEntities(path: Path, entityNames: readonly string[]): void

  // --- Deletes ---

  /**
   * Deletes whatever is at the path, if anything.
   */
  maybeDelete(path: Path): void

  /**
   * If the path points at an array element, deletes the whole array so it can be rewritten.
   */
  maybeClearArray(path: Path): void

  /**
   * Deletes the entire repeated entity at each index. Returns false if the largest index does
   * not exist, in which case nothing is deleted.
   */
  deleteRepeatedEntities(path: Path, indices: readonly number[]): boolean

  /**
   * Removes the repeated entities array only if it holds no entities, returning true if there
   * are none left. Never deletes entity data.
   */
  maybeClearRepeatedEntities(path: Path): boolean

  // --- Typed reads ---

  readString(path: Path): string | undefined
  readLong(path: Path): number | undefined
  readDate(path: Path): Date | undefined
  readCurrency(path: Path): Currency | undefined
  readList(path: Path): number[] | undefined

  /**
   * The names of the repeated entities at `path`, in index order. Entities without a name read
   * as the empty string.
   */
  readRepeatedEntities(path: Path): string[]

  /**
   * Reads a list of longs as `[1, 2, 3]`, anything else as {@link ApplicantData.readString}.
   */
  readAsString(path: Path): string | undefined

  // --- Queries, merging & serialization ---

  /**
   * True if the predicate's query matches anything in the answers.
   */
  evalPredicate(predicate: JsonPathPredicate): boolean

  /**
   * Copies every answer from `other` that this instance does not have yet. Arrays present
   * in both get the incoming items appended. Differing scalars are left alone and returned.
   */
  mergeFrom(other: ApplicantData): Path[]

  asJsonString(): string

  /**
   * A deep copy of the answer document.
   */
  toJSON(): JSONRecord

  /**
   * Two instances are equal if their serialized forms are identical (key order matters).
   */
  equals(other: ApplicantData): boolean
}

/**
 * Creates an {@link ApplicantData}, empty or hydrated from persisted answers.
 */
export function createApplicantData(options: ApplicantDataOptions = {}): ApplicantData {
  const root: JSONRecord = parseApplicantJson(options.json ?? EMPTY_APPLICANT_DATA_JSON)
  const queryEngine = options.queryEngine ?? createJsonPathQueryEngine()
  const logger = options.logger ?? createLogger({ context: "applicant-data" })

  let locked = false
  let preferredLocale =
    options.preferredLocale === undefined ? undefined : parseLocale(options.preferredLocale)

  const checkLocked = () => {
    if (locked) {
      throw new LockedError()
    }
  }

  const valueAt = (path: Path): JSONValue | undefined => {
    const found = lookup(root, path.keyPath())
    return found.found ? found.value : undefined
  }

  const hasPath = (path: Path): boolean => lookup(root, path.keyPath()).found

  const put = (path: Path, value: JSONValue): void => {
    checkLocked()
    writeAt(root, path, structuredClone(value))
  }

  // Empty raw input clears a previous answer. An array element is cleared by clearing its
  // whole array, never on its own.
  const clearAnswer = (path: Path): void => {
    checkLocked()
    if (!path.isArrayElement()) {
      removeAt(root, path)
    }
  }

  const putString = (path: Path, value: string): void => {
    if (value === "") {
      clearAnswer(path)
    } else {
      put(path, value)
    }
  }

  const maybeDelete = (path: Path): void => {
    checkLocked()
    removeAt(root, path)
  }

  const readString = (path: Path) => valueOf(matchString(valueAt(path)))
  const readLong = (path: Path) => valueOf(matchLong(valueAt(path)))
  const readList = (path: Path) => {
    const list = valueOf(matchLongList(valueAt(path)))
    return list === undefined ? undefined : [...list]
  }

  const readRepeatedEntities = (path: Path): string[] => {
    const names: string[] = []
    for (let index = 0; hasPath(path.atIndex(index)); index++) {
      names.push(readString(path.atIndex(index).join(Scalar.ENTITY_NAME)) ?? "")
    }
    return names
  }

  const setUserNameParts = (firstName: string, middleName?: string, lastName?: string) => {
    checkLocked()
    if (!hasPath(WellKnownPaths.APPLICANT_FIRST_NAME)) {
      putString(WellKnownPaths.APPLICANT_FIRST_NAME, firstName)
    }
    if (middleName !== undefined && !hasPath(WellKnownPaths.APPLICANT_MIDDLE_NAME)) {
      putString(WellKnownPaths.APPLICANT_MIDDLE_NAME, middleName)
    }
    if (lastName !== undefined && !hasPath(WellKnownPaths.APPLICANT_LAST_NAME)) {
      putString(WellKnownPaths.APPLICANT_LAST_NAME, lastName)
    }
  }

  const asJsonString = () => JSON.stringify(root)

  const data: ApplicantData = {
    lock() {
      locked = true
    },

    isLocked() {
      return locked
    },

    hasPreferredLocale() {
      return preferredLocale !== undefined
    },

    preferredLocale() {
      return preferredLocale ?? DEFAULT_LOCALE
    },

    setPreferredLocale(locale) {
      checkLocked()
      preferredLocale = parseLocale(locale)
    },

    getApplicantName() {
      const firstName = readString(WellKnownPaths.APPLICANT_FIRST_NAME)
      if (firstName === undefined) {
        logger.error("Applicant data does not include an applicant name")
        return ANONYMOUS_APPLICANT_NAME
      }
      if (!hasPath(WellKnownPaths.APPLICANT_LAST_NAME)) {
        return firstName
      }
      const lastName = readString(WellKnownPaths.APPLICANT_LAST_NAME)
      if (lastName === undefined) {
        logger.error("Applicant data has a last name that is not a string")
        return ANONYMOUS_APPLICANT_NAME
      }
      return `${lastName}, ${firstName}`
    },

    setUserName(displayName) {
      const parts = displayName.split(" ")
      switch (parts.length) {
        case 2:
          setUserNameParts(parts[0], undefined, parts[1])
          break
        case 3:
          setUserNameParts(parts[0], parts[1], parts[2])
          break
        default:
          // one name, or too many to tell apart: all of it is the first name
          setUserNameParts(displayName)
      }
    },

    setUserNameParts,

    hasPath,

    hasValueAtPath(path) {
      return matchAny(valueAt(path)).status === "found"
    },

    put,

    putString,

    putLong(path, value) {
      if (typeof value === "number") {
        if (!Number.isSafeInteger(value)) {
          throw new ApplicantDataError(`Not a whole number: ${value}`)
        }
        put(path, value)
      } else if (value === "") {
        clearAnswer(path)
      } else {
        put(path, parseLong(value))
      }
    },

    putDate(path, dateString) {
      if (dateString === "") {
        clearAnswer(path)
      } else {
        put(path, parseDateToEpochMillis(dateString))
      }
    },

    putCurrencyDollars(path, dollars) {
      if (dollars === "") {
        clearAnswer(path)
      } else {
        put(path, Currency.parse(dollars).cents)
      }
    },

    putCurrencyCents(path, cents) {
      if (!Number.isSafeInteger(cents)) {
        throw new ApplicantDataError(`Currency cents must be a whole number: ${cents}`)
      }
      put(path, cents)
    },

    putRepeatedEntities(path, entityNames) {
      if (entityNames.length === 0) {
        put(path.withoutArrayReference(), [])
        return
      }
      entityNames.forEach((name, index) => {
        putString(path.atIndex(index).join(Scalar.ENTITY_NAME), name)
      })
    },

    maybeDelete,

    maybeClearArray(path) {
      checkLocked()
      if (path.isArrayElement()) {
        ensureParent(root, path)
        maybeDelete(path.withoutArrayReference())
      }
    },

    deleteRepeatedEntities(path, indices) {
      checkLocked()
      if (indices.length === 0) {
        return false
      }

      const descending = [...indices].sort((a, b) => b - a)
      // only the largest index is checked: if it exists, so does every smaller one
      if (!hasPath(path.atIndex(descending[0]))) {
        return false
      }

      // deletion shifts later elements, so go from the highest index down
      for (const index of descending) {
        removeAt(root, path.atIndex(index))
      }
      return true
    },

    maybeClearRepeatedEntities(path) {
      checkLocked()
      if (readRepeatedEntities(path).length === 0) {
        maybeDelete(path.withoutArrayReference())
        return true
      }
      return false
    },

    readString,
    readLong,

    readDate(path) {
      const epochMillis = readLong(path)
      if (epochMillis === undefined) {
        return undefined
      }
      const date = epochMillisToDate(epochMillis)
      // outside the range a Date can hold
      return Number.isNaN(date.getTime()) ? undefined : date
    },

    readCurrency(path) {
      const cents = readLong(path)
      return cents === undefined ? undefined : new Currency(cents)
    },

    readList,
    readRepeatedEntities,

    readAsString(path) {
      const list = readList(path)
      return list === undefined ? readString(path) : formatLongList(list)
    },

    evalPredicate(predicate) {
      return queryEngine.query(root, predicate.pathPredicate).length > 0
    },

    mergeFrom(other) {
      checkLocked()
      return mergeTrees(root, other.toJSON())
    },

    asJsonString,

    toJSON() {
      return structuredClone(root)
    },

    equals(other) {
      return asJsonString() === other.asJsonString()
    },
  }

  return data
}
