import { z } from "zod"
import { ApplicantDataError } from "./error"
import { type JSONRecord, jsonRecordSchema } from "./json"
import type { Logger } from "./logger"
import type { QueryEngine } from "./queryEngine"
import { APPLICANT } from "./WellKnownPaths"

/**
 * Locale used when the applicant has not chosen one.
 */
export const DEFAULT_LOCALE = "en-US"

export const EMPTY_APPLICANT_DATA_JSON = JSON.stringify({ [APPLICANT]: {} })

export interface ApplicantDataOptions {
  /**
   * Persisted answers, as produced by `asJsonString()`.
   * Default: an empty document, `{"applicant":{}}`.
   */
  json?: string

  /**
   * The applicant's preferred locale as a BCP 47 tag.
   * If omitted, `preferredLocale()` returns {@link DEFAULT_LOCALE}.
   */
  preferredLocale?: string

  /**
   * Engine used by `evalPredicate`.
   * Default: a jsonpath-plus backed engine.
   */
  queryEngine?: QueryEngine

  /**
   * Default: a console logger.
   */
  logger?: Logger
}

function isValidLocale(tag: string): boolean {
  try {
    return Intl.getCanonicalLocales(tag).length === 1
  } catch (e) {
    if (e instanceof RangeError) {
      return false
    }
    throw e
  }
}

export const localeSchema = z
  .string()
  .refine(isValidLocale, (tag) => ({ message: `Invalid locale tag: "${tag}"` }))

/**
 * Validates and canonicalizes a locale tag, e.g. `es-us` becomes `es-US`.
 */
export function parseLocale(tag: string): string {
  const result = localeSchema.safeParse(tag)
  if (!result.success) {
    throw new ApplicantDataError(result.error.issues.map((issue) => issue.message).join("; "))
  }
  return Intl.getCanonicalLocales(result.data)[0]
}

/**
 * Parses persisted answers. The top level must be a JSON object.
 */
export function parseApplicantJson(json: string): JSONRecord {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (e) {
    throw new ApplicantDataError(
      `Persisted applicant data is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
    )
  }
  const result = jsonRecordSchema.safeParse(raw)
  if (!result.success) {
    throw new ApplicantDataError("Persisted applicant data must be a JSON object")
  }
  return result.data
}
