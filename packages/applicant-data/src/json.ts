import { z } from "zod"

/**
 * A key path into a JSON tree: object keys are strings, array indices are numbers.
 * Resolution fails if any segment is missing or type mismatch occurs.
 */
export type KeyPath = readonly (string | number)[]

/**
 * A JSON primitive.
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON object.
 */
export type JSONObject = JSONRecord | JSONValue[]

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONObject

export const jsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

export const jsonRecordSchema: z.ZodType<JSONRecord> = z.record(jsonValueSchema)
