import { JSONPath } from "jsonpath-plus"
import type { JSONValue } from "./json"

/**
 * A JSONPath-style query engine. Returns every node the expression matches,
 * or an empty array when nothing matches.
 */
export interface QueryEngine {
  query(document: JSONValue, expression: string): unknown[]
}

/**
 * The default query engine, backed by jsonpath-plus. Filter expressions run in its
 * sandboxed evaluator, never through `eval`.
 */
export function createJsonPathQueryEngine(): QueryEngine {
  return {
    query(document, expression) {
      const result: unknown = JSONPath({ path: expression, json: document, wrap: true })
      return Array.isArray(result) ? result : []
    },
  }
}
