import { failure } from "./error"

/**
 * A pre-compiled JSONPath query whose match/no-match decides a visibility
 * or eligibility condition, e.g. `$.applicant.children[?(@.entity_name == 'Ada')]`.
 */
export class JsonPathPredicate {
  private constructor(readonly pathPredicate: string) {}

  static create(pathPredicate: string): JsonPathPredicate {
    if (pathPredicate.trim() === "") {
      failure("A JSONPath predicate cannot be empty")
    }
    return new JsonPathPredicate(pathPredicate)
  }

  toString(): string {
    return this.pathPredicate
  }
}
