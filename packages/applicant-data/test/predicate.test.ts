import { describe, expect, it, vi } from "vitest"
import { createApplicantData } from "../src/ApplicantData"
import { ApplicantDataError } from "../src/error"
import { Path } from "../src/Path"
import { JsonPathPredicate } from "../src/predicate"
import { createJsonPathQueryEngine, type QueryEngine } from "../src/queryEngine"

function household() {
  const data = createApplicantData()
  const members = Path.create("applicant.household_members")
  data.putRepeatedEntities(members, ["Alice", "Bob"])
  data.putLong(members.atIndex(0).join("age"), 34)
  data.putLong(members.atIndex(1).join("age"), 12)
  return data
}

describe("evalPredicate", () => {
  it("is true when the query matches", () => {
    const predicate = JsonPathPredicate.create(
      "$.applicant.household_members[?(@.entity_name == 'Bob')]"
    )
    expect(household().evalPredicate(predicate)).toBe(true)
  })

  it("is false when the query matches nothing", () => {
    const predicate = JsonPathPredicate.create(
      "$.applicant.household_members[?(@.entity_name == 'Carol')]"
    )
    expect(household().evalPredicate(predicate)).toBe(false)
  })

  it("compares numbers", () => {
    const data = household()
    expect(data.evalPredicate(JsonPathPredicate.create("$.applicant.household_members[?(@.age > 30)]"))).toBe(
      true
    )
    expect(data.evalPredicate(JsonPathPredicate.create("$.applicant.household_members[?(@.age > 40)]"))).toBe(
      false
    )
  })

  it("is false for paths that do not exist", () => {
    const data = household()
    expect(data.evalPredicate(JsonPathPredicate.create("$.applicant.pets[?(@.age > 1)]"))).toBe(false)
    expect(data.evalPredicate(JsonPathPredicate.create("$.applicant.missing.deep"))).toBe(false)
  })

  it("uses the injected query engine", () => {
    const query = vi.fn<QueryEngine["query"]>().mockReturnValue(["match"])
    const data = createApplicantData({ queryEngine: { query } })

    expect(data.evalPredicate(JsonPathPredicate.create("$.anything"))).toBe(true)
    expect(query).toHaveBeenCalledWith({ applicant: {} }, "$.anything")
  })

  it("works after lock", () => {
    const data = household()
    data.lock()
    expect(data.evalPredicate(JsonPathPredicate.create("$.applicant.household_members[0]"))).toBe(true)
  })
})

describe("JsonPathPredicate", () => {
  it("keeps the expression", () => {
    const predicate = JsonPathPredicate.create("$.applicant.name")
    expect(predicate.pathPredicate).toBe("$.applicant.name")
    expect(predicate.toString()).toBe("$.applicant.name")
  })

  it("rejects empty expressions", () => {
    expect(() => JsonPathPredicate.create("  ")).toThrow(ApplicantDataError)
  })
})

describe("createJsonPathQueryEngine", () => {
  it("returns every match", () => {
    const engine = createJsonPathQueryEngine()
    expect(engine.query({ a: [{ b: 1 }, { b: 2 }] }, "$.a[*].b")).toStrictEqual([1, 2])
    expect(engine.query({ a: [] }, "$.a[*].b")).toStrictEqual([])
  })
})
