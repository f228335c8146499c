import { describe, expect, it, vi } from "vitest"
import { createApplicantData } from "../src/ApplicantData"
import type { JSONRecord } from "../src/json"
import type { Logger } from "../src/logger"
import { copyForward, mergeTrees } from "../src/merge"
import { Path } from "../src/Path"

const data = (applicant: JSONRecord) => createApplicantData({ json: JSON.stringify({ applicant }) })
const paths = (conflicts: Path[]) => conflicts.map((path) => path.toString())

describe("mergeFrom", () => {
  it("copies keys the target does not have", () => {
    const target = data({ name: "A" })
    expect(target.mergeFrom(data({ age: 3, address: { city: "Tacoma" } }))).toStrictEqual([])
    expect(target.toJSON()).toStrictEqual({
      applicant: { name: "A", age: 3, address: { city: "Tacoma" } },
    })
  })

  it("reports differing scalars without overwriting them", () => {
    const target = data({ name: "A", age: 3 })
    const conflicts = target.mergeFrom(data({ name: "B", age: 3 }))
    expect(paths(conflicts)).toStrictEqual(["applicant.name"])
    expect(target.readString(Path.create("applicant.name"))).toBe("A")
  })

  it("treats a different kind of value as a conflict", () => {
    const target = data({ age: "3", list: [1], pet: null })
    const conflicts = target.mergeFrom(data({ age: 3, list: 1, pet: { name: "Rex" } }))
    expect(paths(conflicts)).toStrictEqual(["applicant.age", "applicant.list", "applicant.pet"])
    expect(target.toJSON()).toStrictEqual({ applicant: { age: "3", list: [1], pet: null } })
  })

  it("recurses into objects present on both sides", () => {
    const target = data({ address: { city: "Tacoma", zip: "98402" } })
    const conflicts = target.mergeFrom(data({ address: { city: "Olympia", street: "Main" } }))
    expect(paths(conflicts)).toStrictEqual(["applicant.address.city"])
    expect(target.toJSON()).toStrictEqual({
      applicant: { address: { city: "Tacoma", zip: "98402", street: "Main" } },
    })
  })

  it("appends every incoming array item", () => {
    const target = data({ selection: [1, 2], members: [{ entity_name: "A" }] })
    const conflicts = target.mergeFrom(data({ selection: [2, 3], members: [{ entity_name: "A" }] }))
    expect(conflicts).toStrictEqual([])
    expect(target.toJSON()).toStrictEqual({
      applicant: {
        selection: [1, 2, 2, 3],
        members: [{ entity_name: "A" }, { entity_name: "A" }],
      },
    })
  })

  it("does not share state with the source", () => {
    const target = data({})
    const source = data({ pet: { name: "Rex" }, tags: [{ id: 1 }] })
    target.mergeFrom(source)
    source.putString(Path.create("applicant.pet.name"), "Fido")
    source.putLong(Path.create("applicant.tags[0].id"), 2)
    expect(target.toJSON()).toStrictEqual({ applicant: { pet: { name: "Rex" }, tags: [{ id: 1 }] } })
  })

  it("copies keys that are not valid path segments as single fields", () => {
    const target = data({ "my key": "kept" })
    const conflicts = target.mergeFrom(data({ "my key": "other", "a.b": "x", "c[0]": 1 }))
    expect(paths(conflicts)).toStrictEqual(["applicant.my key"])
    expect(target.toJSON()).toStrictEqual({
      applicant: { "my key": "kept", "a.b": "x", "c[0]": 1 },
    })
  })

  it("merges plain trees", () => {
    const target: JSONRecord = { a: { b: 1 } }
    const conflicts = mergeTrees(target, { a: { b: 2, c: [true] }, d: "x" })
    expect(paths(conflicts)).toStrictEqual(["a.b"])
    expect(target).toStrictEqual({ a: { b: 1, c: [true] }, d: "x" })
  })
})

describe("copyForward", () => {
  function mockLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  }

  it("carries answers into the newer version", () => {
    const logger = mockLogger()
    const next = data({ color: "red" })
    const result = copyForward(data({ age: 3 }), next, logger)

    expect(result.data).toBe(next)
    expect(result.conflicts).toStrictEqual([])
    expect(next.toJSON()).toStrictEqual({ applicant: { color: "red", age: 3 } })
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("logs the paths that could not be carried forward", () => {
    const logger = mockLogger()
    const result = copyForward(data({ color: "blue" }), data({ color: "red" }), logger)

    expect(paths(result.conflicts)).toStrictEqual(["applicant.color"])
    expect(logger.warn).toHaveBeenCalledWith(
      "1 answer(s) differ between versions and were not copied forward",
      ["applicant.color"]
    )
  })
})
