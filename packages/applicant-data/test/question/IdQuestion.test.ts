import { describe, expect, it } from "vitest"
import { createApplicantData } from "../../src/ApplicantData"
import { Path } from "../../src/Path"
import { IdQuestion } from "../../src/question/IdQuestion"

const questionPath = Path.create("applicant.case_number")

describe("IdQuestion", () => {
  it("has no errors when unanswered", () => {
    const question = new IdQuestion(createApplicantData(), questionPath, { minLength: 5 })
    expect(question.isAnswered()).toBe(false)
    expect(question.getValidationErrors()).toStrictEqual(new Set())
    expect(question.getAnswerString()).toBe("-")
  })

  it("reads the id under the question path", () => {
    const data = createApplicantData()
    data.putString(Path.create("applicant.case_number.id"), "12345")
    const question = new IdQuestion(data, questionPath)
    expect(question.idPath.toString()).toBe("applicant.case_number.id")
    expect(question.getIdValue()).toBe("12345")
    expect(question.getAnswerString()).toBe("12345")
    expect(question.getValidationErrors()).toStrictEqual(new Set())
  })

  it("flags ids that are too short or not numeric", () => {
    const data = createApplicantData()
    data.putString(questionPath.join("id"), "12a")
    const question = new IdQuestion(data, questionPath, { minLength: 5 })
    expect(question.getValidationErrors()).toStrictEqual(new Set(["ID_TOO_SHORT", "ID_NUMBER_REQUIRED"]))
  })

  it("flags ids that are too long", () => {
    const data = createApplicantData()
    data.putString(questionPath.join("id"), "123456")
    const question = new IdQuestion(data, questionPath, { maxLength: 4 })
    expect(question.getValidationErrors()).toStrictEqual(new Set(["ID_TOO_LONG"]))
  })

  it("treats a stored null as answered with an empty id", () => {
    const data = createApplicantData()
    data.put(questionPath.join("id"), null)
    const question = new IdQuestion(data, questionPath, { minLength: 1 })
    expect(question.isAnswered()).toBe(true)
    expect(question.getIdValue()).toBeUndefined()
    expect(question.getValidationErrors()).toStrictEqual(new Set(["ID_TOO_SHORT"]))
  })
})
