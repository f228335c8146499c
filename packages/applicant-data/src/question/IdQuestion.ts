import type { ApplicantData } from "../ApplicantData"
import type { Path } from "../Path"
import { Scalar } from "../Scalar"

export type IdValidationError = "ID_TOO_SHORT" | "ID_TOO_LONG" | "ID_NUMBER_REQUIRED"

export type IdQuestionDefinition = {
  minLength?: number
  maxLength?: number
}

const DIGITS_REGEX = /^[0-9]*$/

/**
 * An identification number question (e.g. a case or account number) answered by one applicant.
 */
export class IdQuestion {
  private _idValue?: string | null

  constructor(
    private readonly applicantData: ApplicantData,
    private readonly contextualizedPath: Path,
    private readonly definition: IdQuestionDefinition = {}
  ) {}

  get idPath(): Path {
    return this.contextualizedPath.join(Scalar.ID)
  }

  isAnswered(): boolean {
    return this.applicantData.hasPath(this.idPath)
  }

  getIdValue(): string | undefined {
    if (this._idValue === undefined) {
      this._idValue = this.applicantData.readString(this.idPath) ?? null
    }
    return this._idValue ?? undefined
  }

  /**
   * Validation errors of the stored answer. An unanswered question has none.
   */
  getValidationErrors(): Set<IdValidationError> {
    const errors = new Set<IdValidationError>()
    if (!this.isAnswered()) {
      return errors
    }

    const id = this.getIdValue() ?? ""
    const { minLength, maxLength } = this.definition
    if (minLength !== undefined && id.length < minLength) {
      errors.add("ID_TOO_SHORT")
    }
    if (maxLength !== undefined && id.length > maxLength) {
      errors.add("ID_TOO_LONG")
    }
    if (id.length !== 0 && !DIGITS_REGEX.test(id)) {
      errors.add("ID_NUMBER_REQUIRED")
    }
    return errors
  }

  getAnswerString(): string {
    return this.getIdValue() ?? "-"
  }
}
