import type { ApplicantData } from "../ApplicantData"
import type { Path } from "../Path"
import { Scalar } from "../Scalar"
import { formatDate } from "../scalars"

/**
 * A date question answered by one applicant. Dates are read and written as `yyyy-MM-dd`.
 */
export class DateQuestion {
  constructor(
    private readonly applicantData: ApplicantData,
    private readonly contextualizedPath: Path
  ) {}

  get datePath(): Path {
    return this.contextualizedPath.join(Scalar.DATE)
  }

  isAnswered(): boolean {
    return this.applicantData.hasPath(this.datePath)
  }

  /**
   * Stores the raw form input. An empty string clears the answer.
   */
  answer(raw: string): void {
    this.applicantData.putDate(this.datePath, raw)
  }

  getDateValue(): string | undefined {
    const date = this.applicantData.readDate(this.datePath)
    return date === undefined ? undefined : formatDate(date)
  }

  getAnswerString(): string {
    return this.getDateValue() ?? "-"
  }
}
