import { Path } from "./Path"
import { Scalar } from "./Scalar"

export const APPLICANT = "applicant"
export const APPLICANT_PATH = Path.create(APPLICANT)

const APPLICANT_NAME_PATH = APPLICANT_PATH.join("name")

/**
 * Paths whose meaning is shared with code outside the data model, such as
 * profile population after an identity provider login.
 */
export const WellKnownPaths = {
  APPLICANT_FIRST_NAME: APPLICANT_NAME_PATH.join(Scalar.FIRST_NAME),
  APPLICANT_MIDDLE_NAME: APPLICANT_NAME_PATH.join(Scalar.MIDDLE_NAME),
  APPLICANT_LAST_NAME: APPLICANT_NAME_PATH.join(Scalar.LAST_NAME),
  APPLICANT_DOB: APPLICANT_PATH.join("applicant_date_of_birth").join(Scalar.DATE),
} as const
