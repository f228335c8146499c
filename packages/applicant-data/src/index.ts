export {
  ANONYMOUS_APPLICANT_NAME,
  createApplicantData,
  type ApplicantData,
} from "./ApplicantData"
export { type ApplicantDataOptions, DEFAULT_LOCALE, parseLocale } from "./config"
export { Currency } from "./Currency"
export { ApplicantDataError, LockedError, ParseError, PathError } from "./error"
export type { JSONObject, JSONRecord, JSONValue, KeyPath } from "./json"
export { createLogger, type Logger, type LoggerOptions, type LogLevel, silentLogger } from "./logger"
export { copyForward, type CopyForwardResult, mergeTrees } from "./merge"
export { Path, type PathSegment } from "./Path"
export { JsonPathPredicate } from "./predicate"
export { createJsonPathQueryEngine, type QueryEngine } from "./queryEngine"
export { DateQuestion } from "./question/DateQuestion"
export {
  IdQuestion,
  type IdQuestionDefinition,
  type IdValidationError,
} from "./question/IdQuestion"
export { Scalar } from "./Scalar"
export {
  formatDate,
  formatLongList,
  kindOf,
  parseDateToEpochMillis,
  parseLong,
  type ReadResult,
  type ValueKind,
} from "./scalars"
export { APPLICANT_PATH, WellKnownPaths } from "./WellKnownPaths"
