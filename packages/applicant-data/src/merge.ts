import type { ApplicantData } from "./ApplicantData"
import type { JSONRecord } from "./json"
import type { Logger } from "./logger"
import { Path } from "./Path"
import { setOwn } from "./tree"
import { deepEqual, isRecord } from "./utils"

/**
 * Copies every key of `source` into `target`, recursively, and returns the paths that could
 * not be copied.
 *
 * - Keys missing from `target` are copied over.
 * - Objects present on both sides are merged key by key.
 * - Arrays present on both sides get all of the incoming items appended. There is no
 *   de-duplication, so merging the same array twice repeats its items.
 * - Scalars present on both sides are never overwritten. If they differ (a different kind of
 *   value counts as differing) the path is reported as a conflict.
 */
export function mergeTrees(target: JSONRecord, source: JSONRecord): Path[] {
  return mergeAt(target, source, Path.empty())
}

// Walks both objects side by side. Keys are never parsed as paths, so a key holding a dot,
// a bracket or a space is copied as a single field.
function mergeAt(target: JSONRecord, source: JSONRecord, at: Path): Path[] {
  const conflicts: Path[] = []
  for (const [key, incoming] of Object.entries(source)) {
    const path = at.child(key)

    if (!Object.hasOwn(target, key)) {
      setOwn(target, key, structuredClone(incoming))
      continue
    }
    const existing = target[key]
    if (isRecord(incoming) && isRecord(existing)) {
      conflicts.push(...mergeAt(existing, incoming, path))
    } else if (Array.isArray(incoming) && Array.isArray(existing)) {
      // TODO: merge repeated entities element by element instead of appending them all
      existing.push(...structuredClone(incoming))
    } else if (!deepEqual(existing, incoming)) {
      conflicts.push(path)
    }
  }
  return conflicts
}

export type CopyForwardResult = {
  data: ApplicantData
  conflicts: Path[]
}

/**
 * Carries an applicant's answers from a previous program version into the data for a newer
 * one. Answers already present in `next` win; conflicting paths are logged and returned.
 */
export function copyForward(
  previous: ApplicantData,
  next: ApplicantData,
  logger: Logger
): CopyForwardResult {
  const conflicts = next.mergeFrom(previous)
  if (conflicts.length > 0) {
    logger.warn(
      `${conflicts.length} answer(s) differ between versions and were not copied forward`,
      conflicts.map((path) => path.toString())
    )
  }
  return { data: next, conflicts }
}
