import { failure, PathError } from "./error"
import type { JSONRecord, JSONValue, KeyPath } from "./json"
import type { Path, PathSegment } from "./Path"
import { kindOf } from "./scalars"
import { isRecord } from "./utils"

/**
 * Result of resolving a key path: a present value (possibly null) or nothing.
 */
export type Lookup = { found: true; value: JSONValue } | { found: false }

const NOT_FOUND: Lookup = { found: false }

/**
 * Resolves a key path within the tree.
 * A missing segment, an index out of bounds or a segment of the wrong type all mean "not found".
 */
export function lookup(root: JSONValue, keys: KeyPath): Lookup {
  let current: JSONValue = root
  for (const segment of keys) {
    if (typeof segment === "string") {
      if (!isRecord(current) || !Object.hasOwn(current, segment)) {
        return NOT_FOUND
      }
      current = current[segment]
    } else {
      if (!Array.isArray(current) || segment < 0 || segment >= current.length) {
        return NOT_FOUND
      }
      current = current[segment]
    }
  }
  return { found: true, value: current }
}

function describe(value: JSONValue): string {
  return `a ${kindOf(value)}`
}

function ensureArray(container: JSONRecord, key: string, path: Path): JSONValue[] {
  const child = container[key]
  if (child === undefined || child === null) {
    const created: JSONValue[] = []
    container[key] = created
    return created
  }
  if (!Array.isArray(child)) {
    failure(`Cannot write "${path.toString()}": "${key}" holds ${describe(child)}, not an array`)
  }
  return child
}

/**
 * Pads the array with empty objects until `index` is a valid position in it,
 * so that no index below `index` is ever left out.
 */
function fillUpTo(array: JSONValue[], index: number): void {
  while (array.length < index) {
    array.push({})
  }
}

function descendInto(container: JSONRecord, segment: PathSegment, path: Path): JSONRecord {
  if (segment.index === undefined) {
    const child = container[segment.key]
    if (child === undefined || child === null) {
      const created: JSONRecord = {}
      container[segment.key] = created
      return created
    }
    if (!isRecord(child)) {
      failure(
        `Cannot write "${path.toString()}": "${segment.key}" holds ${describe(child)}, not an object`
      )
    }
    return child
  }

  const array = ensureArray(container, segment.key, path)
  fillUpTo(array, segment.index + 1)
  const element = array[segment.index]
  if (element === null) {
    const created: JSONRecord = {}
    array[segment.index] = created
    return created
  }
  if (!isRecord(element)) {
    failure(
      `Cannot write "${path.toString()}": "${segment.key}[${segment.index}]" holds ${describe(element)}, not an object`
    )
  }
  return element
}

/**
 * Makes sure every ancestor of `path` exists, creating objects and array elements where missing,
 * and returns the object that holds the last segment.
 *
 * This is a single descent from the root: each segment's container is looked up or created
 * before moving on to the next one.
 */
export function ensureParent(root: JSONRecord, path: Path): JSONRecord {
  const segments = path.segments()
  let container = root
  for (let i = 0; i < segments.length - 1; i++) {
    container = descendInto(container, segments[i], path)
  }
  return container
}

function lastSegment(path: Path): PathSegment {
  const segments = path.segments()
  const last = segments[segments.length - 1]
  if (last === undefined) {
    throw new PathError("The root path cannot be written or deleted")
  }
  return last
}

/**
 * Writes `value` at `path`, creating missing ancestors on the way.
 *
 * When the path ends in an array element, the array is created if needed and lower indices
 * are filled with empty objects; an existing element at that index is replaced.
 */
export function writeAt(root: JSONRecord, path: Path, value: JSONValue): void {
  const last = lastSegment(path)
  const container = ensureParent(root, path)

  if (last.index === undefined) {
    container[last.key] = value
    return
  }

  const array = ensureArray(container, last.key, path)
  fillUpTo(array, last.index)
  if (last.index < array.length) {
    array[last.index] = value
  } else {
    array.push(value)
  }
}

/**
 * Sets `key` as an own property of `record`, even when the key is `__proto__`.
 */
export function setOwn(record: JSONRecord, key: string, value: JSONValue): void {
  Object.defineProperty(record, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

/**
 * Removes whatever is at `path`. Removing an array element shifts the elements after it.
 * Returns false if there was nothing to remove.
 */
export function removeAt(root: JSONRecord, path: Path): boolean {
  const last = lastSegment(path)
  const parent = lookup(root, path.parentPath().keyPath())
  if (!parent.found || !isRecord(parent.value)) {
    return false
  }
  const container = parent.value

  if (last.index === undefined) {
    if (!Object.hasOwn(container, last.key)) {
      return false
    }
    delete container[last.key]
    return true
  }

  const array = container[last.key]
  if (!Array.isArray(array) || last.index >= array.length) {
    return false
  }
  array.splice(last.index, 1)
  return true
}
