import { PathError } from "./error"
import type { KeyPath } from "./json"

/**
 * One segment of a {@link Path}: a field name, optionally indexing into an array.
 */
export type PathSegment = {
  readonly key: string
  readonly index?: number
}

const SEGMENT_REGEX = /^([^.[\]\s]+)(?:\[(0|[1-9]\d*)\])?$/

function parseSegments(raw: string): PathSegment[] {
  let str = raw.trim()
  if (str.startsWith("$")) {
    str = str.substring(1)
    if (str.startsWith(".")) {
      str = str.substring(1)
    }
  }
  if (str === "") {
    return []
  }

  return str.split(".").map((part) => {
    const match = SEGMENT_REGEX.exec(part)
    if (!match) {
      throw new PathError(`Malformed path "${raw}" at segment "${part}"`)
    }
    const [, key, index] = match
    if (key === "__proto__") {
      throw new PathError(`Malformed path "${raw}": "__proto__" is not a valid key`)
    }
    return index === undefined ? { key } : { key, index: Number.parseInt(index, 10) }
  })
}

function segmentToString(segment: PathSegment): string {
  return segment.index === undefined ? segment.key : `${segment.key}[${segment.index}]`
}

/**
 * An immutable address into an applicant's answer document, e.g. `applicant.children[3].name`.
 *
 * Every derivation returns a new Path. Two paths addressing the same location have the
 * same string form and compare equal.
 */
export class Path {
  private static readonly EMPTY = new Path([])

  private _string?: string

  private constructor(private readonly _segments: readonly PathSegment[]) {}

  /**
   * Parses a dotted/bracketed path. A leading JSONPath root marker (`$` or `$.`) is dropped.
   * The empty string is the root path.
   */
  static create(path: string): Path {
    const segments = parseSegments(path)
    return segments.length === 0 ? Path.EMPTY : new Path(segments)
  }

  static empty(): Path {
    return Path.EMPTY
  }

  isEmpty(): boolean {
    return this._segments.length === 0
  }

  /**
   * The parsed segments of this path.
   */
  segments(): readonly PathSegment[] {
    return this._segments
  }

  /**
   * The key path used to resolve this path within a JSON tree,
   * e.g. `a.b[2].c` becomes `["a", "b", 2, "c"]`.
   */
  keyPath(): KeyPath {
    const keys: (string | number)[] = []
    for (const segment of this._segments) {
      keys.push(segment.key)
      if (segment.index !== undefined) {
        keys.push(segment.index)
      }
    }
    return keys
  }

  /**
   * Appends one or more segments. The argument may itself be a dotted path.
   */
  join(segment: string): Path {
    const joined = parseSegments(segment)
    if (joined.length === 0) {
      return this
    }
    return new Path([...this._segments, ...joined])
  }

  /**
   * Appends a single field named `key`, taken as is. Unlike {@link join}, dots and brackets in
   * `key` are part of the name.
   */
  child(key: string): Path {
    return new Path([...this._segments, { key }])
  }

  /**
   * Returns the path to element `index` of the array this path refers to.
   * If this path is already an array element, its index is replaced.
   */
  atIndex(index: number): Path {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new PathError(`Invalid array index ${index} for path "${this.toString()}"`)
    }
    const last = this.lastSegment("atIndex")
    return new Path([...this._segments.slice(0, -1), { key: last.key, index }])
  }

  parentPath(): Path {
    this.lastSegment("parentPath")
    return this._segments.length === 1 ? Path.EMPTY : new Path(this._segments.slice(0, -1))
  }

  /**
   * Drops the array index of the last segment, e.g. `a.b[2]` becomes `a.b`.
   */
  withoutArrayReference(): Path {
    if (!this.isArrayElement()) {
      return this
    }
    const last = this.lastSegment("withoutArrayReference")
    return new Path([...this._segments.slice(0, -1), { key: last.key }])
  }

  isArrayElement(): boolean {
    const last = this._segments[this._segments.length - 1]
    return last !== undefined && last.index !== undefined
  }

  arrayIndex(): number {
    const index = this.lastSegment("arrayIndex").index
    if (index === undefined) {
      throw new PathError(`Path "${this.toString()}" is not an array element`)
    }
    return index
  }

  /**
   * The field name of the last segment, without any array index. Empty for the root path.
   */
  keyName(): string {
    const last = this._segments[this._segments.length - 1]
    return last === undefined ? "" : last.key
  }

  /**
   * True if `other` is this path or one of its ancestors.
   */
  startsWith(other: Path): boolean {
    const mine = this.toString()
    const theirs = other.toString()
    return (
      theirs === "" ||
      mine === theirs ||
      mine.startsWith(`${theirs}.`) ||
      mine.startsWith(`${theirs}[`)
    )
  }

  equals(other: Path): boolean {
    return this.toString() === other.toString()
  }

  /**
   * The JSONPath form of this path, e.g. `$.applicant.name`.
   */
  toJsonPath(): string {
    return this.isEmpty() ? "$" : `$.${this.toString()}`
  }

  toString(): string {
    if (this._string === undefined) {
      this._string = this._segments.map(segmentToString).join(".")
    }
    return this._string
  }

  private lastSegment(operation: string): PathSegment {
    const last = this._segments[this._segments.length - 1]
    if (last === undefined) {
      throw new PathError(`Cannot call ${operation}() on the root path`)
    }
    return last
  }
}
