import { InvalidIdentifierError } from "@layerconf/errors"
import type { Namespace } from "../../ports/namespace"

export type IdentifierDataInit = {
  cogName: string
  uuid: string
  category: string
  primaryKey?: readonly string[]
  identifiers?: readonly string[]
  primaryKeyLength: number
  isCustom?: boolean
}

/**
 * Address of one config value (or subtree):
 * `cogName / uuid / category / ...primaryKey / ...identifiers`.
 *
 * A primary key shorter than `primaryKeyLength` addresses every entry below
 * it; reads through the settings layer always use a full one.
 */
export class IdentifierData {
  readonly cogName: string
  readonly uuid: string
  readonly category: string
  readonly primaryKey: readonly string[]
  readonly identifiers: readonly string[]
  readonly primaryKeyLength: number
  readonly isCustom: boolean

  constructor(init: IdentifierDataInit) {
    const primaryKey = init.primaryKey ?? []

    if (init.cogName === "") {
      throw new InvalidIdentifierError("cogName must not be empty", { uuid: init.uuid })
    }
    if (init.category === "") {
      throw new InvalidIdentifierError("category must not be empty", { cogName: init.cogName })
    }
    if (!Number.isInteger(init.primaryKeyLength) || init.primaryKeyLength < 0) {
      throw new InvalidIdentifierError(
        `primaryKeyLength must be a non-negative integer, got ${init.primaryKeyLength}`,
        { category: init.category },
      )
    }
    if (primaryKey.length > init.primaryKeyLength) {
      throw new InvalidIdentifierError(
        `${init.category} takes at most ${init.primaryKeyLength} primary key part(s), got ${primaryKey.length}`,
        { category: init.category, primaryKey: [...primaryKey] },
      )
    }

    this.cogName = init.cogName
    this.uuid = init.uuid
    this.category = init.category
    this.primaryKey = Object.freeze([...primaryKey])
    this.identifiers = Object.freeze([...(init.identifiers ?? [])])
    this.primaryKeyLength = init.primaryKeyLength
    this.isCustom = init.isCustom ?? false

    Object.freeze(this)
  }

  get namespace(): Namespace {
    return { cogName: this.cogName, uuid: this.uuid }
  }

  /** Path inside the namespace document. */
  get documentPath(): string[] {
    return [this.category, ...this.primaryKey, ...this.identifiers]
  }

  get hasFullPrimaryKey(): boolean {
    return this.primaryKey.length === this.primaryKeyLength
  }

  toPath(): string[] {
    return [this.cogName, this.uuid, ...this.documentPath]
  }

  addIdentifier(...identifiers: string[]): IdentifierData {
    return new IdentifierData({
      ...this.init(),
      identifiers: [...this.identifiers, ...identifiers],
    })
  }

  addPrimaryKey(...keys: string[]): IdentifierData {
    return new IdentifierData({
      ...this.init(),
      primaryKey: [...this.primaryKey, ...keys],
    })
  }

  toString(): string {
    return `${this.cogName}.${this.uuid}:${this.documentPath.join("/")}`
  }

  toJSON(): string[] {
    return this.toPath()
  }

  private init(): IdentifierDataInit {
    return {
      cogName: this.cogName,
      uuid: this.uuid,
      category: this.category,
      primaryKey: this.primaryKey,
      identifiers: this.identifiers,
      primaryKeyLength: this.primaryKeyLength,
      isCustom: this.isCustom,
    }
  }
}
