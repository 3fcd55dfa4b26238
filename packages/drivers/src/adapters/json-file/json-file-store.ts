import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { BackendError } from "@layerconf/errors"
import { createMemoryLock, type Lock, withLock } from "@layerconf/lock"
import { cloneJson } from "../../core/document/path-ops"
import type { DocumentStore } from "../../ports/document-store"
import { defineValue, isJsonObject, type JsonObject, ownValue } from "../../ports/json-value"
import type { Namespace } from "../../ports/namespace"

export type JsonFileStoreOptions = {
  /** Directory holding one sub-directory per cog. */
  rootDir: string
}

export type JsonFileStoreDeps = {
  /** Serializes writers of the same cog file. */
  lock?: Lock
}

const SETTINGS_FILE = "settings.json"

/**
 * Stores each cog as `<rootDir>/<encoded cogName>/settings.json`, a JSON object
 * mapping uuid to that namespace's document. Files are replaced atomically
 * through a temp file and a rename.
 */
export class JsonFileStore implements DocumentStore {
  readonly name = "json"
  private readonly rootDir: string
  private readonly lock: Lock

  constructor(options: JsonFileStoreOptions, deps: JsonFileStoreDeps = {}) {
    this.rootDir = path.resolve(options.rootDir)
    this.lock = deps.lock ?? createMemoryLock()
  }

  async open(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true })
  }

  async close(): Promise<void> {}

  async read(ns: Namespace): Promise<JsonObject | undefined> {
    const file = await this.readCogFile(ns.cogName)
    const doc = ownValue(file, ns.uuid)

    return isJsonObject(doc) ? doc : undefined
  }

  async mutate<T>(ns: Namespace, fn: (doc: JsonObject) => T): Promise<T> {
    return withLock(this.lock, `json-file:${ns.cogName}`, async () => {
      const file = await this.readCogFile(ns.cogName)
      const current = ownValue(file, ns.uuid)
      const draft = isJsonObject(current) ? cloneJson(current) : {}
      const result = fn(draft)

      if (Object.keys(draft).length === 0) {
        delete file[ns.uuid]
      } else {
        defineValue(file, ns.uuid, draft)
      }

      await this.writeCogFile(ns.cogName, file)

      return result
    })
  }

  async deleteAll(): Promise<void> {
    for (const cogName of await this.listCogs()) {
      await withLock(this.lock, `json-file:${cogName}`, () =>
        fs.rm(this.cogDir(cogName), { recursive: true, force: true }),
      )
    }
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    for (const cogName of await this.listCogs()) {
      const file = await this.readCogFile(cogName)

      for (const uuid of Object.keys(file)) {
        yield { cogName, uuid }
      }
    }
  }

  /** Dots are escaped as well, so `.` and `..` stay inside `rootDir`. */
  private cogDir(cogName: string): string {
    return path.join(this.rootDir, encodeURIComponent(cogName).replaceAll(".", "%2E"))
  }

  private async listCogs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true })

      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => decodeURIComponent(entry.name))
        .sort()
    } catch (err) {
      if (this.isNotFoundError(err)) return []
      throw err
    }
  }

  private async readCogFile(cogName: string): Promise<JsonObject> {
    const filePath = path.join(this.cogDir(cogName), SETTINGS_FILE)
    let raw: string

    try {
      raw = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (this.isNotFoundError(err)) return {}
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new BackendError(`Corrupt settings file ${filePath}`, { cause: err })
    }

    if (!isJsonObject(parsed)) {
      throw new BackendError(`Settings file ${filePath} does not hold an object`)
    }

    return parsed
  }

  private async writeCogFile(cogName: string, file: JsonObject): Promise<void> {
    const dir = this.cogDir(cogName)

    if (Object.keys(file).length === 0) {
      await fs.rm(dir, { recursive: true, force: true })
      return
    }

    await fs.mkdir(dir, { recursive: true })

    const filePath = path.join(dir, SETTINGS_FILE)
    const tmpPath = `${filePath}.${randomUUID()}.tmp`

    await fs.writeFile(tmpPath, JSON.stringify(file))
    await fs.rename(tmpPath, filePath)
  }

  private isNotFoundError(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT"
  }
}
