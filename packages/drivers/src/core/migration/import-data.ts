import { BaseError } from "@layerconf/errors"
import type { Logger } from "@layerconf/logger"
import type {
  CategoryImport,
  ConfigDriver,
  FailedLeaf,
  ImportReport,
  ImportRow,
} from "../../ports/config-driver"
import { type CustomGroupData, getPrimaryKeyInfo } from "../identifier/categories"
import { IdentifierData } from "../identifier/identifier-data"
import { splitByArity } from "./split-by-arity"

export type ImportDataDeps = {
  driver: Pick<ConfigDriver, "cogName" | "uuid" | "set">
  logger: Logger
}

export class MalformedPayloadError extends BaseError<"malformed_payload"> {
  constructor(category: string, depth: number) {
    super(`Expected an object at primary key depth ${depth} of ${category}`, {
      code: "malformed_payload",
      context: { category, depth },
    })
  }
}

/**
 * Two-phase import: one `set` per category; when that fails, one `set` per
 * primary-key leaf. Leaf failures are logged and collected, never thrown.
 */
export async function importData(
  deps: ImportDataDeps,
  rows: Iterable<ImportRow>,
  customGroups: CustomGroupData = {},
): Promise<ImportReport> {
  const { driver } = deps
  const logger = deps.logger.child({ cogName: driver.cogName, uuid: driver.uuid })
  const categories: CategoryImport[] = []
  const failed: FailedLeaf[] = []

  logger.info("Importing cog data")

  for (const [category, payload] of rows) {
    const info = getPrimaryKeyInfo(category, customGroups)
    const root = new IdentifierData({
      cogName: driver.cogName,
      uuid: driver.uuid,
      category,
      primaryKeyLength: info.primaryKeyLength,
      isCustom: info.isCustom,
    })

    logger.info("Importing category", { category })

    try {
      await driver.set(root, payload)
      categories.push({ category, mode: "bulk", written: 1 })
      continue
    } catch (err) {
      logger.warn("Bulk import failed, retrying per primary key", { category, err })
    }

    let written = 0

    for (const leaf of splitByArity(payload, info.primaryKeyLength)) {
      const id = root.addPrimaryKey(...leaf.primaryKey)

      try {
        if (leaf.kind === "malformed") {
          throw new MalformedPayloadError(category, leaf.primaryKey.length)
        }
        await driver.set(id, leaf.data)
        written += 1
      } catch (err) {
        logger.fatal("Error saving imported value", {
          category,
          identifier: id.toString(),
          err,
        })
        failed.push({ category, primaryKey: leaf.primaryKey, error: err })
      }
    }

    categories.push({ category, mode: "split", written })
  }

  return { categories, failed }
}
