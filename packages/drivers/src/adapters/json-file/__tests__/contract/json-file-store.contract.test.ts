import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { DocumentBackend } from "../../../../core/document/document-backend"
import { describeStorageBackendContract } from "../../../../ports/__tests__/storage-backend.contract"
import { JsonFileStore } from "../../json-file-store"

const dirs: string[] = []

afterAll(() => {
  for (const dir of dirs) fs.rmSync(dir, { recursive: true, force: true })
})

describeStorageBackendContract("JsonFileStore", () => {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "layerconf-json-"))
  dirs.push(rootDir)

  return new DocumentBackend({ store: new JsonFileStore({ rootDir }) })
})
