import { createNullLogger, type LoggerOptions } from "@layerconf/logger"
import { DocumentBackend } from "../core/document/document-backend"
import { openConfiguredBackend } from "../open-configured-backend"

describe("openConfiguredBackend", () => {
  it("builds the logger from the log settings", async () => {
    const logger = createNullLogger()
    const info = vi.spyOn(logger, "info")
    const createLogger = vi.fn((_opts: LoggerOptions) => logger)

    const opened = await openConfiguredBackend({
      sources: [],
      overrides: { STORAGE_TYPE: "memory", LOG_LEVEL: "debug", LOG_PRETTY: "true" },
      createLogger,
    })

    expect(createLogger).toHaveBeenCalledTimes(1)
    expect(createLogger).toHaveBeenCalledWith({ level: "debug", prettify: true })
    expect(opened.logger).toBe(logger)
    expect(opened.config.storage).toStrictEqual({ type: "memory" })
    expect(opened.backend).toBeInstanceOf(DocumentBackend)
    expect(opened.backend.state).toBe("created")
    expect(info).toHaveBeenCalledWith("Storage configured", { type: "memory", sources: ["object:overrides"] })
  })

  it("uses info without prettifying by default", async () => {
    const createLogger = vi.fn((_opts: LoggerOptions) => createNullLogger())

    await openConfiguredBackend({ sources: [], overrides: { STORAGE_TYPE: "memory" }, createLogger })

    expect(createLogger).toHaveBeenCalledTimes(1)
    expect(createLogger).toHaveBeenCalledWith({ level: "info", prettify: false })
  })
})
