import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines with bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { backend: "json" })

    logger.info("Converting cog", { cogName: "music" })

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "Converting cog",
      backend: "json",
      cogName: "music",
      level: 30,
    })
  })

  it("child() inherits the sink and the level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { backend: "redis" })
    const child = base.child({ cogName: "music", uuid: "1" })

    child.info("ignored")
    child.fatal("Error saving leaf")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "Error saving leaf",
      backend: "redis",
      cogName: "music",
      uuid: "1",
      level: 60,
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("inner") }) })

    const payload = parseLine(lines[0])

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "inner" },
    })
  })
})
