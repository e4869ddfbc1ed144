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

describe("PinoLogger behavior", () => {
  it("emits JSON lines with the message and context", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { module: "data-store" },
    )

    logger.info("object read", { bucket: "reports", key: "a.json" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      msg: "object read",
      module: "data-store",
      bucket: "reports",
      key: "a.json",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("drops entries below the configured level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("ignored")
    logger.info("ignored")
    logger.warn("kept")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!).msg).toBe("kept")
  })

  it("child() inherits sink, level and context", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "info" }, { service: "etl" })
    const child = base.child({ module: "tasks" })

    child.debug("ignored")
    child.info("logged", { hitId: "hit-1" })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      msg: "logged",
      service: "etl",
      module: "tasks",
      hitId: "hit-1",
    })
  })

  it("serializes errors with their cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new Error("outer", { cause: new Error("inner") })
    logger.error("failed", { err })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err.message).toContain("outer")
    expect(payload.err.type).toBe("Error")
  })
})
