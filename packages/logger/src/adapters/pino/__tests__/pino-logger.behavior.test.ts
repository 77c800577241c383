import { Writable } from "node:stream"
import { BaseError } from "@cloudbucket/errors"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  const payloads = (): Record<string, unknown>[] => lines.map((line) => JSON.parse(line))

  return { lines, destination, payloads }
}

describe("PinoLogger behavior", () => {
  it("emits JSON with msg, time and numeric level", () => {
    const { destination, payloads } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "svc" })

    logger.info("hello", { bucket: "media" })

    const [payload] = payloads()

    expect(payload).toMatchObject({ msg: "hello", service: "svc", bucket: "media", level: 30 })
    expect(typeof payload?.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { destination, payloads } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { provider: "s3" })
    const child = base.child({ bucket: "media" })

    child.info("ignored")
    child.warn("logged")

    expect(payloads()).toHaveLength(1)
    expect(payloads()[0]).toMatchObject({ msg: "logged", provider: "s3", bucket: "media" })
  })

  it("serializes err with its cause", () => {
    const { destination, payloads } = makeLineDestination()
    const logger = createPinoLogger({ destination }, { level: "info" })

    const cause = new Error("socket hang up")
    const err = new BaseError("upload failed", { code: "transfer_failed", cause })

    logger.error("upload failed", { err })

    const logged = payloads()[0]?.err

    expect(logged).toMatchObject({
      type: "BaseError",
      message: "upload failed",
      code: "transfer_failed",
    })
    expect(JSON.stringify(logged)).toContain("socket hang up")
  })

  it("defaults to info when no level is given", () => {
    const { destination, payloads } = makeLineDestination()
    const logger = createPinoLogger({ destination })

    logger.debug("hidden")
    logger.info("shown")

    expect(payloads().map((p) => p.msg)).toEqual(["shown"])
  })
})
