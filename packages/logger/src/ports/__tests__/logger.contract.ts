import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const client = logger.child({ provider: "s3" })
      const bucket = client.child({ bucket: "media" })

      bucket.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ provider: "s3", bucket: "media" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ bucket: "media" }).child({ bucket: "archive" })

      child.info("hello")

      expect(read()[0]?.payload.bucket).toBe("archive")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ provider: "gcs" })
      const child = parent.child({ bucket: "media" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ provider: "gcs" })
      expect(logs[0]?.payload).not.toHaveProperty("bucket")
      expect(logs[1]?.payload).toMatchObject({ provider: "gcs", bucket: "media" })
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ bucket: "media" }).debug("uploaded", {
        operation: "upload",
        key: "a.txt",
        durationMs: 12,
      })

      expect(read()[0]?.payload).toMatchObject({
        bucket: "media",
        operation: "upload",
        key: "a.txt",
        durationMs: 12,
      })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("clear() empties captured output", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("one")
      clear()

      expect(read()).toEqual([])
    })
  })
}
