import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("binds the context given at construction to every line", () => {
      const { logger, read } = h.make({
        context: { module: "x509-source", endpoint: "tcp://127.0.0.1:8081" },
      })

      logger.info("Received first X.509 context", { version: 1 })
      logger.warn("Workload API watch failed; serving last X.509 context")

      expect(read().map((log) => log.payload)).toEqual([
        expect.objectContaining({ module: "x509-source", endpoint: "tcp://127.0.0.1:8081", version: 1 }),
        expect.objectContaining({ module: "x509-source", endpoint: "tcp://127.0.0.1:8081" }),
      ])
    })

    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ endpoint: "unix:///tmp/agent.sock" })
      const child = parent.child({ spiffeId: "spiffe://example.org/api" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        endpoint: "unix:///tmp/agent.sock",
        spiffeId: "spiffe://example.org/api",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "source" }).child({ module: "watcher" })

      child.info("hello")

      expect(read()[0]?.payload.module).toBe("watcher")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "source" })
      const child = parent.child({ trustDomain: "example.org" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("trustDomain")
      expect(logs[1]?.payload).toMatchObject({ module: "source", trustDomain: "example.org" })

      clear()
      expect(read()).toHaveLength(0)
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "source" }).info("hello", { module: "gate", version: 2 })

      expect(read()[0]?.payload).toMatchObject({ module: "gate", version: 2 })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
