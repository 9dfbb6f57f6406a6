import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("endpoint unreachable", { code: "connection" })

      expect(err.message).toBe("endpoint unreachable")
      expect(err.code).toBe("connection")
    })

    it("uses the subclass name", () => {
      class SourceClosed extends BaseError<"closed"> {
        constructor() {
          super("source is closed", { code: "closed" })
        }
      }

      expect(new SourceClosed().name).toBe("SourceClosed")
    })

    it("applies defaults", () => {
      const err = new BaseError("x", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("freezes a copy of the context", () => {
      const context = { address: "unix:///tmp/agent.sock" }
      const err = new BaseError("x", { code: "test", context })

      context.address = "changed"

      expect(err.context).toEqual({ address: "unix:///tmp/agent.sock" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("is an Error with a stack", () => {
      const err = new BaseError("x", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("BaseError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("no bundle", {
        code: "not_found",
        context: { trustDomain: "example.org" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "not_found",
        message: "no bundle",
        context: { trustDomain: "example.org" },
        isRetryable: false,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
