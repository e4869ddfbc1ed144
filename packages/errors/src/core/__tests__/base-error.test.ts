import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("object missing", { code: "not_found" })

      expect(err.message).toBe("object missing")
      expect(err.code).toBe("not_found")
      expect(err.name).toBe("BaseError")
    })

    it("applies defaults", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-03-02T08:00:00.000Z"))
    })

    it("freezes a copy of the context", () => {
      const context = { bucket: "reports" }
      const err = new BaseError("x", { code: "x", context })

      context.bucket = "changed"

      expect(err.context).toEqual({ bucket: "reports" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps cause, isRetryable and isOperational", () => {
      const cause = new Error("socket hang up")
      const err = new BaseError("backend failed", {
        code: "backend_error",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("uses the subclass name", () => {
      class StorageFailure extends BaseError<"storage_failure"> {}

      const err = new StorageFailure("x", { code: "storage_failure" })

      expect(err.name).toBe("StorageFailure")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })
  })

  describe("toJSON", () => {
    it("serializes the error", () => {
      const err = new BaseError("bad line", {
        code: "decode_error",
        context: { line: 3 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "decode_error",
        message: "bad line",
        context: { line: 3 },
        isRetryable: false,
        isOperational: true,
        timestamp: "2024-03-02T08:00:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes plain errors with the unknown code", () => {
    expect(serializeError(new TypeError("boom"))).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "boom",
      context: {},
      isRetryable: false,
      isOperational: false,
      timestamp: "2024-03-02T08:00:00.000Z",
    })
  })

  it("wraps non-error values", () => {
    expect(serializeError(42)).toMatchObject({
      name: "NonErrorThrown",
      message: "Unknown error",
      context: { value: 42 },
    })
    expect(serializeError("plain")).toMatchObject({ message: "plain", context: {} })
  })

  it("follows causes", () => {
    const err = new BaseError("outer", {
      code: "backend_error",
      cause: new Error("inner"),
    })

    expect(serializeError(err).cause).toMatchObject({ message: "inner", code: "unknown" })
  })

  it("stops following causes at maxCauseDepth", () => {
    const err = new BaseError("outer", {
      code: "a",
      cause: new BaseError("middle", { code: "b", cause: new Error("inner") }),
    })

    const serialized = serializeError(err, { maxCauseDepth: 1 })

    expect(serialized.cause?.message).toBe("middle")
    expect(serialized.cause?.cause).toBeUndefined()
  })

  it("includes stacks only when asked", () => {
    const err = new BaseError("x", { code: "x" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })
})
