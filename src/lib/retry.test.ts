import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { computeBackoffDelay, retryWithBackoff, retryWithBackoffSync } from "./retry.js"
import { NetworkError } from "./errors.js"
import { logger } from "./logger.js"

vi.mock("./logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

function connectionRefused(): Error {
  return Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" })
}

describe("computeBackoffDelay", () => {
  it("doubles per attempt starting from twice the initial delay", () => {
    expect(computeBackoffDelay(1, 1000, 30_000)).toBe(2000)
    expect(computeBackoffDelay(2, 1000, 30_000)).toBe(4000)
    expect(computeBackoffDelay(3, 1000, 30_000)).toBe(8000)
  })

  it("caps at the maximum delay", () => {
    expect(computeBackoffDelay(4, 1000, 10_000)).toBe(10_000)
    expect(computeBackoffDelay(10, 1000, 10_000)).toBe(10_000)
  })
})

describe("retryWithBackoff", () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("returns the value on first success without logging", async () => {
    const fn = vi.fn().mockResolvedValue("ok")
    const wrapped = retryWithBackoff(fn, { name: "fetchThing" })

    await expect(wrapped("a", 1)).resolves.toBe("ok")
    expect(fn).toHaveBeenCalledWith("a", 1)
    expect(logger.warn).not.toHaveBeenCalled()
    expect(logger.error).not.toHaveBeenCalled()
  })

  it("retries network errors and succeeds on the last attempt", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new NetworkError("timeout"))
      .mockRejectedValueOnce(connectionRefused())
      .mockResolvedValueOnce({ results: [] })
    const wrapped = retryWithBackoff(fn, { retries: 3, initialDelayMs: 100, maxDelayMs: 1000, name: "fetchThing" })

    const promise = wrapped()
    await vi.runAllTimersAsync()

    await expect(promise).resolves.toEqual({ results: [] })
    expect(fn).toHaveBeenCalledTimes(3)
    expect(logger.warn).toHaveBeenCalledTimes(2)
    expect(logger.error).not.toHaveBeenCalled()
    expect(vi.mocked(logger.warn).mock.calls[0][0]).toEqual({
      function: "fetchThing",
      attempt: 1,
      retries: 3,
      nextDelayMs: 200,
      error: "timeout",
    })
    expect(vi.mocked(logger.warn).mock.calls[1][0]).toMatchObject({ attempt: 2, nextDelayMs: 400 })
  })

  it("waits the computed backoff before the next attempt", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new NetworkError("reset")).mockResolvedValueOnce("done")
    const wrapped = retryWithBackoff(fn, { retries: 2, initialDelayMs: 1000, maxDelayMs: 10_000 })

    const promise = wrapped()
    await vi.advanceTimersByTimeAsync(1999)
    expect(fn).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(1)
    await expect(promise).resolves.toBe("done")
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it("returns null and logs one error after exhausting all attempts", async () => {
    const fn = vi.fn().mockRejectedValue(new NetworkError("unreachable"))
    const wrapped = retryWithBackoff(fn, { retries: 4, initialDelayMs: 10, name: "fetchThing" })

    const promise = wrapped()
    await vi.runAllTimersAsync()

    await expect(promise).resolves.toBeNull()
    expect(fn).toHaveBeenCalledTimes(4)
    expect(logger.warn).toHaveBeenCalledTimes(3)
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(vi.mocked(logger.error).mock.calls[0][1]).toBe("fetchThing failed after 4 attempts")
  })

  it("does not retry non-network errors", async () => {
    const fn = vi.fn().mockRejectedValue(new TypeError("cannot read properties of undefined"))
    const wrapped = retryWithBackoff(fn, { name: "parseThing" })

    await expect(wrapped()).resolves.toBeNull()
    expect(fn).toHaveBeenCalledTimes(1)
    expect(logger.warn).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it("honours a custom retry predicate", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("busy")).mockResolvedValueOnce(7)
    const wrapped = retryWithBackoff(fn, {
      retries: 2,
      initialDelayMs: 1,
      isRetryable: (err) => err instanceof Error && err.message === "busy",
    })

    const promise = wrapped()
    await vi.runAllTimersAsync()

    await expect(promise).resolves.toBe(7)
  })
})

describe("retryWithBackoffSync", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("retries synchronous network failures", () => {
    let calls = 0
    const flaky = (value: number): number => {
      calls++
      if (calls < 3) throw connectionRefused()
      return value * 2
    }
    const wrapped = retryWithBackoffSync(flaky, { retries: 3, initialDelayMs: 1, maxDelayMs: 2 })

    expect(wrapped(21)).toBe(42)
    expect(calls).toBe(3)
    expect(logger.warn).toHaveBeenCalledTimes(2)
    expect(logger.error).not.toHaveBeenCalled()
  })

  it("returns null immediately for non-network errors", () => {
    const broken = vi.fn(() => {
      throw new RangeError("bad input")
    })
    const wrapped = retryWithBackoffSync(broken, { retries: 5 })

    expect(wrapped()).toBeNull()
    expect(broken).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledTimes(1)
  })
})
