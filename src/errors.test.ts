import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import type { MockInstance } from "vitest"

import {
  AppError,
  ConfigError,
  GitError,
  LockError,
  NotFoundError,
  StoreError,
  ValidationError,
  handleError,
} from "@/errors"

describe("error subclasses", () => {
  test("ConfigError", () => {
    const err = new ConfigError("bad config")
    expect(err).toBeInstanceOf(AppError)
    expect(err).toBeInstanceOf(Error)
    expect(err.code).toBe("CONFIG_ERROR")
    expect(err.exitCode).toBe(3)
    expect(err.name).toBe("ConfigError")
    expect(err.message).toBe("bad config")
    expect(err.hint).toBe("edit or remove .gitpulse/config.json")
  })

  test("ValidationError", () => {
    const err = new ValidationError("invalid input")
    expect(err.code).toBe("VALIDATION_ERROR")
    expect(err.exitCode).toBe(2)
    expect(err.name).toBe("ValidationError")
    expect(err.hint).toBeUndefined()
  })

  test("NotFoundError", () => {
    const err = new NotFoundError("no database", "run ingest")
    expect(err.code).toBe("NOT_FOUND")
    expect(err.exitCode).toBe(4)
    expect(err.hint).toBe("run ingest")
  })

  test("GitError defaults its message", () => {
    const err = new GitError()
    expect(err.code).toBe("GIT_ERROR")
    expect(err.exitCode).toBe(5)
    expect(err.message).toBe("not a git repository")
  })

  test("LockError names the lock file", () => {
    const err = new LockError("/tmp/gitpulse.db.lock")
    expect(err.code).toBe("LOCK_ERROR")
    expect(err.exitCode).toBe(6)
    expect(err.message).toBe(
      "another gitpulse ingest is running (lock file exists: /tmp/gitpulse.db.lock)",
    )
  })

  test("StoreError includes the underlying cause", () => {
    const err = new StoreError("/data/x.db", new Error("unable to open"))
    expect(err.code).toBe("STORE_ERROR")
    expect(err.exitCode).toBe(7)
    expect(err.message).toBe("cannot open database /data/x.db: unable to open")
  })
})

describe("handleError", () => {
  let exitSpy: MockInstance<typeof process.exit>
  let errorSpy: MockInstance<typeof console.error>
  let logSpy: MockInstance<typeof console.log>
  let exitCode: number | undefined

  beforeEach(() => {
    exitCode = undefined
    exitSpy = vi.spyOn(process, "exit").mockImplementation((code) => {
      exitCode = Number(code)
      throw new Error(`process.exit(${code})`)
    })
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {})
  })

  afterEach(() => {
    exitSpy.mockRestore()
    errorSpy.mockRestore()
    logSpy.mockRestore()
  })

  test("text mode: AppError without hint", () => {
    expect(() => handleError(new ValidationError("bad date"), "text")).toThrow(
      "process.exit(2)",
    )
    expect(exitCode).toBe(2)
    expect(errorSpy).toHaveBeenCalledWith("Error: bad date")
    expect(errorSpy).toHaveBeenCalledTimes(1)
  })

  test("text mode: AppError with hint", () => {
    expect(() => handleError(new ConfigError("bad config"), "text")).toThrow(
      "process.exit(3)",
    )
    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(errorSpy).toHaveBeenNthCalledWith(1, "Error: bad config")
    expect(errorSpy).toHaveBeenNthCalledWith(
      2,
      "Hint: edit or remove .gitpulse/config.json",
    )
  })

  test("text mode: plain Error", () => {
    expect(() => handleError(new Error("boom"), "text")).toThrow(
      "process.exit(1)",
    )
    expect(exitCode).toBe(1)
    expect(errorSpy).toHaveBeenCalledWith("Error: boom")
  })

  test("text mode: non-Error", () => {
    expect(() => handleError("string error", "text")).toThrow("process.exit(1)")
    expect(errorSpy).toHaveBeenCalledWith("Error: string error")
  })

  test("json mode: AppError without hint", () => {
    expect(() => handleError(new GitError(), "json")).toThrow("process.exit(5)")
    const output = JSON.parse(String(logSpy.mock.calls[0][0]))
    expect(output).toEqual({
      success: false,
      error: "not a git repository",
      code: "GIT_ERROR",
    })
  })

  test("json mode: AppError with hint", () => {
    expect(() => handleError(new LockError("x.lock"), "json")).toThrow(
      "process.exit(6)",
    )
    const output = JSON.parse(String(logSpy.mock.calls[0][0]))
    expect(output.code).toBe("LOCK_ERROR")
    expect(output.hint).toBe("remove the lock file if no ingest is running")
  })

  test("json mode: plain Error", () => {
    expect(() => handleError(new Error("boom"), "json")).toThrow(
      "process.exit(1)",
    )
    const output = JSON.parse(String(logSpy.mock.calls[0][0]))
    expect(output).toEqual({ success: false, error: "boom" })
  })
})
