import type { OutputFormat } from "@/types"

export type ErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "LOCK_ERROR"
  | "GIT_ERROR"
  | "STORE_ERROR"

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly exitCode: number
  readonly hint?: string

  constructor(message: string, hint?: string) {
    super(message)
    this.name = this.constructor.name
    this.hint = hint
  }
}

export class ConfigError extends AppError {
  readonly code = "CONFIG_ERROR" as const
  readonly exitCode = 3

  constructor(message: string) {
    super(message, "edit or remove .gitpulse/config.json")
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR" as const
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND" as const
  readonly exitCode = 4

  constructor(message: string, hint?: string) {
    super(message, hint)
  }
}

export class GitError extends AppError {
  readonly code = "GIT_ERROR" as const
  readonly exitCode = 5

  constructor(message: string = "not a git repository") {
    super(message)
  }
}

export class LockError extends AppError {
  readonly code = "LOCK_ERROR" as const
  readonly exitCode = 6

  constructor(lockPath: string) {
    super(
      `another gitpulse ingest is running (lock file exists: ${lockPath})`,
      "remove the lock file if no ingest is running",
    )
  }
}

export class StoreError extends AppError {
  readonly code = "STORE_ERROR" as const
  readonly exitCode = 7

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`cannot open database ${path}: ${detail}`)
  }
}

export function handleError(err: unknown, format: OutputFormat): never {
  let message: string
  let code: string | undefined
  let hint: string | undefined
  let exitCode = 1

  if (err instanceof AppError) {
    message = err.message
    code = err.code
    hint = err.hint
    exitCode = err.exitCode
  } else if (err instanceof Error) {
    message = err.message
  } else {
    message = String(err)
  }

  if (format === "json") {
    const payload: Record<string, unknown> = { success: false, error: message }
    if (code) payload.code = code
    if (hint) payload.hint = hint
    console.log(JSON.stringify(payload, null, 2))
  } else {
    console.error(`Error: ${message}`)
    if (hint) console.error(`Hint: ${hint}`)
  }

  process.exit(exitCode)
}
