import { InvalidArgumentError } from "commander"

export function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer")
  }
  return n
}

/** Parses a TCP port; 0 asks the OS for a free one. */
export function parsePort(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("must be an integer between 0 and 65535")
  }
  const n = parseInt(value, 10)
  if (n > 65535) {
    throw new InvalidArgumentError("must be an integer between 0 and 65535")
  }
  return n
}
