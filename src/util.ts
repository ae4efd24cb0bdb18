import { setTimeout as delay } from "node:timers/promises"

const MAX_OUTPUT_CHARS = 8000

export function asBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  const normalized = value.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) return true
  if (["0", "false", "no", "off"].includes(normalized)) return false
  return fallback
}

export function asPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || "", 10)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback
  }
  return parsed
}

export function asPositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(value || "")
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback
  }
  return parsed
}

export function outputTail(result: { stdout?: string; stderr?: string }, maxChars = MAX_OUTPUT_CHARS): string {
  const combined = [result.stdout || "", result.stderr || ""].filter(Boolean).join("\n").trim()
  if (combined.length <= maxChars) {
    return combined
  }
  return combined.slice(-maxChars)
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ")
}

/** Rejects with an `AbortError` and clears the timer when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal })
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }
  return value
}
