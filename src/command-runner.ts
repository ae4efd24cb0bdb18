import { commandFailed, interrupted, toolNotFound } from "./errors.js"
import type { Logger } from "./logger.js"
import { defaultCommandRuntime, type CommandResult, type CommandRuntime } from "./command-runtime.js"
import { formatCommand, outputTail } from "./util.js"

export type OutputMode = "captured" | "streamed"

export interface RunCommandOptions {
  cwd?: string
  env?: Record<string, string | undefined>
  mode?: OutputMode
  timeoutMs?: number
  /** Values masked wherever the command line is logged or reported. */
  redact?: readonly string[]
}

export interface CommandOutput {
  stdout: string
  stderr: string
}

export interface CommandRunnerOptions {
  logger: Logger
  runtime?: CommandRuntime
  signal?: AbortSignal
  timeoutMs?: number
}

export function maskValues(text: string, values: readonly string[] = []): string {
  return values
    .filter((value) => value.length > 0)
    .reduce((masked, value) => masked.split(value).join("[redacted]"), text)
}

/**
 * Runs external tools to completion. A non-zero exit becomes `COMMAND_FAILED`,
 * a missing executable `TOOL_NOT_FOUND`, and an aborted run `INTERRUPTED`.
 * Nothing is retried here.
 */
export class CommandRunner {
  private readonly runtime: CommandRuntime
  private readonly logger: Logger
  private readonly signal?: AbortSignal
  private readonly timeoutMs?: number

  constructor(options: CommandRunnerOptions) {
    this.runtime = options.runtime ?? defaultCommandRuntime()
    this.logger = options.logger
    this.signal = options.signal
    this.timeoutMs = options.timeoutMs
  }

  commandExists(command: string): boolean {
    return this.runtime.commandExists(command)
  }

  async run(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandOutput> {
    const rendered = maskValues(formatCommand(command, args), options.redact)
    if (this.signal?.aborted) {
      throw interrupted(rendered)
    }

    const mode = options.mode ?? "captured"
    this.logger.debug({ command: rendered, cwd: options.cwd, mode }, "Executing command")

    const runOptions = {
      cwd: options.cwd,
      env: options.env ? { ...this.runtime.env, ...options.env } : this.runtime.env,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: this.signal,
    }
    const result = mode === "streamed"
      ? await this.runtime.runStreamed(command, args, runOptions)
      : await this.runtime.runCaptured(command, args, runOptions)

    if (!result.ok) {
      throw this.toError(command, rendered, result, options.redact)
    }

    if (result.stdout.trim()) {
      this.logger.debug(result.stdout.trim())
    }

    return {
      stdout: result.stdout,
      stderr: result.stderr,
    }
  }

  private toError(command: string, rendered: string, result: CommandResult, redact?: readonly string[]) {
    if (result.aborted || this.signal?.aborted) {
      return interrupted(rendered)
    }
    if (result.errorCode === "ENOENT") {
      return toolNotFound(command)
    }

    const stderr = maskValues(outputTail({ stderr: result.stderr || result.error }), redact)
    if (stderr) {
      this.logger.error(`Command failed: ${stderr}`)
    }
    return commandFailed(rendered, stderr, result.exitCode)
  }
}
