import { execFile as execFileCallback, spawn } from "node:child_process"
import { accessSync, constants, statSync } from "node:fs"
import { delimiter, join } from "node:path"
import { promisify } from "node:util"

const execFileAsync = promisify(execFileCallback)

const DEFAULT_COMMAND_TIMEOUT_MS = 900_000

export interface CommandRunOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  signal?: AbortSignal
}

export interface CommandResult {
  ok: boolean
  stdout: string
  stderr: string
  exitCode: number | null
  error?: string
  errorCode?: string
  aborted?: boolean
}

export interface CommandRuntime {
  env: NodeJS.ProcessEnv
  commandExists: (command: string) => boolean
  runCaptured: (command: string, args: string[], options?: CommandRunOptions) => Promise<CommandResult>
  runStreamed: (command: string, args: string[], options?: CommandRunOptions) => Promise<CommandResult>
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK)
    return statSync(path).isFile()
  } catch {
    return false
  }
}

/** PATH lookup without spawning `which`; the first executable regular file wins. */
export function commandExists(command: string, pathValue = process.env.PATH ?? ""): boolean {
  return pathValue
    .split(delimiter)
    .map((entry) => entry.trim())
    .some((entry) => entry.length > 0 && isExecutableFile(join(entry, command)))
}

function isAbortError(error: { name?: string; code?: unknown }): boolean {
  return error.name === "AbortError" || error.code === "ABORT_ERR"
}

async function runCaptured(
  command: string,
  args: string[],
  options: CommandRunOptions = {},
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env || process.env,
      timeout: options.timeoutMs || DEFAULT_COMMAND_TIMEOUT_MS,
      maxBuffer: 8 * 1024 * 1024,
      signal: options.signal,
    })

    return {
      ok: true,
      stdout: stdout || "",
      stderr: stderr || "",
      exitCode: 0,
    }
  } catch (error) {
    const commandError = error as {
      name?: string
      stdout?: string
      stderr?: string
      message?: string
      code?: number | string
    }

    return {
      ok: false,
      stdout: commandError.stdout || "",
      stderr: commandError.stderr || "",
      error: commandError.message,
      exitCode: typeof commandError.code === "number" ? commandError.code : null,
      errorCode: typeof commandError.code === "string" ? commandError.code : undefined,
      aborted: isAbortError(commandError),
    }
  }
}

async function runStreamed(
  command: string,
  args: string[],
  options: CommandRunOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env || process.env,
      stdio: "inherit",
      timeout: options.timeoutMs || DEFAULT_COMMAND_TIMEOUT_MS,
      signal: options.signal,
    })

    let settled = false
    const finish = (result: CommandResult) => {
      if (settled) return
      settled = true
      resolve(result)
    }

    child.once("error", (error: Error & { code?: string }) => {
      finish({
        ok: false,
        stdout: "",
        stderr: "",
        error: error.message,
        exitCode: null,
        errorCode: error.code,
        aborted: isAbortError(error),
      })
    })

    child.once("close", (code, signal) => {
      finish({
        ok: code === 0,
        stdout: "",
        stderr: "",
        exitCode: code,
        ...(code === 0 ? {} : { error: signal ? `terminated by ${signal}` : `exited with code ${code}` }),
      })
    })
  })
}

export function defaultCommandRuntime(): CommandRuntime {
  return {
    env: process.env,
    commandExists: (command) => commandExists(command),
    runCaptured,
    runStreamed,
  }
}
