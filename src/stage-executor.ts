import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"
import type { CommandRunner } from "./command-runner.js"
import { isBootstrapError, stageFailed } from "./errors.js"
import type { Logger } from "./logger.js"

export type StageScalar = string | number | boolean
export type StageVariable = StageScalar | StageVariable[] | { [key: string]: StageVariable }

export interface StageSpec {
  playbook: string
  variables?: Record<string, StageVariable>
  verbose?: boolean
}

export interface StageFileRuntime {
  writeVariablesFile: (variables: Record<string, StageVariable>) => Promise<string>
  remove: (path: string) => Promise<void>
}

export interface StageExecutorOptions {
  runner: CommandRunner
  logger: Logger
  ansibleDir: string
  ansibleConfig: string
  workingDirectory?: string
  verbose?: boolean
  files?: StageFileRuntime
}

const SENSITIVE_KEY = /token|password|secret|jwt/i
// ansible splits `-e` on whitespace, so anything with spaces or quotes cannot ride in key=value form
const UNSAFE_INLINE_VALUE = /[\s"'\\]/u

function defaultFileRuntime(): StageFileRuntime {
  return {
    writeVariablesFile: async (variables) => {
      const directory = await mkdtemp(join(tmpdir(), "platform-bootstrap-"))
      const path = join(directory, "extra-vars.json")
      await writeFile(path, JSON.stringify(variables), { encoding: "utf8", mode: 0o600 })
      return path
    },
    remove: async (path) => {
      await rm(dirname(path), { recursive: true, force: true })
    },
  }
}

function isInlineScalar(key: string, value: StageVariable): value is StageScalar {
  if (typeof value === "number" || typeof value === "boolean") {
    return !SENSITIVE_KEY.test(key)
  }
  if (typeof value === "string") {
    return value.length > 0 && !SENSITIVE_KEY.test(key) && !UNSAFE_INLINE_VALUE.test(value)
  }
  return false
}

/**
 * Splits a variable map into plain `key=value` pairs and the remainder that
 * has to travel through a JSON extra-vars file: structured values, values with
 * whitespace or quotes, and anything that looks like a credential.
 */
export function partitionVariables(variables: Record<string, StageVariable>): {
  inline: Array<[string, StageScalar]>
  file: Record<string, StageVariable>
} {
  const inline: Array<[string, StageScalar]> = []
  const file: Record<string, StageVariable> = {}

  for (const [key, value] of Object.entries(variables)) {
    if (isInlineScalar(key, value)) {
      inline.push([key, value])
    } else {
      file[key] = value
    }
  }

  return { inline, file }
}

export class StageExecutor {
  private readonly runner: CommandRunner
  private readonly logger: Logger
  private readonly ansibleDir: string
  private readonly ansibleConfig: string
  private readonly workingDirectory?: string
  private readonly verbose: boolean
  private readonly files: StageFileRuntime

  constructor(options: StageExecutorOptions) {
    this.runner = options.runner
    this.logger = options.logger
    this.ansibleDir = options.ansibleDir
    this.ansibleConfig = options.ansibleConfig
    this.workingDirectory = options.workingDirectory
    this.verbose = options.verbose ?? false
    this.files = options.files ?? defaultFileRuntime()
  }

  async run(stage: StageSpec): Promise<void> {
    const playbookPath = join(this.ansibleDir, stage.playbook)
    const verbose = stage.verbose ?? this.verbose
    const { inline, file } = partitionVariables(stage.variables ?? {})

    this.logger.info(`Running playbook: ${stage.playbook}`)

    const variablesFile = Object.keys(file).length > 0 ? await this.files.writeVariablesFile(file) : null
    const args = [
      playbookPath,
      ...(verbose ? ["-v"] : []),
      ...inline.flatMap(([key, value]) => ["-e", `${key}=${String(value)}`]),
      ...(variablesFile ? ["-e", `@${variablesFile}`] : []),
    ]

    try {
      await this.runner.run("ansible-playbook", args, {
        cwd: this.workingDirectory,
        env: { ANSIBLE_CONFIG: this.ansibleConfig },
        mode: verbose ? "streamed" : "captured",
      })
    } catch (error) {
      if (isBootstrapError(error, "COMMAND_FAILED")) {
        throw stageFailed(stage.playbook, error.details.stderr ?? "", error.details.exitCode ?? null)
      }
      throw error
    } finally {
      if (variablesFile) {
        await this.files.remove(variablesFile).catch((error: unknown) => {
          this.logger.warn({ err: error, path: variablesFile }, "Failed to remove extra-vars file")
        })
      }
    }

    this.logger.info(`Playbook completed: ${stage.playbook}`)
  }
}
