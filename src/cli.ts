#!/usr/bin/env node
import { realpathSync } from "node:fs"
import { resolve } from "node:path"
import { pathToFileURL } from "node:url"
import dotenv from "dotenv"
import type { DestinationStream } from "pino"
import { fixedConfirmation, promptConfirmation, type ConfirmationPolicy } from "./cluster-provisioner.js"
import type { CommandRuntime } from "./command-runtime.js"
import { isBootstrapError } from "./errors.js"
import { createLogger, type Logger } from "./logger.js"
import { createBootstrapServices, runBootstrap, type BootstrapContext, type BootstrapReport } from "./orchestrator.js"
import { loadSettings } from "./settings.js"
import type { StageFileRuntime } from "./stage-executor.js"
import type { TunnelRuntime } from "./tunnel-manager.js"

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_INTERRUPTED = 130

export interface CliArgs {
  help: boolean
  clusterName: string
  servers: number
  agents: number
  skipCluster: boolean
  debug: boolean
  configFile: string | null
  triggerBuild: boolean | string
  yes: boolean
}

function parsePositiveInt(raw: string, label: string): number {
  const parsed = Number.parseInt(raw, 10)
  if (!/^\d+$/u.test(raw.trim()) || !Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive integer.`)
  }
  return parsed
}

function parseNonNegativeInt(raw: string, label: string): number {
  const parsed = Number.parseInt(raw, 10)
  if (!/^\d+$/u.test(raw.trim()) || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${label} must be a non-negative integer.`)
  }
  return parsed
}

function requireValue(argv: string[], idx: number, flag: string): string {
  const next = argv[idx + 1]?.trim()
  if (!next || next.startsWith("--")) throw new Error(`${flag} requires a value.`)
  return next
}

export function parseArgs(argv: string[]): CliArgs {
  let clusterName = "cka"
  let servers = 1
  let agents = 2
  let skipCluster = false
  let debug = false
  let configFile: string | null = null
  let triggerBuild: boolean | string = false
  let yes = false
  let help = false

  for (let idx = 0; idx < argv.length; idx += 1) {
    const arg = argv[idx] ?? ""
    if (arg === "--help" || arg === "-h") {
      help = true
      continue
    }
    if (arg === "--skip-cluster") {
      skipCluster = true
      continue
    }
    if (arg === "--debug") {
      debug = true
      continue
    }
    if (arg === "--yes" || arg === "-y") {
      yes = true
      continue
    }
    if (arg === "--trigger-build") {
      triggerBuild = true
      continue
    }
    if (arg.startsWith("--trigger-build=")) {
      const environment = arg.slice("--trigger-build=".length).trim()
      if (!environment) throw new Error("--trigger-build= requires an environment.")
      triggerBuild = environment
      continue
    }
    if (arg.startsWith("--cluster-name=")) {
      clusterName = arg.slice("--cluster-name=".length).trim()
      continue
    }
    if (arg === "--cluster-name") {
      clusterName = requireValue(argv, idx, "--cluster-name")
      idx += 1
      continue
    }
    if (arg.startsWith("--servers=")) {
      servers = parsePositiveInt(arg.slice("--servers=".length), "--servers")
      continue
    }
    if (arg === "--servers") {
      servers = parsePositiveInt(requireValue(argv, idx, "--servers"), "--servers")
      idx += 1
      continue
    }
    if (arg.startsWith("--agents=")) {
      agents = parseNonNegativeInt(arg.slice("--agents=".length), "--agents")
      continue
    }
    if (arg === "--agents") {
      agents = parseNonNegativeInt(requireValue(argv, idx, "--agents"), "--agents")
      idx += 1
      continue
    }
    if (arg.startsWith("--config=")) {
      configFile = arg.slice("--config=".length).trim()
      continue
    }
    if (arg === "--config") {
      configFile = requireValue(argv, idx, "--config")
      idx += 1
      continue
    }

    throw new Error(`Unknown argument: ${arg}`)
  }

  if (!clusterName) {
    throw new Error("--cluster-name must not be empty.")
  }

  return {
    help,
    clusterName,
    servers,
    agents,
    skipCluster,
    debug,
    configFile: configFile || null,
    triggerBuild,
    yes,
  }
}

export function printHelp(write: (line: string) => void = console.log): void {
  write("Usage: platform-bootstrap [--cluster-name=<name>] [--servers=<n>] [--agents=<n>] [--skip-cluster] [--debug]")
  write("                          [--config=<file>] [--trigger-build[=<environment>]] [--yes]")
  write("")
  write("Flags:")
  write("  --cluster-name <name>   k3d cluster name (default: cka)")
  write("  --servers <n>           server nodes (default: 1)")
  write("  --agents <n>            agent nodes (default: 2)")
  write("  --skip-cluster          reuse an existing cluster without asking")
  write("  --debug                 debug logging to the console and bootstrap.log")
  write("  --config <file>         platform document (default: secrets.local.yaml)")
  write("  --trigger-build[=env]   trigger application builds once the platform is up")
  write("  --yes                   recreate an existing cluster without asking")
  write("")
  write("Optional environment variables:")
  write("  BOOTSTRAP_CONFIG_FILE                platform document path")
  write("  BOOTSTRAP_ANSIBLE_DIR                playbook directory (default: ansible)")
  write("  BOOTSTRAP_HELM_DIR                   chart values directory (default: helm)")
  write("  BOOTSTRAP_TERRAFORM_DIR              Vault terraform directory (default: terraform/vault)")
  write("  BOOTSTRAP_LOG_FILE                   debug log file (default: bootstrap.log)")
  write("  BOOTSTRAP_READINESS_TIMEOUT_SECONDS  pod readiness timeout (default: 300)")
  write("  BOOTSTRAP_COMMAND_TIMEOUT_MS         per-command timeout (default: 900000)")
  write("  BOOTSTRAP_TUNNEL_SETTLE_SCALE        multiplier for port-forward settle delays (default: 1)")
  write("  BOOTSTRAP_DEBUG                      same as --debug")
  write("")
  write("Exit codes:")
  write("  0    platform is up")
  write("  1    bootstrap failed")
  write("  130  interrupted")
}

export function exitCodeFor(error: unknown, interruptedByUser: boolean): number {
  if (interruptedByUser || isBootstrapError(error, "INTERRUPTED")) {
    return EXIT_INTERRUPTED
  }
  return EXIT_FAILURE
}

export function reportFailure(logger: Logger, error: unknown): void {
  if (isBootstrapError(error, "INTERRUPTED")) {
    logger.warn("Bootstrap interrupted by user")
    return
  }

  if (isBootstrapError(error)) {
    logger.error({ code: error.code }, error.message)
    if (error.details.stderr) {
      logger.debug(error.details.stderr)
    }
    for (const command of error.details.suggestedCommands ?? []) {
      logger.info(`Try: ${command}`)
    }
    return
  }

  logger.error({ err: error }, "Unexpected error during bootstrap")
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv
  cwd?: string
  destination?: DestinationStream
  signal?: AbortSignal
  confirmation?: ConfirmationPolicy
  commandRuntime?: CommandRuntime
  tunnelRuntime?: TunnelRuntime
  stageFiles?: StageFileRuntime
  bootstrap?: (context: BootstrapContext) => Promise<BootstrapReport>
}

function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onInterrupt = () => {
    controller.abort()
  }
  process.once("SIGINT", onInterrupt)
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onInterrupt)
    },
  }
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let args: CliArgs
  try {
    args = parseArgs(argv)
  } catch (error) {
    console.error(`[bootstrap] ${error instanceof Error ? error.message : String(error)}`)
    printHelp(console.error)
    return EXIT_FAILURE
  }

  if (args.help) {
    printHelp()
    return EXIT_OK
  }

  const env = deps.env ?? process.env
  const cwd = deps.cwd ?? process.cwd()
  const settings = loadSettings(env, cwd)
  if (args.configFile) {
    settings.configFile = resolve(cwd, args.configFile)
  }

  const debug = args.debug || settings.debug
  const logger = createLogger({ debug, logFile: settings.logFile, destination: deps.destination })
  const interrupt = deps.signal ? { signal: deps.signal, dispose: () => undefined } : interruptSignal()
  const confirmation = deps.confirmation ?? (args.yes ? fixedConfirmation(true) : promptConfirmation())

  logger.info("=".repeat(70))
  logger.info("Platform Bootstrap")
  logger.info("=".repeat(70))

  try {
    const services = createBootstrapServices({
      settings,
      logger,
      debug,
      confirmation,
      signal: interrupt.signal,
      commandRuntime: deps.commandRuntime,
      tunnelRuntime: deps.tunnelRuntime,
      stageFiles: deps.stageFiles,
    })
    const bootstrap = deps.bootstrap ?? runBootstrap
    const report = await bootstrap({
      settings,
      services,
      options: {
        debug,
        triggerBuild: args.triggerBuild,
        cluster: {
          name: args.clusterName,
          servers: args.servers,
          agents: args.agents,
          skipIfExists: args.skipCluster,
        },
      },
    })

    const totalMs = report.steps.reduce((sum, step) => sum + step.durationMs, 0)
    logger.info(
      { cluster: report.cluster, clients: report.clients.length, durationMs: totalMs },
      "Bootstrap finished",
    )
    return EXIT_OK
  } catch (error) {
    reportFailure(logger, error)
    return exitCodeFor(error, interrupt.signal.aborted)
  } finally {
    interrupt.dispose()
  }
}

async function main(): Promise<void> {
  dotenv.config()
  process.exitCode = await runCli(process.argv.slice(2))
}

// npm links the bin, so compare against the resolved entry path
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  void main().catch((error) => {
    console.error(`[bootstrap] fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}`)
    process.exitCode = EXIT_FAILURE
  })
}
