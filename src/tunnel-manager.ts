import { spawn } from "node:child_process"
import { commandFailed } from "./errors.js"
import type { Logger } from "./logger.js"
import { formatCommand, sleep } from "./util.js"

const DEFAULT_CLOSE_GRACE_MS = 5_000
const MAX_STDERR_CHARS = 4_000

export interface TunnelDefinition {
  name: string
  namespace: string
  target: string
  localPort: number
  remotePort: number
  settleDelayMs: number
}

export interface TunnelProcess {
  pid: number | undefined
  running: () => boolean
  stderr: () => string
  kill: (signal: NodeJS.Signals) => void
  exited: Promise<void>
}

export interface TunnelRuntime {
  spawnBackground: (command: string, args: string[]) => TunnelProcess
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface TunnelManagerOptions {
  logger: Logger
  runtime?: TunnelRuntime
  closeGraceMs?: number
}

function defaultRuntime(): TunnelRuntime {
  return {
    spawnBackground: (command, args) => {
      const child = spawn(command, args, {
        stdio: ["ignore", "ignore", "pipe"],
      })

      let stderr = ""
      let running = true
      child.stderr?.setEncoding("utf8")
      child.stderr?.on("data", (chunk: string) => {
        stderr = `${stderr}${chunk}`.slice(-MAX_STDERR_CHARS)
      })

      const exited = new Promise<void>((resolve) => {
        child.once("error", (error) => {
          stderr = `${stderr}${error.message}`.slice(-MAX_STDERR_CHARS)
          running = false
          resolve()
        })
        child.once("exit", () => {
          running = false
          resolve()
        })
      })

      return {
        pid: child.pid,
        running: () => running,
        stderr: () => stderr,
        kill: (signal) => {
          child.kill(signal)
        },
        exited,
      }
    },
    sleep,
  }
}

export function buildPortForwardArgs(definition: TunnelDefinition): string[] {
  return [
    "port-forward",
    "-n",
    definition.namespace,
    definition.target,
    `${definition.localPort}:${definition.remotePort}`,
  ]
}

export class TunnelHandle {
  readonly definition: TunnelDefinition
  private readonly child: TunnelProcess
  private closed = false

  constructor(definition: TunnelDefinition, child: TunnelProcess) {
    this.definition = definition
    this.child = child
  }

  get isOpen(): boolean {
    return !this.closed
  }

  get localAddress(): string {
    return `http://localhost:${this.definition.localPort}`
  }

  /** @internal used by {@link TunnelManager.close} */
  release(): { child: TunnelProcess; alreadyClosed: boolean } {
    const alreadyClosed = this.closed
    this.closed = true
    return { child: this.child, alreadyClosed }
  }
}

/**
 * Owns `kubectl port-forward` processes. A tunnel is considered usable after a
 * fixed settle delay; there is no readiness probe on the forwarded port.
 */
export class TunnelManager {
  private readonly logger: Logger
  private readonly runtime: TunnelRuntime
  private readonly closeGraceMs: number

  constructor(options: TunnelManagerOptions) {
    this.logger = options.logger
    this.runtime = options.runtime ?? defaultRuntime()
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS
  }

  async open(definition: TunnelDefinition): Promise<TunnelHandle> {
    const args = buildPortForwardArgs(definition)
    this.logger.debug({ tunnel: definition.name, command: formatCommand("kubectl", args) }, "Starting port-forward")

    const child = this.runtime.spawnBackground("kubectl", args)
    const handle = new TunnelHandle(definition, child)

    await this.runtime.sleep(definition.settleDelayMs)

    if (!child.running()) {
      await this.close(handle)
      throw commandFailed(formatCommand("kubectl", args), child.stderr().trim(), null)
    }

    return handle
  }

  async close(handle: TunnelHandle): Promise<void> {
    const { child, alreadyClosed } = handle.release()
    if (alreadyClosed) {
      return
    }

    this.logger.debug({ tunnel: handle.definition.name }, "Stopping port-forward")
    if (!child.running()) {
      await child.exited
      return
    }

    child.kill("SIGTERM")
    const grace = new AbortController()
    const exitedInTime = await Promise.race([
      child.exited.then(() => true),
      // the grace timer only rejects once aborted, i.e. after the exit won
      this.runtime.sleep(this.closeGraceMs, grace.signal).then(
        () => false,
        () => true,
      ),
    ])
    grace.abort()

    if (!exitedInTime) {
      this.logger.warn({ tunnel: handle.definition.name }, "Port-forward ignored SIGTERM, sending SIGKILL")
      child.kill("SIGKILL")
      await child.exited
    }
  }

  /**
   * Opens every tunnel in order, runs `work`, then closes them in reverse
   * order whether or not `work` (or a later open) failed.
   */
  async withTunnels<T>(
    definitions: TunnelDefinition[],
    work: (handles: TunnelHandle[]) => Promise<T>,
  ): Promise<T> {
    const handles: TunnelHandle[] = []
    let outcome: { ok: true; value: T } | { ok: false; error: unknown }

    try {
      for (const definition of definitions) {
        handles.push(await this.open(definition))
      }
      outcome = { ok: true, value: await work(handles) }
    } catch (error) {
      outcome = { ok: false, error }
    }

    let closeError: unknown = null
    for (const handle of [...handles].reverse()) {
      try {
        await this.close(handle)
      } catch (error) {
        this.logger.error({ tunnel: handle.definition.name, err: error }, "Failed to stop port-forward")
        closeError ??= error
      }
    }

    if (!outcome.ok) {
      throw outcome.error
    }
    if (closeError) {
      throw closeError
    }
    return outcome.value
  }
}
