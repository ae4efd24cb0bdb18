import { confirm } from "@inquirer/prompts"
import type { CommandRunner } from "./command-runner.js"
import { interrupted } from "./errors.js"
import type { Logger } from "./logger.js"

export interface ClusterSpec {
  name: string
  servers: number
  agents: number
  skipIfExists: boolean
}

export type ClusterOutcome = "created" | "reused" | "recreated"

export interface ConfirmationPolicy {
  shouldRecreate: (clusterName: string) => Promise<boolean>
}

export function fixedConfirmation(answer: boolean): ConfirmationPolicy {
  return {
    shouldRecreate: async () => answer,
  }
}

export function promptConfirmation(options: { interactive?: boolean } = {}): ConfirmationPolicy {
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY)
  return {
    shouldRecreate: async (clusterName) => {
      if (!interactive) {
        return false
      }
      try {
        return await confirm({
          message: `Cluster '${clusterName}' already exists. Delete and recreate it?`,
          default: false,
        })
      } catch (error) {
        if (error instanceof Error && error.name === "ExitPromptError") {
          throw interrupted()
        }
        throw error
      }
    },
  }
}

export function parseClusterNames(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim().split(/\s+/u)[0] ?? "")
    .filter(Boolean)
}

export function buildClusterCreateArgs(spec: ClusterSpec): string[] {
  return [
    "cluster",
    "create",
    spec.name,
    "--servers",
    String(spec.servers),
    "--agents",
    String(spec.agents),
    "--port",
    "443:443@loadbalancer",
    "--port",
    "80:80@loadbalancer",
    "--wait",
  ]
}

export class ClusterProvisioner {
  private readonly runner: CommandRunner
  private readonly logger: Logger
  private readonly confirmation: ConfirmationPolicy

  constructor(options: { runner: CommandRunner; logger: Logger; confirmation: ConfirmationPolicy }) {
    this.runner = options.runner
    this.logger = options.logger
    this.confirmation = options.confirmation
  }

  async exists(name: string): Promise<boolean> {
    const { stdout } = await this.runner.run("k3d", ["cluster", "list", "--no-headers"])
    return parseClusterNames(stdout).includes(name)
  }

  async provision(spec: ClusterSpec): Promise<ClusterOutcome> {
    if (await this.exists(spec.name)) {
      if (spec.skipIfExists) {
        this.logger.info(`Cluster '${spec.name}' already exists, skipping creation`)
        return "reused"
      }

      if (!(await this.confirmation.shouldRecreate(spec.name))) {
        this.logger.info(`Using existing cluster '${spec.name}'`)
        return "reused"
      }

      this.logger.info(`Deleting cluster '${spec.name}'`)
      await this.runner.run("k3d", ["cluster", "delete", spec.name])
      await this.create(spec)
      return "recreated"
    }

    await this.create(spec)
    return "created"
  }

  private async create(spec: ClusterSpec): Promise<void> {
    this.logger.info(`Creating k3d cluster '${spec.name}' (${spec.servers} servers, ${spec.agents} agents)`)
    await this.runner.run("k3d", buildClusterCreateArgs(spec))
    this.logger.info(`Cluster '${spec.name}' created`)
  }
}
