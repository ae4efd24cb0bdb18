import type { CommandRunner } from "./command-runner.js"
import type { Logger } from "./logger.js"

export interface HelmRepository {
  name: string
  url: string
}

export type ValueOverride = readonly [key: string, value: string | number | boolean]

export interface PackageInstall {
  release: string
  chart: string
  namespace: string
  valuesFile: string
  repository: HelmRepository
  overrides?: readonly ValueOverride[]
  wait?: boolean
  timeout?: string
}

const SENSITIVE_KEY = /password|token|secret/i

export function sensitiveOverrideValues(overrides: readonly ValueOverride[] = []): string[] {
  return overrides.filter(([key]) => SENSITIVE_KEY.test(key)).map(([, value]) => String(value))
}

export function buildUpgradeInstallArgs(install: PackageInstall): string[] {
  return [
    "upgrade",
    "--install",
    install.release,
    install.chart,
    "--namespace",
    install.namespace,
    "--create-namespace",
    "-f",
    install.valuesFile,
    ...(install.overrides ?? []).flatMap(([key, value]) => ["--set", `${key}=${String(value)}`]),
    ...(install.wait ? ["--wait"] : []),
    ...(install.timeout ? ["--timeout", install.timeout] : []),
  ]
}

/**
 * Declarative helm releases: repositories are re-added with `--force-update`
 * and charts go through `upgrade --install`, so repeating a call converges on
 * the same release instead of failing.
 */
export class PackageDeployer {
  private readonly runner: CommandRunner
  private readonly logger: Logger

  constructor(options: { runner: CommandRunner; logger: Logger }) {
    this.runner = options.runner
    this.logger = options.logger
  }

  async addRepository(repository: HelmRepository): Promise<void> {
    this.logger.info(`Adding Helm repository: ${repository.name}`)
    await this.runner.run("helm", ["repo", "add", repository.name, repository.url, "--force-update"])
    await this.runner.run("helm", ["repo", "update", repository.name])
  }

  async install(install: PackageInstall): Promise<void> {
    await this.addRepository(install.repository)

    this.logger.info(`Deploying ${install.release} (${install.chart}) into namespace ${install.namespace}`)
    await this.runner.run("helm", buildUpgradeInstallArgs(install), {
      redact: sensitiveOverrideValues(install.overrides),
    })
    this.logger.info(`${install.release} deployed successfully`)
  }
}
