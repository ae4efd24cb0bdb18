import { existsSync } from "node:fs"
import { ClientProvisioner, type ProvisionedClient } from "./client-provisioner.js"
import { ClusterProvisioner, type ClusterOutcome, type ClusterSpec, type ConfirmationPolicy } from "./cluster-provisioner.js"
import { CommandRunner } from "./command-runner.js"
import type { CommandRuntime } from "./command-runtime.js"
import { loadCredentialsBundle, type CredentialsBundle, type HandoffFiles } from "./credentials.js"
import { configMissing, toolNotFound } from "./errors.js"
import type { Logger } from "./logger.js"
import { PackageDeployer } from "./package-deployer.js"
import { loadPlatformConfig, type PlatformConfig } from "./platform-config.js"
import {
  PLATFORM_SERVICES,
  jenkinsOverrides,
  keycloakOverrides,
  localAddress,
  packageInstall,
  tunnelDefinition,
  vaultOverrides,
  type TunnelKey,
} from "./platform-services.js"
import { ReadinessGate } from "./readiness.js"
import type { OrchestratorSettings } from "./settings.js"
import { StageExecutor, type StageFileRuntime } from "./stage-executor.js"
import { TunnelManager, type TunnelRuntime } from "./tunnel-manager.js"

export const REQUIRED_TOOLS = ["k3d", "kubectl", "helm", "ansible-playbook", "terraform"] as const

export interface BootstrapOptions {
  cluster: ClusterSpec
  debug: boolean
  /** `true` builds the configured default environment; a string names the environment. */
  triggerBuild?: boolean | string
}

export interface BootstrapServices {
  logger: Logger
  runner: CommandRunner
  tunnels: TunnelManager
  stages: StageExecutor
  packages: PackageDeployer
  cluster: ClusterProvisioner
  readiness: ReadinessGate
  clients: ClientProvisioner
  loadConfig: (path: string) => Promise<PlatformConfig>
  loadCredentials: (files: HandoffFiles) => Promise<CredentialsBundle>
  directoryExists: (path: string) => boolean
  now: () => number
}

export interface BootstrapContext {
  settings: OrchestratorSettings
  options: BootstrapOptions
  services: BootstrapServices
}

export interface StepTiming {
  name: string
  durationMs: number
}

export interface BootstrapReport {
  cluster: { name: string; outcome: ClusterOutcome }
  steps: StepTiming[]
  clients: ProvisionedClient[]
  triggeredBuild: string | null
}

export interface CreateBootstrapServicesOptions {
  settings: OrchestratorSettings
  logger: Logger
  debug: boolean
  confirmation: ConfirmationPolicy
  signal?: AbortSignal
  commandRuntime?: CommandRuntime
  tunnelRuntime?: TunnelRuntime
  stageFiles?: StageFileRuntime
  directoryExists?: (path: string) => boolean
  now?: () => number
}

export function createBootstrapServices(options: CreateBootstrapServicesOptions): BootstrapServices {
  const { settings, logger } = options
  const runner = new CommandRunner({
    logger: logger.child({ component: "command" }),
    runtime: options.commandRuntime,
    signal: options.signal,
    timeoutMs: settings.commandTimeoutMs,
  })
  const stages = new StageExecutor({
    runner,
    logger: logger.child({ component: "stage" }),
    ansibleDir: settings.ansibleDir,
    ansibleConfig: settings.ansibleConfig,
    workingDirectory: settings.projectRoot,
    verbose: options.debug,
    files: options.stageFiles,
  })

  return {
    logger,
    runner,
    stages,
    tunnels: new TunnelManager({ logger: logger.child({ component: "tunnel" }), runtime: options.tunnelRuntime }),
    packages: new PackageDeployer({ runner, logger: logger.child({ component: "helm" }) }),
    cluster: new ClusterProvisioner({
      runner,
      logger: logger.child({ component: "cluster" }),
      confirmation: options.confirmation,
    }),
    readiness: new ReadinessGate({
      stages,
      logger: logger.child({ component: "readiness" }),
      timeoutSeconds: settings.readinessTimeoutSeconds,
    }),
    clients: new ClientProvisioner({ stages, logger: logger.child({ component: "clients" }) }),
    loadConfig: loadPlatformConfig,
    loadCredentials: (files) => loadCredentialsBundle(files),
    directoryExists: options.directoryExists ?? ((path) => existsSync(path)),
    now: options.now ?? Date.now,
  }
}

export function resolveBuildEnvironment(config: PlatformConfig, requested: boolean | string | undefined): string | null {
  if (!requested) {
    return null
  }
  const environment = typeof requested === "string" ? requested : config.jenkins.defaultEnvironment ?? config.keycloak.realms[0]
  if (!environment || !config.keycloak.realms.includes(environment)) {
    throw configMissing(
      "jenkins.default_environment",
      `Build environment '${environment ?? ""}' is not one of the declared realms: ${config.keycloak.realms.join(", ")}`,
    )
  }
  return environment
}

/**
 * Stands the platform up in a fixed order. Each step depends on the state left
 * by the previous one, so there is no parallelism and no resume point: a
 * failure propagates as-is and a re-run relies on every step being idempotent.
 */
export async function runBootstrap(context: BootstrapContext): Promise<BootstrapReport> {
  const { settings, options, services } = context
  const { logger } = services
  const steps: StepTiming[] = []

  const step = async <T>(name: string, work: () => Promise<T>): Promise<T> => {
    const startedAt = services.now()
    const result = await work()
    const durationMs = services.now() - startedAt
    steps.push({ name, durationMs })
    logger.debug({ step: name, durationMs }, "Step completed")
    return result
  }

  const withTunnels = <T>(keys: TunnelKey[], work: () => Promise<T>): Promise<T> =>
    services.tunnels.withTunnels(
      keys.map((key) => tunnelDefinition(key, settings.tunnelSettleScale)),
      () => work(),
    )

  const config = await step("load-config", () => services.loadConfig(settings.configFile))
  const buildEnvironment = resolveBuildEnvironment(config, options.triggerBuild)

  await step("check-prerequisites", async () => {
    logger.info("Checking prerequisites...")
    for (const tool of REQUIRED_TOOLS) {
      if (!services.runner.commandExists(tool)) {
        throw toolNotFound(tool)
      }
      logger.debug(`Found ${tool}`)
    }
  })

  const clusterOutcome = await step("provision-cluster", () => services.cluster.provision(options.cluster))

  await step("verify-cluster", () => services.stages.run({ playbook: "verify-cluster.yml" }))

  const vault = PLATFORM_SERVICES.vault
  await step("deploy-vault", async () => {
    await services.packages.install(packageInstall(vault, settings.helmDir, vaultOverrides(config)))
    await services.readiness.waitFor(vault.readiness, "running")
  })

  await step("initialize-vault", async () => {
    await services.stages.run({ playbook: "vault/init.yml" })
    await services.stages.run({
      playbook: "vault/unseal.yml",
      variables: { vault_replicas: config.vault.replicas },
    })
    await services.readiness.waitFor(vault.readiness, "ready")
  })

  await step("vault-kubernetes-auth", () => services.stages.run({ playbook: "vault/setup-k8s-auth.yml" }))

  const credentials = await step("load-credentials", () =>
    services.loadCredentials({
      credentialsFile: settings.credentialsFile,
      kubernetesAuthFile: settings.kubernetesAuthFile,
    }),
  )
  const vaultToken = credentials.vault.rootToken

  await step("configure-vault", async () => {
    if (!services.directoryExists(settings.terraformDir)) {
      throw configMissing("BOOTSTRAP_TERRAFORM_DIR", `Terraform directory not found: ${settings.terraformDir}`)
    }

    await withTunnels(["terraformVault"], async () => {
      const terraformOptions = {
        cwd: settings.terraformDir,
        env: {
          VAULT_ADDR: localAddress("vault"),
          VAULT_TOKEN: vaultToken,
          TF_IN_AUTOMATION: "true",
        },
        redact: [vaultToken, credentials.kubernetes.tokenReviewerJwt],
      }
      logger.info("Initializing Terraform...")
      await services.runner.run("terraform", ["init"], terraformOptions)
      logger.info("Applying Terraform configuration...")
      await services.runner.run(
        "terraform",
        [
          "apply",
          "-auto-approve",
          "-var",
          `vault_addr=${localAddress("vault")}`,
          "-var",
          `vault_token=${vaultToken}`,
          "-var",
          `kubernetes_host=${credentials.kubernetes.host}`,
          "-var",
          `token_reviewer_jwt=${credentials.kubernetes.tokenReviewerJwt}`,
          "-var",
          `kubernetes_ca_cert=${credentials.kubernetes.caCert}`,
        ],
        terraformOptions,
      )
    })
  })

  await step("store-secrets", () =>
    withTunnels(["vault"], () =>
      services.stages.run({ playbook: "vault/store-secrets.yml", variables: { vault_token: vaultToken } }),
    ),
  )

  const keycloak = PLATFORM_SERVICES.keycloak
  const clients = await step("keycloak", async () => {
    await services.packages.install(packageInstall(keycloak, settings.helmDir, keycloakOverrides(config)))
    await services.readiness.waitFor(keycloak.readiness, "ready")

    return withTunnels(["vault", "keycloak"], async () => {
      await services.stages.run({ playbook: "keycloak/configure.yml", variables: { vault_token: vaultToken } })
      return services.clients.provision(config.keycloak.clients, config.keycloak.realms, {
        keycloakAdminUser: config.keycloak.adminUser,
        keycloakAdminPassword: config.keycloak.adminPassword,
        keycloakUrl: localAddress("keycloak"),
        vaultToken,
        vaultAddr: localAddress("vault"),
      })
    })
  })

  const jenkins = PLATFORM_SERVICES.jenkins
  await step("jenkins", async () => {
    await services.packages.install(packageInstall(jenkins, settings.helmDir, jenkinsOverrides(config)))
    await services.readiness.waitFor(jenkins.readiness, "ready")
    await withTunnels(["vault", "jenkins"], () =>
      services.stages.run({ playbook: "jenkins/configure.yml", variables: { vault_token: vaultToken } }),
    )
  })

  const mongodb = PLATFORM_SERVICES.mongodb
  await step("mongodb", async () => {
    await services.packages.install(packageInstall(mongodb, settings.helmDir))
    await services.readiness.waitFor(mongodb.readiness, "ready")

    for (const environment of config.keycloak.realms) {
      const database = config.mongodb[environment]
      await withTunnels(["vault"], () =>
        services.stages.run({
          playbook: "mongodb/configure-vault-secrets.yml",
          variables: {
            target_env: environment,
            vault_token: vaultToken,
            ...(database ? { mongodb_username: database.username, mongodb_password: database.password } : {}),
          },
        }),
      )
    }
  })

  const externalSecrets = PLATFORM_SERVICES.externalSecrets
  await step("external-secrets", async () => {
    await services.packages.install(packageInstall(externalSecrets, settings.helmDir))
    await services.readiness.waitFor(externalSecrets.readiness, "ready")
  })

  if (buildEnvironment) {
    await step("trigger-build", () =>
      withTunnels(["vault", "jenkins"], () =>
        services.stages.run({
          playbook: "jenkins/trigger-build.yml",
          variables: {
            target_env: buildEnvironment,
            app_names: [...config.jenkins.apps],
            vault_token: vaultToken,
            ...(config.jenkins.dockerhubRegistry ? { dockerhub_registry: config.jenkins.dockerhubRegistry } : {}),
          },
        }),
      ),
    )
  }

  logCompletionSummary(logger, config, credentials, options.debug)

  return {
    cluster: { name: options.cluster.name, outcome: clusterOutcome },
    steps,
    clients,
    triggeredBuild: buildEnvironment,
  }
}

function reveal(value: string, debug: boolean): string {
  return debug ? value : "[redacted]"
}

export function logCompletionSummary(
  logger: Logger,
  config: PlatformConfig,
  credentials: CredentialsBundle,
  debug: boolean,
): void {
  const rule = "=".repeat(70)
  logger.info(rule)
  logger.info("Bootstrap Complete: Infrastructure Ready")
  logger.info(rule)
  logger.info(`Vault URL: ${localAddress("vault")} (kubectl port-forward -n vault svc/vault 8200:8200)`)
  logger.info(`Vault Token: ${reveal(credentials.vault.rootToken, debug)}`)
  logger.info(`Keycloak URL: ${localAddress("keycloak")} (kubectl port-forward -n keycloak svc/keycloak 8080:80)`)
  logger.info(`Keycloak Admin: ${config.keycloak.adminUser} / ${reveal(config.keycloak.adminPassword, debug)}`)
  logger.info(`Jenkins URL: ${localAddress("jenkins")} (kubectl port-forward -n jenkins svc/jenkins 8080:8080)`)
  logger.info(`Jenkins Admin: admin / ${reveal(config.jenkins.adminPassword, debug)}`)
}
