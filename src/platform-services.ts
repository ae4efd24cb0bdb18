import type { PackageInstall, ValueOverride } from "./package-deployer.js"
import type { PlatformConfig } from "./platform-config.js"
import type { ReadinessTarget } from "./readiness.js"
import type { TunnelDefinition } from "./tunnel-manager.js"

export type PlatformServiceKey = "vault" | "keycloak" | "jenkins" | "mongodb" | "externalSecrets"

export interface PlatformService {
  key: PlatformServiceKey
  displayName: string
  release: string
  chart: string
  namespace: string
  valuesFile: string
  repository: { name: string; url: string }
  readiness: ReadinessTarget
  wait?: boolean
  timeout?: string
}

export const PLATFORM_SERVICES: Record<PlatformServiceKey, PlatformService> = {
  vault: {
    key: "vault",
    displayName: "HashiCorp Vault",
    release: "vault",
    chart: "hashicorp/vault",
    namespace: "vault",
    valuesFile: "vault/values.yaml",
    repository: { name: "hashicorp", url: "https://helm.releases.hashicorp.com" },
    readiness: { namespace: "vault", labelSelector: "app.kubernetes.io/name=vault" },
  },
  keycloak: {
    key: "keycloak",
    displayName: "Keycloak",
    release: "keycloak",
    chart: "bitnami/keycloak",
    namespace: "keycloak",
    valuesFile: "keycloak/values.yaml",
    repository: { name: "bitnami", url: "https://charts.bitnami.com/bitnami" },
    readiness: { namespace: "keycloak", labelSelector: "app.kubernetes.io/name=keycloak" },
  },
  jenkins: {
    key: "jenkins",
    displayName: "Jenkins",
    release: "jenkins",
    chart: "jenkins/jenkins",
    namespace: "jenkins",
    valuesFile: "jenkins/values.yaml",
    repository: { name: "jenkins", url: "https://charts.jenkins.io" },
    readiness: { namespace: "jenkins", labelSelector: "app.kubernetes.io/component=jenkins-controller" },
    wait: true,
    timeout: "10m",
  },
  mongodb: {
    key: "mongodb",
    displayName: "MongoDB Community Operator",
    release: "mongodb-operator",
    chart: "mongodb/community-operator",
    namespace: "mongodb",
    valuesFile: "mongodb/values.yaml",
    repository: { name: "mongodb", url: "https://mongodb.github.io/helm-charts" },
    readiness: { namespace: "mongodb", labelSelector: "name=mongodb-kubernetes-operator" },
    wait: true,
    timeout: "5m",
  },
  externalSecrets: {
    key: "externalSecrets",
    displayName: "External Secrets Operator",
    release: "external-secrets",
    chart: "external-secrets/external-secrets",
    namespace: "external-secrets",
    valuesFile: "external-secrets/values.yaml",
    repository: { name: "external-secrets", url: "https://charts.external-secrets.io" },
    readiness: { namespace: "external-secrets", labelSelector: "app.kubernetes.io/name=external-secrets" },
    wait: true,
    timeout: "5m",
  },
}

export type TunnelKey = "terraformVault" | "vault" | "keycloak" | "jenkins"

export const TUNNELS: Record<TunnelKey, TunnelDefinition> = {
  // addresses the pod, not the service
  terraformVault: {
    name: "vault-0",
    namespace: "vault",
    target: "vault-0",
    localPort: 8200,
    remotePort: 8200,
    settleDelayMs: 3_000,
  },
  vault: {
    name: "vault",
    namespace: "vault",
    target: "svc/vault",
    localPort: 8200,
    remotePort: 8200,
    settleDelayMs: 5_000,
  },
  keycloak: {
    name: "keycloak",
    namespace: "keycloak",
    target: "svc/keycloak",
    localPort: 8080,
    remotePort: 80,
    settleDelayMs: 5_000,
  },
  jenkins: {
    name: "jenkins",
    namespace: "jenkins",
    target: "svc/jenkins",
    localPort: 8080,
    remotePort: 8080,
    settleDelayMs: 10_000,
  },
}

export function tunnelDefinition(key: TunnelKey, settleScale = 1): TunnelDefinition {
  const definition = TUNNELS[key]
  return {
    ...definition,
    settleDelayMs: Math.round(definition.settleDelayMs * settleScale),
  }
}

export function localAddress(key: TunnelKey): string {
  return `http://localhost:${TUNNELS[key].localPort}`
}

export function vaultOverrides(config: PlatformConfig): ValueOverride[] {
  return [["server.ha.replicas", config.vault.replicas]]
}

export function keycloakOverrides(config: PlatformConfig): ValueOverride[] {
  return [
    ["auth.adminUser", config.keycloak.adminUser],
    ["auth.adminPassword", config.keycloak.adminPassword],
    ["image.registry", "docker.io"],
    ["image.repository", "bitnamilegacy/keycloak"],
    ["postgresql.image.registry", "docker.io"],
    ["postgresql.image.repository", "bitnamilegacy/postgresql"],
    ["postgresql.auth.password", config.keycloak.postgresqlPassword],
  ]
}

/**
 * Git and registry settings reach the controller as container environment
 * variables, one indexed `controller.containerEnv[i]` pair per entry.
 */
export function jenkinsOverrides(config: PlatformConfig): ValueOverride[] {
  const { git, dockerhubRegistry } = config.jenkins
  const containerEnv: Array<[string, string]> = []
  if (git) {
    containerEnv.push(["GIT_REPOSITORY", git.repository], ["GIT_BRANCH", git.branch])
    if (git.credentialsId) {
      containerEnv.push(["GIT_CREDENTIALS_ID", git.credentialsId])
    }
  }
  if (dockerhubRegistry) {
    containerEnv.push(["DOCKERHUB_REGISTRY", dockerhubRegistry])
  }

  return [
    ["controller.admin.password", config.jenkins.adminPassword],
    ...containerEnv.flatMap(([name, value], index): ValueOverride[] => [
      [`controller.containerEnv[${index}].name`, name],
      [`controller.containerEnv[${index}].value`, value],
    ]),
  ]
}

export function packageInstall(
  service: PlatformService,
  helmDir: string,
  overrides: readonly ValueOverride[] = [],
): PackageInstall {
  return {
    release: service.release,
    chart: service.chart,
    namespace: service.namespace,
    valuesFile: `${helmDir}/${service.valuesFile}`,
    repository: service.repository,
    overrides,
    ...(service.wait ? { wait: true } : {}),
    ...(service.timeout ? { timeout: service.timeout } : {}),
  }
}
