import { resolve } from "node:path"
import { asBoolean, asPositiveInt, asPositiveNumber } from "./util.js"

export interface OrchestratorSettings {
  projectRoot: string
  configFile: string
  ansibleDir: string
  ansibleConfig: string
  helmDir: string
  terraformDir: string
  logFile: string
  credentialsFile: string
  kubernetesAuthFile: string
  readinessTimeoutSeconds: number
  commandTimeoutMs: number
  tunnelSettleScale: number
  debug: boolean
}

function optional(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]
  if (!value || !value.trim()) return null
  return value.trim()
}

/**
 * Paths are resolved against `projectRoot`; the playbooks themselves write the
 * handoff files relative to it, so those two are not configurable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, projectRoot = process.cwd()): OrchestratorSettings {
  const ansibleDir = resolve(projectRoot, optional(env, "BOOTSTRAP_ANSIBLE_DIR") || "ansible")

  return {
    projectRoot,
    configFile: resolve(projectRoot, optional(env, "BOOTSTRAP_CONFIG_FILE") || "secrets.local.yaml"),
    ansibleDir,
    ansibleConfig: resolve(ansibleDir, "ansible.cfg"),
    helmDir: resolve(projectRoot, optional(env, "BOOTSTRAP_HELM_DIR") || "helm"),
    terraformDir: resolve(projectRoot, optional(env, "BOOTSTRAP_TERRAFORM_DIR") || "terraform/vault"),
    logFile: resolve(projectRoot, optional(env, "BOOTSTRAP_LOG_FILE") || "bootstrap.log"),
    credentialsFile: resolve(projectRoot, ".vault-credentials.yml"),
    kubernetesAuthFile: resolve(projectRoot, ".vault-k8s-auth.yml"),
    readinessTimeoutSeconds: asPositiveInt(env.BOOTSTRAP_READINESS_TIMEOUT_SECONDS, 300),
    commandTimeoutMs: asPositiveInt(env.BOOTSTRAP_COMMAND_TIMEOUT_MS, 900_000),
    tunnelSettleScale: asPositiveNumber(env.BOOTSTRAP_TUNNEL_SETTLE_SCALE, 1),
    debug: asBoolean(env.BOOTSTRAP_DEBUG, false),
  }
}
