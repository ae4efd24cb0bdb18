import { configMissing } from "./errors.js"
import type { Logger } from "./logger.js"
import type { ClientDefinition } from "./platform-config.js"
import type { StageExecutor } from "./stage-executor.js"

const WILDCARD = ["*"]

export interface ClientProvisioningStep {
  baseClientId: string
  clientId: string
  environment: string
  name: string
  description: string
  publicClient: boolean
  redirectUris: string[]
  webOrigins: string[]
}

export interface ClientProvisioningAccess {
  keycloakAdminUser: string
  keycloakAdminPassword: string
  keycloakUrl: string
  vaultToken: string
  vaultAddr: string
}

export interface ProvisionedClient {
  clientId: string
  environment: string
}

function nonEmpty(values: readonly string[] | undefined): string[] | null {
  return values && values.length > 0 ? [...values] : null
}

/**
 * First non-empty source wins: the explicit list, the keys of the redirect-URI
 * map, the keys of the web-origin map, and finally every declared realm.
 */
export function resolveClientEnvironments(client: ClientDefinition, realms: readonly string[]): string[] {
  const environments =
    nonEmpty(client.environments) ??
    nonEmpty(client.redirectUris ? Object.keys(client.redirectUris) : undefined) ??
    nonEmpty(client.webOrigins ? Object.keys(client.webOrigins) : undefined) ??
    [...realms]

  if (environments.length === 0) {
    throw configMissing("keycloak.realms", `Client '${client.clientId}' resolves to no environments: declare at least one realm.`)
  }
  return environments
}

export function effectiveClientId(client: Pick<ClientDefinition, "clientId" | "publicClient">, environment: string): string {
  return client.publicClient ? client.clientId : `${client.clientId}-${environment}`
}

export function planClientProvisioning(
  clients: readonly ClientDefinition[],
  realms: readonly string[],
): ClientProvisioningStep[] {
  return clients.flatMap((client) =>
    resolveClientEnvironments(client, realms).map((environment) => ({
      baseClientId: client.clientId,
      clientId: effectiveClientId(client, environment),
      environment,
      name: client.name,
      description: client.description ?? "",
      publicClient: client.publicClient,
      redirectUris: [...(client.redirectUris?.[environment] ?? WILDCARD)],
      webOrigins: [...(client.webOrigins?.[environment] ?? WILDCARD)],
    })),
  )
}

export class ClientProvisioner {
  private readonly stages: StageExecutor
  private readonly logger: Logger

  constructor(options: { stages: StageExecutor; logger: Logger }) {
    this.stages = options.stages
    this.logger = options.logger
  }

  /**
   * Runs `keycloak/create-client.yml` once per (client, environment) pair, in
   * declaration order. The first failure stops the fan-out; clients created
   * before it are left in place.
   */
  async provision(
    clients: readonly ClientDefinition[],
    realms: readonly string[],
    access: ClientProvisioningAccess,
  ): Promise<ProvisionedClient[]> {
    const plan = planClientProvisioning(clients, realms)
    const provisioned: ProvisionedClient[] = []

    for (const step of plan) {
      this.logger.info(`Creating Keycloak client ${step.clientId} in ${step.environment}`)
      await this.stages.run({
        playbook: "keycloak/create-client.yml",
        variables: {
          target_env: step.environment,
          client_id: step.clientId,
          client_name: step.name,
          client_description: step.description,
          public_client: step.publicClient,
          redirect_uris: step.redirectUris,
          web_origins: step.webOrigins,
          keycloak_admin_user: access.keycloakAdminUser,
          keycloak_admin_password: access.keycloakAdminPassword,
          vault_token: access.vaultToken,
          keycloak_url: access.keycloakUrl,
          vault_addr: access.vaultAddr,
        },
      })
      provisioned.push({ clientId: step.clientId, environment: step.environment })
    }

    return provisioned
  }
}
