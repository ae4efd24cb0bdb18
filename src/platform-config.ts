import { readFile } from "node:fs/promises"
import { parse } from "yaml"
import { z } from "zod"
import { configMissing } from "./errors.js"
import { deepFreeze } from "./util.js"

const nonEmptyString = z.string().trim().min(1)
const stringList = z.array(nonEmptyString)
const perEnvironmentList = z.record(z.string(), stringList)

const clientSchema = z.object({
  client_id: nonEmptyString,
  name: nonEmptyString.optional(),
  description: z.string().optional(),
  public_client: z.boolean().default(false),
  redirect_uris: perEnvironmentList.optional(),
  web_origins: perEnvironmentList.optional(),
  environments: stringList.optional(),
})

const platformConfigSchema = z.object({
  vault: z.object({
    replicas: z.number().int().positive(),
  }),
  keycloak: z.object({
    admin_user: nonEmptyString.default("admin"),
    admin_password: nonEmptyString,
    postgresql_password: nonEmptyString,
    realms: stringList.min(1),
    clients: z.array(clientSchema).default([]),
  }),
  jenkins: z.object({
    admin_password: nonEmptyString,
    git: z
      .object({
        repository: nonEmptyString,
        branch: nonEmptyString.default("main"),
        credentials_id: nonEmptyString.optional(),
      })
      .optional(),
    dockerhub_registry: nonEmptyString.optional(),
    default_environment: nonEmptyString.optional(),
    apps: stringList.min(1).default(["statistics-api", "device-registration-api", "frontend"]),
  }),
  mongodb: z
    .record(
      z.string(),
      z.object({
        username: nonEmptyString,
        password: nonEmptyString,
      }),
    )
    .default({}),
}).superRefine((config, ctx) => {
  // keys of `mongodb` are target environments, so each must be a realm
  for (const environment of Object.keys(config.mongodb)) {
    if (!config.keycloak.realms.includes(environment)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mongodb", environment],
        message: `environment '${environment}' is not one of the declared realms: ${config.keycloak.realms.join(", ")}`,
      })
    }
  }
})

export interface ClientDefinition {
  readonly clientId: string
  readonly name: string
  readonly description?: string
  readonly publicClient: boolean
  readonly redirectUris?: Readonly<Record<string, readonly string[]>>
  readonly webOrigins?: Readonly<Record<string, readonly string[]>>
  readonly environments?: readonly string[]
}

export interface JenkinsGitSource {
  readonly repository: string
  readonly branch: string
  readonly credentialsId?: string
}

export interface DatabaseCredentials {
  readonly username: string
  readonly password: string
}

export interface PlatformConfig {
  readonly vault: {
    readonly replicas: number
  }
  readonly keycloak: {
    readonly adminUser: string
    readonly adminPassword: string
    readonly postgresqlPassword: string
    readonly realms: readonly string[]
    readonly clients: readonly ClientDefinition[]
  }
  readonly jenkins: {
    readonly adminPassword: string
    readonly git?: JenkinsGitSource
    readonly dockerhubRegistry?: string
    readonly defaultEnvironment?: string
    readonly apps: readonly string[]
  }
  readonly mongodb: Readonly<Record<string, DatabaseCredentials>>
}

type RawPlatformConfig = z.infer<typeof platformConfigSchema>
type RawClient = z.infer<typeof clientSchema>

function toClientDefinition(raw: RawClient): ClientDefinition {
  return {
    clientId: raw.client_id,
    name: raw.name ?? raw.client_id,
    ...(raw.description !== undefined ? { description: raw.description } : {}),
    publicClient: raw.public_client,
    ...(raw.redirect_uris ? { redirectUris: raw.redirect_uris } : {}),
    ...(raw.web_origins ? { webOrigins: raw.web_origins } : {}),
    ...(raw.environments ? { environments: raw.environments } : {}),
  }
}

function toPlatformConfig(raw: RawPlatformConfig): PlatformConfig {
  const git = raw.jenkins.git
  return {
    vault: { replicas: raw.vault.replicas },
    keycloak: {
      adminUser: raw.keycloak.admin_user,
      adminPassword: raw.keycloak.admin_password,
      postgresqlPassword: raw.keycloak.postgresql_password,
      realms: raw.keycloak.realms,
      clients: raw.keycloak.clients.map(toClientDefinition),
    },
    jenkins: {
      adminPassword: raw.jenkins.admin_password,
      ...(git
        ? {
            git: {
              repository: git.repository,
              branch: git.branch,
              ...(git.credentials_id ? { credentialsId: git.credentials_id } : {}),
            },
          }
        : {}),
      ...(raw.jenkins.dockerhub_registry ? { dockerhubRegistry: raw.jenkins.dockerhub_registry } : {}),
      ...(raw.jenkins.default_environment ? { defaultEnvironment: raw.jenkins.default_environment } : {}),
      apps: raw.jenkins.apps,
    },
    mongodb: raw.mongodb,
  }
}

function issueKey(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? issue.path.map(String).join(".") : "(document)"
}

function isMissingValue(issue: z.ZodIssue): boolean {
  return issue.code === "invalid_type" && (issue.received === "undefined" || issue.received === "null")
}

/**
 * Parses and validates the declarative platform document. Every failure, from
 * unparseable YAML to an empty realm list, is reported as `CONFIG_MISSING`
 * naming the first offending key.
 */
export function parsePlatformConfig(source: string, path = "secrets.local.yaml"): PlatformConfig {
  let document: unknown
  try {
    document = parse(source)
  } catch (error) {
    throw configMissing(path, `Configuration file ${path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`)
  }

  const parsed = platformConfigSchema.safeParse(document ?? {})
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    const key = issue ? issueKey(issue) : "(document)"
    if (!issue || isMissingValue(issue)) {
      throw configMissing(key)
    }
    throw configMissing(key, `Configuration key '${key}' is invalid: ${issue.message}`)
  }

  return deepFreeze(toPlatformConfig(parsed.data))
}

export async function loadPlatformConfig(path: string): Promise<PlatformConfig> {
  let source: string
  try {
    source = await readFile(path, "utf8")
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined
    if (code === "ENOENT") {
      throw configMissing(path, `Configuration file not found: ${path}`)
    }
    throw error
  }
  return parsePlatformConfig(source, path)
}
