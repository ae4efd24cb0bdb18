import { readFile } from "node:fs/promises"
import { parse } from "yaml"
import { z } from "zod"
import { credentialsFileMissing, credentialsInvalid } from "./errors.js"

export const HANDOFF_SCHEMA_VERSION = 1

const requiredString = z.string().trim().min(1)
const schemaVersion = z.literal(HANDOFF_SCHEMA_VERSION).optional()

const vaultCredentialsSchema = z.object({
  schema_version: schemaVersion,
  vault: z.object({
    root_token: requiredString,
    unseal_keys: z.array(requiredString).default([]),
  }),
})

const kubernetesAuthSchema = z.object({
  schema_version: schemaVersion,
  kubernetes: z.object({
    host: requiredString,
    ca_cert: requiredString,
    token_reviewer_jwt: requiredString,
  }),
})

export interface VaultCredentials {
  rootToken: string
  unsealKeys: string[]
}

export interface KubernetesAuthParameters {
  host: string
  caCert: string
  tokenReviewerJwt: string
}

export interface CredentialsBundle {
  vault: VaultCredentials
  kubernetes: KubernetesAuthParameters
}

export interface HandoffFiles {
  credentialsFile: string
  kubernetesAuthFile: string
}

export type TextFileReader = (path: string) => Promise<string | null>

async function readIfPresent(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null
    }
    throw error
  }
}

function parseHandoff<S extends z.ZodTypeAny>(schema: S, source: string, path: string): z.output<S> {
  let document: unknown
  try {
    document = parse(source)
  } catch {
    throw credentialsInvalid(path, "(document)")
  }

  const parsed = schema.safeParse(document ?? {})
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    throw credentialsInvalid(path, issue && issue.path.length > 0 ? issue.path.join(".") : "(document)")
  }
  return parsed.data
}

export function parseVaultCredentials(source: string, path: string): VaultCredentials {
  const document = parseHandoff(vaultCredentialsSchema, source, path)
  return {
    rootToken: document.vault.root_token,
    unsealKeys: document.vault.unseal_keys,
  }
}

export function parseKubernetesAuth(source: string, path: string): KubernetesAuthParameters {
  const document = parseHandoff(kubernetesAuthSchema, source, path)
  return {
    host: document.kubernetes.host,
    caCert: document.kubernetes.ca_cert,
    tokenReviewerJwt: document.kubernetes.token_reviewer_jwt,
  }
}

/**
 * Reads the two files left behind by the Vault init and Kubernetes-auth
 * playbooks. Both must exist and carry every field; nothing is defaulted.
 */
export async function loadCredentialsBundle(
  files: HandoffFiles,
  read: TextFileReader = readIfPresent,
): Promise<CredentialsBundle> {
  const credentialsSource = await read(files.credentialsFile)
  if (credentialsSource === null) {
    throw credentialsFileMissing(files.credentialsFile, "vault/init.yml")
  }
  const vault = parseVaultCredentials(credentialsSource, files.credentialsFile)

  const authSource = await read(files.kubernetesAuthFile)
  if (authSource === null) {
    throw credentialsFileMissing(files.kubernetesAuthFile, "vault/setup-k8s-auth.yml")
  }
  const kubernetes = parseKubernetesAuth(authSource, files.kubernetesAuthFile)

  return { vault, kubernetes }
}
