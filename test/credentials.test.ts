import test from "node:test"
import assert from "node:assert/strict"
import { loadCredentialsBundle, parseKubernetesAuth, parseVaultCredentials } from "../src/credentials.js"
import { isBootstrapError } from "../src/errors.js"

const files = {
  credentialsFile: "/repo/.vault-credentials.yml",
  kubernetesAuthFile: "/repo/.vault-k8s-auth.yml",
}

const vaultCredentials = `
schema_version: 1
vault:
  root_token: test-root-token
  unseal_keys: [key-one, key-two]
`

const kubernetesAuth = `
kubernetes:
  host: https://kubernetes.default.svc
  ca_cert: |
    -----BEGIN CERTIFICATE-----
    placeholder
    -----END CERTIFICATE-----
  token_reviewer_jwt: test-reviewer-jwt
`

function reader(contents: Record<string, string>) {
  const reads: string[] = []
  return {
    reads,
    read: async (path: string) => {
      reads.push(path)
      return contents[path] ?? null
    },
  }
}

test("loads both handoff files into one bundle", async () => {
  const { read } = reader({
    [files.credentialsFile]: vaultCredentials,
    [files.kubernetesAuthFile]: kubernetesAuth,
  })

  const bundle = await loadCredentialsBundle(files, read)

  assert.deepEqual(bundle, {
    vault: { rootToken: "test-root-token", unsealKeys: ["key-one", "key-two"] },
    kubernetes: {
      host: "https://kubernetes.default.svc",
      caCert: "-----BEGIN CERTIFICATE-----\nplaceholder\n-----END CERTIFICATE-----",
      tokenReviewerJwt: "test-reviewer-jwt",
    },
  })
})

test("an absent credentials file is CREDENTIALS_FILE_MISSING and stops before the auth file", async () => {
  const { read, reads } = reader({ [files.kubernetesAuthFile]: kubernetesAuth })

  await assert.rejects(loadCredentialsBundle(files, read), (error: unknown) => {
    assert.ok(isBootstrapError(error, "CREDENTIALS_FILE_MISSING"))
    assert.equal(error.details.path, files.credentialsFile)
    return true
  })
  assert.deepEqual(reads, [files.credentialsFile])
})

test("an absent auth file is CREDENTIALS_FILE_MISSING for that path", async () => {
  const { read } = reader({ [files.credentialsFile]: vaultCredentials })

  await assert.rejects(
    loadCredentialsBundle(files, read),
    (error: unknown) => isBootstrapError(error, "CREDENTIALS_FILE_MISSING") && error.details.path === files.kubernetesAuthFile,
  )
})

test("a missing required field is CREDENTIALS_INVALID naming the field", () => {
  assert.throws(
    () => parseVaultCredentials("vault:\n  unseal_keys: []\n", files.credentialsFile),
    (error: unknown) => {
      assert.ok(isBootstrapError(error, "CREDENTIALS_INVALID"))
      assert.equal(error.details.key, "vault.root_token")
      return true
    },
  )
  assert.throws(
    () => parseKubernetesAuth("kubernetes:\n  host: https://kubernetes.default.svc\n  ca_cert: x\n", files.kubernetesAuthFile),
    (error: unknown) => isBootstrapError(error, "CREDENTIALS_INVALID") && error.details.key === "kubernetes.token_reviewer_jwt",
  )
})

test("an unknown schema version is rejected", () => {
  assert.throws(
    () => parseVaultCredentials("schema_version: 2\nvault:\n  root_token: test-root-token\n", files.credentialsFile),
    (error: unknown) => isBootstrapError(error, "CREDENTIALS_INVALID") && error.details.key === "schema_version",
  )
})

test("unseal keys default to an empty list", () => {
  assert.deepEqual(parseVaultCredentials("vault:\n  root_token: test-root-token\n", files.credentialsFile), {
    rootToken: "test-root-token",
    unsealKeys: [],
  })
})
