import test from "node:test"
import assert from "node:assert/strict"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { isBootstrapError } from "../src/errors.js"
import { loadPlatformConfig, parsePlatformConfig } from "../src/platform-config.js"

const completeDocument = `
vault:
  replicas: 3
keycloak:
  admin_password: test-secret
  postgresql_password: test-secret
  realms: [develop, stage, production]
  clients:
    - client_id: statistics-frontend
      name: Statistics Frontend
      public_client: true
      redirect_uris:
        develop: ["http://app-dev.local/*"]
    - client_id: statistics-api
jenkins:
  admin_password: test-secret
  git:
    repository: https://git.example.test/platform.git
  dockerhub_registry: example
mongodb:
  develop:
    username: app
    password: test-secret
`

test("parses a complete document into camel-cased, defaulted values", () => {
  const config = parsePlatformConfig(completeDocument)

  assert.equal(config.vault.replicas, 3)
  assert.equal(config.keycloak.adminUser, "admin")
  assert.deepEqual(config.keycloak.realms, ["develop", "stage", "production"])
  assert.deepEqual(config.keycloak.clients[0], {
    clientId: "statistics-frontend",
    name: "Statistics Frontend",
    publicClient: true,
    redirectUris: { develop: ["http://app-dev.local/*"] },
  })
  assert.deepEqual(config.keycloak.clients[1], {
    clientId: "statistics-api",
    name: "statistics-api",
    publicClient: false,
  })
  assert.deepEqual(config.jenkins.git, { repository: "https://git.example.test/platform.git", branch: "main" })
  assert.equal(config.jenkins.dockerhubRegistry, "example")
  assert.deepEqual(config.jenkins.apps, ["statistics-api", "device-registration-api", "frontend"])
  assert.deepEqual(config.mongodb.develop, { username: "app", password: "test-secret" })
})

test("the loaded document is frozen all the way down", () => {
  const config = parsePlatformConfig(completeDocument)

  assert.equal(Object.isFrozen(config), true)
  assert.equal(Object.isFrozen(config.keycloak.realms), true)
  assert.equal(Object.isFrozen(config.keycloak.clients[0]), true)
})

test("missing vault.replicas is CONFIG_MISSING naming the dotted key", () => {
  const document = completeDocument.replace("  replicas: 3\n", "  {}\n")

  assert.throws(() => parsePlatformConfig(document), (error: unknown) => {
    assert.ok(isBootstrapError(error, "CONFIG_MISSING"))
    assert.equal(error.details.key, "vault.replicas")
    assert.equal(error.message, "Required configuration key 'vault.replicas' is missing.")
    return true
  })
})

test("a missing section is reported by its own name", () => {
  const document = completeDocument.replace("vault:\n  replicas: 3\n", "")

  assert.throws(
    () => parsePlatformConfig(document),
    (error: unknown) => isBootstrapError(error, "CONFIG_MISSING") && error.details.key === "vault",
  )
})

test("zero realms is rejected instead of resolving clients to nothing", () => {
  const document = completeDocument.replace("realms: [develop, stage, production]", "realms: []")

  assert.throws(() => parsePlatformConfig(document), (error: unknown) => {
    assert.ok(isBootstrapError(error, "CONFIG_MISSING"))
    assert.equal(error.details.key, "keycloak.realms")
    assert.match(error.message, /^Configuration key 'keycloak\.realms' is invalid: /)
    return true
  })
})

test("database credentials must be keyed by a declared realm", () => {
  const document = `${completeDocument}  qa:\n    username: qa\n    password: test-secret\n`

  assert.throws(() => parsePlatformConfig(document), (error: unknown) => {
    assert.ok(isBootstrapError(error, "CONFIG_MISSING"))
    assert.equal(error.details.key, "mongodb.qa")
    assert.equal(
      error.message,
      "Configuration key 'mongodb.qa' is invalid: environment 'qa' is not one of the declared realms: develop, stage, production",
    )
    return true
  })
})

test("a wrongly typed value is reported as invalid", () => {
  const document = completeDocument.replace("replicas: 3", "replicas: three")

  assert.throws(() => parsePlatformConfig(document), (error: unknown) => {
    assert.ok(isBootstrapError(error, "CONFIG_MISSING"))
    assert.equal(error.details.key, "vault.replicas")
    assert.match(error.message, /is invalid/)
    return true
  })
})

test("an empty document reports the first required section", () => {
  assert.throws(
    () => parsePlatformConfig(""),
    (error: unknown) => isBootstrapError(error, "CONFIG_MISSING") && error.details.key === "vault",
  )
})

test("loadPlatformConfig reports an absent file as CONFIG_MISSING", async () => {
  const directory = await mkdtemp(join(tmpdir(), "platform-config-test-"))
  try {
    const missing = join(directory, "secrets.local.yaml")
    await assert.rejects(loadPlatformConfig(missing), (error: unknown) => {
      assert.ok(isBootstrapError(error, "CONFIG_MISSING"))
      assert.equal(error.message, `Configuration file not found: ${missing}`)
      return true
    })

    await writeFile(missing, completeDocument, "utf8")
    const config = await loadPlatformConfig(missing)
    assert.equal(config.vault.replicas, 3)
  } finally {
    await rm(directory, { recursive: true, force: true })
  }
})
