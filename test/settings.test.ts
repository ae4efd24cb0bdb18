import test from "node:test"
import assert from "node:assert/strict"
import { loadSettings } from "../src/settings.js"

test("defaults resolve against the project root", () => {
  const settings = loadSettings({}, "/repo")

  assert.deepEqual(settings, {
    projectRoot: "/repo",
    configFile: "/repo/secrets.local.yaml",
    ansibleDir: "/repo/ansible",
    ansibleConfig: "/repo/ansible/ansible.cfg",
    helmDir: "/repo/helm",
    terraformDir: "/repo/terraform/vault",
    logFile: "/repo/bootstrap.log",
    credentialsFile: "/repo/.vault-credentials.yml",
    kubernetesAuthFile: "/repo/.vault-k8s-auth.yml",
    readinessTimeoutSeconds: 300,
    commandTimeoutMs: 900_000,
    tunnelSettleScale: 1,
    debug: false,
  })
})

test("environment overrides are trimmed and invalid numbers fall back", () => {
  const settings = loadSettings(
    {
      BOOTSTRAP_CONFIG_FILE: " config/platform.yaml ",
      BOOTSTRAP_ANSIBLE_DIR: "/opt/playbooks",
      BOOTSTRAP_READINESS_TIMEOUT_SECONDS: "600",
      BOOTSTRAP_COMMAND_TIMEOUT_MS: "-1",
      BOOTSTRAP_TUNNEL_SETTLE_SCALE: "0.5",
      BOOTSTRAP_DEBUG: "yes",
    },
    "/repo",
  )

  assert.equal(settings.configFile, "/repo/config/platform.yaml")
  assert.equal(settings.ansibleDir, "/opt/playbooks")
  assert.equal(settings.ansibleConfig, "/opt/playbooks/ansible.cfg")
  assert.equal(settings.readinessTimeoutSeconds, 600)
  assert.equal(settings.commandTimeoutMs, 900_000)
  assert.equal(settings.tunnelSettleScale, 0.5)
  assert.equal(settings.debug, true)
})
