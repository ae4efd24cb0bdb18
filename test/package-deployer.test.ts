import test from "node:test"
import assert from "node:assert/strict"
import { CommandRunner } from "../src/command-runner.js"
import { silentLogger } from "../src/logger.js"
import { PackageDeployer, buildUpgradeInstallArgs, sensitiveOverrideValues, type PackageInstall } from "../src/package-deployer.js"
import { createCommandRuntime } from "./fakes.js"

const jenkins: PackageInstall = {
  release: "jenkins",
  chart: "jenkins/jenkins",
  namespace: "jenkins",
  valuesFile: "/repo/helm/jenkins/values.yaml",
  repository: { name: "jenkins", url: "https://charts.jenkins.io" },
  overrides: [["controller.admin.password", "test-secret"]],
  wait: true,
  timeout: "10m",
}

test("upgrade args keep override order and append wait and timeout", () => {
  assert.deepEqual(
    buildUpgradeInstallArgs({
      ...jenkins,
      overrides: [
        ["controller.containerEnv[0].name", "GIT_BRANCH"],
        ["controller.containerEnv[0].value", "main"],
      ],
    }),
    [
      "upgrade",
      "--install",
      "jenkins",
      "jenkins/jenkins",
      "--namespace",
      "jenkins",
      "--create-namespace",
      "-f",
      "/repo/helm/jenkins/values.yaml",
      "--set",
      "controller.containerEnv[0].name=GIT_BRANCH",
      "--set",
      "controller.containerEnv[0].value=main",
      "--wait",
      "--timeout",
      "10m",
    ],
  )
})

test("install registers the repository before upgrading the release", async () => {
  const { runtime, calls } = createCommandRuntime()
  const logger = silentLogger()
  const deployer = new PackageDeployer({ runner: new CommandRunner({ logger, runtime }), logger })

  await deployer.install({ ...jenkins, overrides: [], wait: false, timeout: undefined })

  assert.deepEqual(
    calls.map((call) => `${call.command} ${call.args.join(" ")}`),
    [
      "helm repo add jenkins https://charts.jenkins.io --force-update",
      "helm repo update jenkins",
      "helm upgrade --install jenkins jenkins/jenkins --namespace jenkins --create-namespace -f /repo/helm/jenkins/values.yaml",
    ],
  )
})

test("installing twice issues the same declarative commands", async () => {
  const { runtime, calls } = createCommandRuntime()
  const logger = silentLogger()
  const deployer = new PackageDeployer({ runner: new CommandRunner({ logger, runtime }), logger })

  await deployer.install(jenkins)
  await deployer.install(jenkins)

  const rendered = calls.map((call) => call.args.join(" "))
  assert.equal(rendered.length, 6)
  assert.deepEqual(rendered.slice(3), rendered.slice(0, 3))
  assert.ok(rendered.every((line) => !line.startsWith("install ")))
})

test("password-like overrides are picked out for redaction", () => {
  assert.deepEqual(
    sensitiveOverrideValues([
      ["auth.adminPassword", "test-secret"],
      ["image.repository", "bitnamilegacy/keycloak"],
      ["server.ha.replicas", 3],
    ]),
    ["test-secret"],
  )
})
