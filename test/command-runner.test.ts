import test from "node:test"
import assert from "node:assert/strict"
import { CommandRunner, maskValues } from "../src/command-runner.js"
import { isBootstrapError } from "../src/errors.js"
import { silentLogger } from "../src/logger.js"
import { createCommandRuntime } from "./fakes.js"

test("captured runs return output and pass the default timeout", async () => {
  const { runtime, calls } = createCommandRuntime({
    respond: () => ({ stdout: "cka   1/1   2/2\n" }),
  })
  const runner = new CommandRunner({ logger: silentLogger(), runtime, timeoutMs: 1234 })

  const output = await runner.run("k3d", ["cluster", "list", "--no-headers"])

  assert.equal(output.stdout, "cka   1/1   2/2\n")
  assert.equal(calls.length, 1)
  assert.equal(calls[0]?.mode, "captured")
  assert.equal(calls[0]?.timeoutMs, 1234)
  assert.deepEqual(calls[0]?.env, { PATH: "/usr/bin" })
})

test("streamed runs merge the env overlay onto the runtime env", async () => {
  const { runtime, calls } = createCommandRuntime()
  const runner = new CommandRunner({ logger: silentLogger(), runtime })

  await runner.run("ansible-playbook", ["site.yml"], {
    mode: "streamed",
    cwd: "/repo",
    env: { ANSIBLE_CONFIG: "/repo/ansible/ansible.cfg" },
  })

  assert.equal(calls[0]?.mode, "streamed")
  assert.equal(calls[0]?.cwd, "/repo")
  assert.deepEqual(calls[0]?.env, { PATH: "/usr/bin", ANSIBLE_CONFIG: "/repo/ansible/ansible.cfg" })
})

test("non-zero exit becomes COMMAND_FAILED with the stderr tail", async () => {
  const { runtime } = createCommandRuntime({
    respond: () => ({ ok: false, exitCode: 1, stderr: "Error: release failed\n" }),
  })
  const runner = new CommandRunner({ logger: silentLogger(), runtime })

  await assert.rejects(runner.run("helm", ["upgrade", "--install", "vault", "hashicorp/vault"]), (error: unknown) => {
    assert.ok(isBootstrapError(error, "COMMAND_FAILED"))
    assert.equal(error.message, "Command failed: helm upgrade --install vault hashicorp/vault")
    assert.equal(error.details.stderr, "Error: release failed")
    assert.equal(error.details.exitCode, 1)
    return true
  })
})

test("missing executable becomes TOOL_NOT_FOUND", async () => {
  const { runtime } = createCommandRuntime({
    respond: () => ({ ok: false, exitCode: null, errorCode: "ENOENT", error: "spawn terraform ENOENT" }),
  })
  const runner = new CommandRunner({ logger: silentLogger(), runtime })

  await assert.rejects(runner.run("terraform", ["init"]), (error: unknown) => {
    assert.ok(isBootstrapError(error, "TOOL_NOT_FOUND"))
    assert.equal(error.details.tool, "terraform")
    assert.equal(error.message, "terraform is not installed. Please install it first.")
    return true
  })
})

test("an already aborted signal stops the run before anything is spawned", async () => {
  const { runtime, calls } = createCommandRuntime()
  const controller = new AbortController()
  controller.abort()
  const runner = new CommandRunner({ logger: silentLogger(), runtime, signal: controller.signal })

  await assert.rejects(runner.run("k3d", ["cluster", "list"]), (error: unknown) => isBootstrapError(error, "INTERRUPTED"))
  assert.equal(calls.length, 0)
})

test("a run killed by the abort signal becomes INTERRUPTED", async () => {
  const { runtime } = createCommandRuntime({
    respond: () => ({ ok: false, exitCode: null, aborted: true, error: "The operation was aborted" }),
  })
  const runner = new CommandRunner({ logger: silentLogger(), runtime })

  await assert.rejects(runner.run("kubectl", ["get", "pods"]), (error: unknown) => {
    assert.ok(isBootstrapError(error, "INTERRUPTED"))
    assert.equal(error.details.command, "kubectl get pods")
    return true
  })
})

test("redacted values never appear in the reported command or stderr", async () => {
  const { runtime } = createCommandRuntime({
    respond: () => ({ ok: false, exitCode: 1, stderr: "bad password test-secret" }),
  })
  const runner = new CommandRunner({ logger: silentLogger(), runtime })

  await assert.rejects(
    runner.run("helm", ["--set", "auth.adminPassword=test-secret"], { redact: ["test-secret"] }),
    (error: unknown) => {
      assert.ok(isBootstrapError(error, "COMMAND_FAILED"))
      assert.equal(error.details.command, "helm --set auth.adminPassword=[redacted]")
      assert.equal(error.details.stderr, "bad password [redacted]")
      return true
    },
  )
})

test("maskValues ignores empty values", () => {
  assert.equal(maskValues("token=abc", ["", "abc"]), "token=[redacted]")
})
