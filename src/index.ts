export * from "./errors.js"
export { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logger.js"
export { CommandRunner, maskValues, type CommandOutput, type OutputMode, type RunCommandOptions } from "./command-runner.js"
export { commandExists, defaultCommandRuntime, type CommandResult, type CommandRuntime } from "./command-runtime.js"
export { TunnelHandle, TunnelManager, buildPortForwardArgs, type TunnelDefinition, type TunnelRuntime } from "./tunnel-manager.js"
export { loadPlatformConfig, parsePlatformConfig, type ClientDefinition, type PlatformConfig } from "./platform-config.js"
export { loadSettings, type OrchestratorSettings } from "./settings.js"
export { StageExecutor, partitionVariables, type StageSpec, type StageVariable } from "./stage-executor.js"
export {
  ClusterProvisioner,
  fixedConfirmation,
  promptConfirmation,
  type ClusterOutcome,
  type ClusterSpec,
  type ConfirmationPolicy,
} from "./cluster-provisioner.js"
export { PackageDeployer, type HelmRepository, type PackageInstall, type ValueOverride } from "./package-deployer.js"
export { loadCredentialsBundle, type CredentialsBundle } from "./credentials.js"
export { ReadinessGate, type PodPhase, type ReadinessTarget } from "./readiness.js"
export { PLATFORM_SERVICES, TUNNELS } from "./platform-services.js"
export {
  ClientProvisioner,
  effectiveClientId,
  planClientProvisioning,
  resolveClientEnvironments,
  type ProvisionedClient,
} from "./client-provisioner.js"
export {
  createBootstrapServices,
  runBootstrap,
  type BootstrapContext,
  type BootstrapReport,
  type BootstrapServices,
} from "./orchestrator.js"
