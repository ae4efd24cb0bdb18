export type BootstrapErrorCode =
  | "TOOL_NOT_FOUND"
  | "CONFIG_MISSING"
  | "CREDENTIALS_FILE_MISSING"
  | "CREDENTIALS_INVALID"
  | "COMMAND_FAILED"
  | "STAGE_FAILED"
  | "READINESS_TIMEOUT"
  | "INTERRUPTED"

export interface BootstrapErrorDetails {
  command?: string
  tool?: string
  key?: string
  path?: string
  playbook?: string
  stderr?: string
  exitCode?: number | null
  namespace?: string
  labelSelector?: string
  suggestedCommands?: string[]
}

export interface BootstrapErrorOptions {
  code: BootstrapErrorCode
  message: string
  expected?: boolean
  details?: BootstrapErrorDetails
  cause?: unknown
}

export class BootstrapError extends Error {
  code: BootstrapErrorCode
  expected: boolean
  details: BootstrapErrorDetails

  constructor(options: BootstrapErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "BootstrapError"
    this.code = options.code
    this.expected = options.expected ?? true
    this.details = options.details ?? {}
  }
}

export function isBootstrapError(error: unknown, code?: BootstrapErrorCode): error is BootstrapError {
  if (!(error instanceof BootstrapError)) {
    return false
  }
  return code === undefined || error.code === code
}

export function toolNotFound(tool: string): BootstrapError {
  return new BootstrapError({
    code: "TOOL_NOT_FOUND",
    message: `${tool} is not installed. Please install it first.`,
    details: {
      tool,
      suggestedCommands: [`Install '${tool}' and make sure it is on PATH.`],
    },
  })
}

export function configMissing(key: string, message?: string): BootstrapError {
  return new BootstrapError({
    code: "CONFIG_MISSING",
    message: message ?? `Required configuration key '${key}' is missing.`,
    details: { key },
  })
}

export function credentialsFileMissing(path: string, producedBy: string): BootstrapError {
  return new BootstrapError({
    code: "CREDENTIALS_FILE_MISSING",
    message: `Credentials file not found: ${path} (expected to be written by ${producedBy}).`,
    details: { path },
  })
}

export function credentialsInvalid(path: string, key: string): BootstrapError {
  return new BootstrapError({
    code: "CREDENTIALS_INVALID",
    message: `Credentials file ${path} is missing required field '${key}'.`,
    details: { path, key },
  })
}

export function commandFailed(command: string, stderr: string, exitCode: number | null): BootstrapError {
  return new BootstrapError({
    code: "COMMAND_FAILED",
    message: `Command failed: ${command}`,
    details: { command, stderr, exitCode },
  })
}

export function stageFailed(playbook: string, stderr: string, exitCode: number | null): BootstrapError {
  return new BootstrapError({
    code: "STAGE_FAILED",
    message: `Playbook failed: ${playbook}`,
    details: { playbook, stderr, exitCode },
  })
}

export function readinessTimeout(namespace: string, labelSelector: string, phase: string, cause: unknown): BootstrapError {
  return new BootstrapError({
    code: "READINESS_TIMEOUT",
    message: `Pods in namespace '${namespace}' matching '${labelSelector}' did not become ${phase}.`,
    details: {
      namespace,
      labelSelector,
      stderr: isBootstrapError(cause) ? cause.details.stderr : undefined,
      suggestedCommands: [`kubectl get pods -n ${namespace} -l ${labelSelector}`],
    },
    cause,
  })
}

export function interrupted(command?: string): BootstrapError {
  return new BootstrapError({
    code: "INTERRUPTED",
    message: "Interrupted by user",
    details: command ? { command } : {},
  })
}
