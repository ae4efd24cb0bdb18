import { isBootstrapError, readinessTimeout } from "./errors.js"
import type { Logger } from "./logger.js"
import type { StageExecutor } from "./stage-executor.js"

export type PodPhase = "running" | "ready"

export interface ReadinessTarget {
  namespace: string
  labelSelector: string
}

const PHASE_PLAYBOOKS: Record<PodPhase, string> = {
  running: "verify-pods-running.yml",
  ready: "verify-pods.yml",
}

/**
 * Pod readiness is polled by a playbook; this gate only picks the playbook for
 * the phase and turns its failure into `READINESS_TIMEOUT`.
 */
export class ReadinessGate {
  private readonly stages: StageExecutor
  private readonly logger: Logger
  private readonly timeoutSeconds: number

  constructor(options: { stages: StageExecutor; logger: Logger; timeoutSeconds: number }) {
    this.stages = options.stages
    this.logger = options.logger
    this.timeoutSeconds = options.timeoutSeconds
  }

  async waitFor(target: ReadinessTarget, phase: PodPhase = "ready"): Promise<void> {
    this.logger.info(`Waiting for pods in ${target.namespace} (${target.labelSelector}) to be ${phase}...`)
    try {
      await this.stages.run({
        playbook: PHASE_PLAYBOOKS[phase],
        variables: {
          namespace: target.namespace,
          label_selector: target.labelSelector,
          target_phase: phase,
          timeout_seconds: this.timeoutSeconds,
        },
      })
    } catch (error) {
      if (isBootstrapError(error, "STAGE_FAILED")) {
        throw readinessTimeout(target.namespace, target.labelSelector, phase, error)
      }
      throw error
    }
  }
}
