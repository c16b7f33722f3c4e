/**
 * Execution Orchestrator — the public entry point of the execution core.
 *
 * inferring → provisioning → running → succeeded
 *                                    ↘ repairing → re_running → succeeded | failed
 *
 * At most one repair per request. The re-run uses the same environment and the
 * originally installed dependencies. The environment is destroyed on every
 * terminal transition except a successful long-running start, where it passes
 * to the Service Manager. Nothing thrown below escapes `execute`/`startService`:
 * every failure becomes a result with `success: false`.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import { BaseError, toErrorMessage } from '@appforge/shared/Types/errors.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { normalizeDependencies } from '../environment/manifest.js';
import { keepEnvironment, type EnvironmentProvisioner } from '../environment/provisioner.js';
import { logExecution } from '../logging/writer.js';
import { PopulationError, ProvisioningError, RepairGenerationError, RuntimeFailure } from '../errors.js';
import { classifyFailure } from '../runtime/profiles.js';
import type { ForgeConfig } from '../config.js';
import type { DependencyInferencer } from '../dependencies/inferencer.js';
import type { FailureRepairer } from '../repair/repairer.js';
import type { ProcessRunner } from '../executor/runner.js';
import type { FailureKind, RunOutcome, ServiceStartFailed, StartOutcome } from '../executor/types.js';
import type { RuntimeProfile, RuntimeProfiles } from '../runtime/profiles.js';
import type { ServiceManager } from '../services/manager.js';
import type { ServiceSlot } from '../services/types.js';
import type {
  AttemptSummary,
  ExecutionRequest,
  ExecutionResult,
  FailurePhase,
  OrchestratorState,
  ServiceStartResult,
} from './types.js';

const logger = new Logger('forge:orchestrator');

type OrchestratorConfig = Pick<ForgeConfig, 'defaultTimeoutMs' | 'maxTimeoutMs' | 'logDir' | 'repairServices'>;

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  profiles: RuntimeProfiles;
  provisioner: EnvironmentProvisioner;
  runner: ProcessRunner;
  inferencer: DependencyInferencer;
  repairer: FailureRepairer;
  services: ServiceManager;
}

/**
 * Mutable bookkeeping for one request. Never returned; results are built from it.
 */
class RequestTrace {
  readonly id = generateExecutionId();
  readonly startedAt = Date.now();
  state: OrchestratorState = 'inferring';
  envId: string | null = null;
  dependencies: string[] = [];
  attempts: AttemptSummary[] = [];

  constructor(readonly request: ExecutionRequest) {
    logger.debug(`[${this.id}] → inferring`, { language: request.language, mode: request.mode });
  }

  transition(next: OrchestratorState): void {
    logger.debug(`[${this.id}] ${this.state} → ${next}`);
    this.state = next;
  }

  /** The phase a failure right now would be attributed to */
  get phase(): FailurePhase {
    switch (this.state) {
      case 'running':
      case 'repairing':
      case 're_running':
        return this.state;
      default:
        return 'provisioning';
    }
  }

  /** Classification of the most recent failed attempt */
  get failureKind(): FailureKind | null {
    return this.attempts.at(-1)?.failure_kind ?? null;
  }

  recordRun(outcome: RunOutcome, failure: RuntimeFailure | null): void {
    this.attempts.push({
      execution_id: outcome.execution_id,
      exit_code: outcome.exit_code,
      timed_out: outcome.timed_out,
      failure_kind: failure?.kind ?? null,
      duration_ms: outcome.duration_ms,
    });
  }

  recordStart(outcome: StartOutcome, profile: RuntimeProfile): void {
    this.attempts.push({
      execution_id: outcome.execution_id,
      exit_code: outcome.started ? null : outcome.exit_code,
      timed_out: false,
      failure_kind: outcome.started ? null : classifyFailure(profile, outcome.stderr, false),
      duration_ms: outcome.duration_ms,
    });
  }
}

export class ExecutionOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  // ── Dispatch ──────────────────────────────────────────────────────────────

  /**
   * Run a request to a terminal result. Long-running requests are started as
   * services; the handle is reported in `service`.
   */
  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    if (request.mode === 'long_running') {
      const started = await this.startService(request);
      return {
        success: started.success,
        execution_id: started.execution_id,
        output: null,
        error: started.error,
        error_code: started.error_code,
        failure_kind: started.failure_kind,
        fixed_code: started.fixed_code,
        dependencies: started.dependencies,
        repaired: started.fixed_code !== null,
        failed_phase: started.failed_phase,
        attempts: started.attempts,
        service: started.service,
      };
    }
    return this.runEphemeral(request);
  }

  // ── Ephemeral ─────────────────────────────────────────────────────────────

  private async runEphemeral(request: ExecutionRequest): Promise<ExecutionResult> {
    const trace = new RequestTrace(request);
    const profile = this.deps.profiles[request.language];
    const timeoutMs = this.clampTimeout(request.timeout_ms);
    let result: ExecutionResult;

    try {
      trace.dependencies = await this.deps.inferencer.infer(request.source, profile);
      trace.transition('provisioning');

      result = await this.deps.provisioner.withEnvironment<ExecutionResult>(request.language, async (env) => {
        trace.envId = env.env_id;

        const populated = await this.deps.provisioner.populate(env, trace.dependencies);
        if (!populated.ok) {
          return this.ephemeralFailure(trace, 'population', populated.error);
        }
        trace.dependencies = populated.dependencies;

        trace.transition('running');
        const first = await this.deps.runner.run(env, request.source, timeoutMs);
        const firstFailure = runtimeFailure(first, profile);
        trace.recordRun(first, firstFailure);
        if (!firstFailure) {
          return this.ephemeralSuccess(trace, first.stdout, null);
        }

        trace.transition('repairing');
        let fixedCode: string;
        try {
          fixedCode = await this.deps.repairer.repair({
            source: request.source,
            stderr: first.stderr,
            dependencies: trace.dependencies,
            profile,
          });
        } catch (err) {
          return this.ephemeralFailure(trace, 'repairing', repairFailure(firstFailure, err), {
            output: first.stdout,
          });
        }

        trace.transition('re_running');
        const second = await this.deps.runner.run(env, fixedCode, timeoutMs);
        const secondFailure = runtimeFailure(second, profile);
        trace.recordRun(second, secondFailure);
        if (!secondFailure) {
          return this.ephemeralSuccess(trace, second.stdout, fixedCode);
        }
        return this.ephemeralFailure(trace, 're_running', secondFailure, {
          output: second.stdout,
          fixedCode,
        });
      });
    } catch (err) {
      const phase = err instanceof ProvisioningError ? 'provisioning' : trace.phase;
      logger.error(`[${trace.id}] ${phase} failed`, err);
      result = this.ephemeralFailure(trace, phase, err);
    }

    this.audit(trace, result);
    return result;
  }

  // ── Long-running ──────────────────────────────────────────────────────────

  /**
   * Start a service. On success the environment and process belong to the
   * Service Manager until `stop_service`; on failure both are gone.
   */
  async startService(request: ExecutionRequest): Promise<ServiceStartResult> {
    const trace = new RequestTrace(request);
    let result: ServiceStartResult;

    try {
      // Claimed before the first await so concurrent starts cannot overshoot maxServices
      const slot = this.deps.services.reserve();
      try {
        result = await this.startInSlot(request, trace, slot);
      } finally {
        slot.release();
      }
    } catch (err) {
      const phase = err instanceof ProvisioningError ? 'provisioning' : trace.phase;
      logger.error(`[${trace.id}] ${phase} failed`, err);
      result = this.startFailure(trace, phase, err, null);
    }

    this.audit(trace, result);
    return result;
  }

  private async startInSlot(
    request: ExecutionRequest,
    trace: RequestTrace,
    slot: ServiceSlot,
  ): Promise<ServiceStartResult> {
    const profile = this.deps.profiles[request.language];
    const inferred = await this.deps.inferencer.infer(request.source, profile);
    trace.dependencies = request.launcher ? normalizeDependencies([...inferred, request.launcher]) : inferred;
    trace.transition('provisioning');

    return this.deps.provisioner.withEnvironment<ServiceStartResult>(request.language, async (env) => {
      trace.envId = env.env_id;

      const populated = await this.deps.provisioner.populate(env, trace.dependencies);
      if (!populated.ok) {
        return this.startFailure(trace, 'population', populated.error, null);
      }
      trace.dependencies = populated.dependencies;

      trace.transition('running');
      const options = { launcher: request.launcher };
      let outcome = await this.deps.runner.start(env, request.source, options);
      trace.recordStart(outcome, profile);
      let fixedCode: string | null = null;

      if (!outcome.started) {
        const failure = startupFailure(outcome, profile);
        if (!this.deps.config.repairServices) {
          return this.startFailure(trace, 'running', failure, null);
        }

        trace.transition('repairing');
        try {
          fixedCode = await this.repairStart(request, outcome, trace.dependencies, profile);
        } catch (err) {
          return this.startFailure(trace, 'repairing', repairFailure(failure, err), null);
        }

        trace.transition('re_running');
        outcome = await this.deps.runner.start(env, fixedCode, options);
        trace.recordStart(outcome, profile);
        if (!outcome.started) {
          return this.startFailure(trace, 're_running', startupFailure(outcome, profile), fixedCode);
        }
      }

      const service = this.deps.services.register(slot, outcome, env, request.launcher);
      trace.transition('succeeded');
      return keepEnvironment<ServiceStartResult>({
        success: true,
        execution_id: trace.id,
        error: null,
        error_code: null,
        failure_kind: null,
        service,
        fixed_code: fixedCode,
        dependencies: trace.dependencies,
        failed_phase: null,
        attempts: trace.attempts,
      });
    });
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private repairStart(
    request: ExecutionRequest,
    failed: ServiceStartFailed,
    dependencies: readonly string[],
    profile: RuntimeProfile,
  ): Promise<string> {
    return this.deps.repairer.repair({ source: request.source, stderr: failed.stderr, dependencies, profile });
  }

  private clampTimeout(requested: number | undefined): number {
    const timeout = requested ?? this.deps.config.defaultTimeoutMs;
    return Math.min(Math.max(1, timeout), this.deps.config.maxTimeoutMs);
  }

  private ephemeralSuccess(trace: RequestTrace, output: string, fixedCode: string | null): ExecutionResult {
    trace.transition('succeeded');
    return {
      success: true,
      execution_id: trace.id,
      output,
      error: null,
      error_code: null,
      failure_kind: null,
      fixed_code: fixedCode,
      dependencies: trace.dependencies,
      repaired: fixedCode !== null,
      failed_phase: null,
      attempts: trace.attempts,
      service: null,
    };
  }

  private ephemeralFailure(
    trace: RequestTrace,
    phase: FailurePhase,
    cause: unknown,
    extra: { output?: string; fixedCode?: string } = {},
  ): ExecutionResult {
    trace.transition('failed');
    return {
      success: false,
      execution_id: trace.id,
      output: extra.output ?? null,
      ...errorFields(cause),
      failure_kind: trace.failureKind,
      fixed_code: extra.fixedCode ?? null,
      dependencies: trace.dependencies,
      repaired: extra.fixedCode !== undefined,
      failed_phase: phase,
      attempts: trace.attempts,
      service: null,
    };
  }

  private startFailure(
    trace: RequestTrace,
    phase: FailurePhase,
    cause: unknown,
    fixedCode: string | null,
  ): ServiceStartResult {
    trace.transition('failed');
    return {
      success: false,
      execution_id: trace.id,
      ...errorFields(cause),
      failure_kind: trace.failureKind,
      service: null,
      fixed_code: fixedCode,
      dependencies: trace.dependencies,
      failed_phase: phase,
      attempts: trace.attempts,
    };
  }

  private audit(trace: RequestTrace, result: ExecutionResult | ServiceStartResult): void {
    logExecution(this.deps.config.logDir, {
      type: 'execution',
      execution_id: trace.id,
      language: trace.request.language,
      mode: trace.request.mode,
      env_id: trace.envId,
      dependencies: trace.dependencies,
      success: result.success,
      repaired: result.fixed_code !== null,
      failed_phase: result.failed_phase,
      attempts: trace.attempts,
      source_chars: trace.request.source.length,
      error: result.error ? result.error.slice(0, 500) : null,
      error_code: result.error_code,
      failure_kind: result.failure_kind,
      duration_ms: Date.now() - trace.startedAt,
      executed_at: new Date(trace.startedAt).toISOString(),
    }).catch((err) => logger.error(`Audit log failed: ${toErrorMessage(err)}`));
  }
}

// ── Failure helpers ──────────────────────────────────────────────────────────

/** null when the run exited 0 within its timeout */
function runtimeFailure(outcome: RunOutcome, profile: RuntimeProfile): RuntimeFailure | null {
  if (outcome.exit_code === 0 && !outcome.timed_out) return null;
  return new RuntimeFailure(
    outcome.stderr.trim() || `Process exited with code ${outcome.exit_code}`,
    outcome.exit_code,
    outcome.timed_out,
    classifyFailure(profile, outcome.stderr, outcome.timed_out),
  );
}

function startupFailure(outcome: ServiceStartFailed, profile: RuntimeProfile): RuntimeFailure {
  return new RuntimeFailure(
    outcome.stderr.trim() || `Process exited with code ${outcome.exit_code} during startup`,
    outcome.exit_code,
    false,
    classifyFailure(profile, outcome.stderr, false),
  );
}

function repairFailure(cause: RuntimeFailure, err: unknown): RepairGenerationError {
  return new RepairGenerationError(`${cause.message}\n\nRepair failed: ${toErrorMessage(err)}`, {
    kind: cause.kind,
  });
}

function errorFields(cause: unknown): { error: string; error_code: string } {
  if (cause instanceof PopulationError) {
    return {
      error: cause.output ? `${cause.message}\n${cause.output}` : cause.message,
      error_code: cause.code,
    };
  }
  if (cause instanceof BaseError) {
    return { error: cause.message, error_code: cause.code };
  }
  return { error: toErrorMessage(cause), error_code: 'INTERNAL_ERROR' };
}
