/**
 * App Builder — requirements → specification → generated sources → verified
 * agent → saved bundle → (optionally) running UI.
 *
 * The execution core never persists anything; saving happens here, after the
 * agent has been run and, when needed, repaired.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import type { AppLibrary } from '../library/app-library.js';
import type { SaveAppResult } from '../library/types.js';
import type { CodeGenerator } from '../generation/code-generator.js';
import type { SpecGenerator } from '../generation/spec-generator.js';
import type { AppSpecification } from '../generation/types.js';
import type { ExecutionOrchestrator } from '../orchestrator/orchestrator.js';
import type { ExecutionResult, ServiceStartResult } from '../orchestrator/types.js';

const logger = new Logger('forge:builder');

export const AGENT_FILE = 'agent.py';
export const UI_FILE = 'app.py';
export const WORKFLOW_FILE = 'workflow.py';
export const UI_LAUNCHER = 'streamlit';

const DEFAULT_APP_NAME = 'generated-app';

export interface BuildAppRequest {
  prompt: string;
  name?: string;
  description?: string;
  withWorkflow?: boolean;
  startUi?: boolean;
  timeoutMs?: number;
}

export interface BuildAppResult {
  spec: AppSpecification;
  files: Record<string, string>;
  execution: ExecutionResult;
  saved: SaveAppResult;
  ui: ServiceStartResult | null;
}

export interface AppBuilderDeps {
  specs: SpecGenerator;
  code: CodeGenerator;
  orchestrator: Pick<ExecutionOrchestrator, 'execute' | 'startService'>;
  library: AppLibrary;
}

export class AppBuilder {
  constructor(private readonly deps: AppBuilderDeps) {}

  async build(request: BuildAppRequest): Promise<BuildAppResult> {
    const spec = await this.deps.specs.analyze(request.prompt);
    if (spec.error) {
      logger.warn(`Building from a fallback specification: ${spec.error}`);
    }

    const agentCode = await this.deps.code.generateAgent(spec);
    const workflowCode = request.withWorkflow ? await this.deps.code.generateWorkflow(spec) : null;
    const uiCode = await this.deps.code.generateUi(spec, agentCode);

    const execution = await this.deps.orchestrator.execute({
      source: agentCode,
      language: 'python',
      mode: 'ephemeral',
      timeout_ms: request.timeoutMs,
    });
    logger.info(`Agent test run ${execution.success ? 'passed' : 'failed'}`, {
      execution_id: execution.execution_id,
      repaired: execution.repaired,
    });

    const files: Record<string, string> = {
      [AGENT_FILE]: execution.fixed_code ?? agentCode,
      [UI_FILE]: uiCode,
    };
    if (workflowCode !== null) {
      files[WORKFLOW_FILE] = workflowCode;
    }

    const saved = await this.deps.library.save({
      name: request.name ?? spec.name ?? DEFAULT_APP_NAME,
      description: request.description ?? describe(spec, request.prompt),
      files,
      dependencies: execution.dependencies,
    });

    const ui = request.startUi
      ? await this.deps.orchestrator.startService({
          source: uiCode,
          language: 'python',
          mode: 'long_running',
          launcher: UI_LAUNCHER,
        })
      : null;

    return { spec, files, execution, saved, ui };
  }
}

function describe(spec: AppSpecification, prompt: string): string {
  const purposes = spec.agents.map((agent) => agent.purpose).filter(Boolean);
  return purposes.length > 0 ? purposes.join('; ') : prompt.slice(0, 200);
}
