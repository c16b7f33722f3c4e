/**
 * Forge MCP Server
 *
 * Wires the execution core, the generation pipeline and the app library, and
 * registers their tools on an McpServer instance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTool } from '@appforge/shared/Utils/register-tool.js';
import { createSuccess } from '@appforge/shared/Types/StandardResponse.js';
import { createRuntimeProfiles, type RuntimeProfiles } from './runtime/profiles.js';
import { EnvironmentProvisioner } from './environment/provisioner.js';
import { ProcessRunner } from './executor/runner.js';
import { DependencyInferencer } from './dependencies/inferencer.js';
import { FailureRepairer } from './repair/repairer.js';
import { ServiceManager } from './services/manager.js';
import { ExecutionOrchestrator } from './orchestrator/orchestrator.js';
import { SpecGenerator } from './generation/spec-generator.js';
import { CodeGenerator } from './generation/code-generator.js';
import { AppLibrary } from './library/app-library.js';
import { AppBuilder } from './pipeline/app-builder.js';
import {
  executeCodeSchema,
  handleExecuteCode,
  inferDependenciesSchema,
  handleInferDependencies,
} from './tools/execution.js';
import {
  startServiceSchema,
  handleStartService,
  stopServiceSchema,
  handleStopService,
  listServicesSchema,
  handleListServices,
} from './tools/services.js';
import {
  generateSpecSchema,
  handleGenerateSpec,
  buildAppSchema,
  handleBuildApp,
  saveAppSchema,
  handleSaveApp,
  getAppSchema,
  handleGetApp,
  listAppsSchema,
  handleListApps,
  searchAppsSchema,
  handleSearchApps,
  deleteAppSchema,
  handleDeleteApp,
} from './tools/apps.js';
import type { ForgeConfig } from './config.js';
import type { TextGenerator } from './llm/types.js';

export interface ForgeComponents {
  profiles: RuntimeProfiles;
  provisioner: EnvironmentProvisioner;
  runner: ProcessRunner;
  inferencer: DependencyInferencer;
  repairer: FailureRepairer;
  services: ServiceManager;
  orchestrator: ExecutionOrchestrator;
  specs: SpecGenerator;
  code: CodeGenerator;
  library: AppLibrary;
  builder: AppBuilder;
}

export function createComponents(
  config: ForgeConfig,
  generator: TextGenerator,
  profiles: RuntimeProfiles = createRuntimeProfiles(config),
): ForgeComponents {
  const provisioner = new EnvironmentProvisioner(config, profiles);
  const runner = new ProcessRunner(config);
  const inferencer = new DependencyInferencer(generator);
  const repairer = new FailureRepairer(generator);
  const services = new ServiceManager(provisioner, config);
  const orchestrator = new ExecutionOrchestrator({
    config,
    profiles,
    provisioner,
    runner,
    inferencer,
    repairer,
    services,
  });
  const specs = new SpecGenerator(generator);
  const code = new CodeGenerator(generator);
  const library = new AppLibrary(config.libraryDir);
  const builder = new AppBuilder({ specs, code, orchestrator, library });

  return { profiles, provisioner, runner, inferencer, repairer, services, orchestrator, specs, code, library, builder };
}

export function createServer(
  config: ForgeConfig,
  generator: TextGenerator,
  profiles?: RuntimeProfiles,
): { server: McpServer; components: ForgeComponents } {
  const server = new McpServer({
    name: 'forge',
    version: '1.0.0',
  });

  const components = createComponents(config, generator, profiles);
  const { orchestrator, inferencer, services, specs, builder, library } = components;

  // ── Execution ───────────────────────────────────────────────────────────

  registerTool(server, {
    name: 'execute_code',
    description:
      'Run a program in a fresh, disposable environment. Third-party packages are inferred and installed first. ' +
      'A failed run is repaired once by regenerating the program from its error output, then re-run.\n\n' +
      'Args:\n' +
      '  - code (string): Complete program source\n' +
      '  - language ("python" | "node", optional): Program language (default: python)\n' +
      `  - timeout_ms (number, optional): Run timeout in ms (default: ${config.defaultTimeoutMs}, max: ${config.maxTimeoutMs})\n\n` +
      'Returns: { success, execution_id, output, error, error_code, failure_kind, fixed_code, dependencies, repaired, failed_phase, attempts, service }',
    inputSchema: executeCodeSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleExecuteCode(orchestrator)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'infer_dependencies',
    description:
      'List the third-party packages a program needs, without running it. Standard-library modules are excluded.\n\n' +
      'Args:\n' +
      '  - code (string): Program source\n' +
      '  - language ("python" | "node", optional): Program language (default: python)\n\n' +
      'Returns: { language, dependencies }',
    inputSchema: inferDependenciesSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleInferDependencies(inferencer, components.profiles)(params);
      return createSuccess(result);
    },
  });

  // ── Services ────────────────────────────────────────────────────────────

  registerTool(server, {
    name: 'start_service',
    description:
      'Start a long-running program (e.g. a Streamlit UI) in its own environment. ' +
      `It counts as started if it is still running after ${config.serviceGraceMs}ms.\n\n` +
      'Args:\n' +
      '  - code (string): Program source\n' +
      '  - language ("python" | "node", optional): Program language (default: python)\n' +
      '  - launcher (string, optional): Console entry point to run the program with, e.g. "streamlit"\n\n' +
      'Returns: { success, execution_id, error, error_code, failure_kind, service: { service_id, pid, env_id, started_at } | null, fixed_code, dependencies, failed_phase, attempts }',
    inputSchema: startServiceSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleStartService(orchestrator)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'stop_service',
    description:
      'Stop a running service and destroy its environment.\n\n' +
      'Args:\n' +
      '  - service_id (string): Service ID from start_service\n\n' +
      'Returns: { service_id, uptime_ms, reason }',
    inputSchema: stopServiceSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: false,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleStopService(services)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'list_services',
    description:
      'List running services with uptime and the tail of their output.\n\n' +
      'Returns: { services: [{ service_id, pid, env_id, started_at, language, launcher, uptime_ms, stdout_tail, stderr_tail }] }',
    inputSchema: listServicesSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async () => {
      const result = await handleListServices(services)();
      return createSuccess(result);
    },
  });

  // ── App Generation ──────────────────────────────────────────────────────

  registerTool(server, {
    name: 'generate_spec',
    description:
      'Turn a free-text app description into a structured specification (agents, workflow, UI, integrations).\n\n' +
      'Args:\n' +
      '  - prompt (string): App description\n\n' +
      'Returns: { name?, agents, workflow, ui, integrations, error? }',
    inputSchema: generateSpecSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleGenerateSpec(specs)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'build_app',
    description:
      'Generate an app from a description: specification, agent.py, app.py (Streamlit UI) and optionally workflow.py. ' +
      'The agent is test-run (and repaired once if it fails), the bundle is saved to the library, and the UI can be started.\n\n' +
      'Args:\n' +
      '  - prompt (string): App description\n' +
      '  - name (string, optional): App name\n' +
      '  - description (string, optional): Library description\n' +
      '  - with_workflow (boolean, optional): Also generate workflow.py\n' +
      '  - start_ui (boolean, optional): Start the UI as a service\n' +
      '  - timeout_ms (number, optional): Timeout for the agent test run\n\n' +
      'Returns: { spec, files, execution, saved, ui }',
    inputSchema: buildAppSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleBuildApp(builder)(params);
      return createSuccess(result);
    },
  });

  // ── App Library ─────────────────────────────────────────────────────────

  registerTool(server, {
    name: 'save_app',
    description:
      'Save an app bundle to the library. Saving under an existing name replaces the previous bundle.\n\n' +
      'Args:\n' +
      '  - name (string): App name (slugified)\n' +
      '  - description (string): What the app does\n' +
      '  - files (object): File name → content; plain file names only\n' +
      '  - tags (string[], optional)\n' +
      '  - dependencies (string[], optional)\n\n' +
      'Returns: { name, path, files, created }',
    inputSchema: saveAppSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleSaveApp(library)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'get_app',
    description:
      'Get a saved app with its metadata and file contents.\n\n' +
      'Args:\n' +
      '  - name (string): App name\n\n' +
      'Returns: { metadata, path, files }',
    inputSchema: getAppSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleGetApp(library)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'list_apps',
    description:
      'List saved apps, optionally filtered by tag.\n\n' +
      'Args:\n' +
      '  - tag (string, optional)\n\n' +
      'Returns: { apps: [{ name, display_name, description, files, tags, dependencies, created_at, updated_at }] }',
    inputSchema: listAppsSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleListApps(library)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'search_apps',
    description:
      'Search saved apps. Every term must appear in the name, description or tags.\n\n' +
      'Args:\n' +
      '  - query (string): Space-separated search terms\n\n' +
      'Returns: { apps }',
    inputSchema: searchAppsSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleSearchApps(library)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'delete_app',
    description:
      'Delete a saved app and its files.\n\n' +
      'Args:\n' +
      '  - name (string): App name\n\n' +
      'Returns: { name, deleted }',
    inputSchema: deleteAppSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: false,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleDeleteApp(library)(params);
      return createSuccess(result);
    },
  });

  return { server, components };
}
