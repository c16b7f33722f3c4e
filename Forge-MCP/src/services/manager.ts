/**
 * Owns long-running services after a successful start.
 *
 * Stopping a service terminates its process group and destroys its
 * environment. A service that exits on its own is cleaned up the same way.
 */

import type { ChildProcess } from 'node:child_process';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { generateServiceId } from '../utils/id-generator.js';
import { releaseStdio, signalProcessTree } from '../executor/spawn.js';
import { logServiceEvent } from '../logging/writer.js';
import { ServiceLimitError, ServiceNotFoundError } from '../errors.js';
import type { ForgeConfig } from '../config.js';
import type { EnvironmentProvisioner } from '../environment/provisioner.js';
import type { Environment } from '../environment/types.js';
import type { ServiceStarted } from '../executor/types.js';
import type { Service, ServiceHandle, ServiceInfo, ServiceSlot, StopServiceResult } from './types.js';

const logger = new Logger('forge:services');

const TAIL_CHARS = 500;
/** Extra wait after SIGKILL before giving up on an 'exit' event */
const POST_KILL_WAIT_MS = 1_000;

type ServiceManagerConfig = Pick<ForgeConfig, 'maxServices' | 'killGraceMs' | 'logDir'>;

export class ServiceManager {
  private services = new Map<string, Service>();
  private pending = 0;

  constructor(
    private readonly provisioner: EnvironmentProvisioner,
    private readonly config: ServiceManagerConfig,
  ) {}

  // ── Capacity ──────────────────────────────────────────────────────────────

  /**
   * Claim a service slot before starting. Running services and outstanding
   * slots together never exceed `maxServices`. Call synchronously, before the
   * first await of a start.
   */
  reserve(): ServiceSlot {
    if (this.services.size + this.pending >= this.config.maxServices) {
      throw new ServiceLimitError(this.config.maxServices);
    }
    this.pending++;
    let held = true;
    return {
      release: () => {
        if (!held) return;
        held = false;
        this.pending--;
      },
    };
  }

  // ── Register ──────────────────────────────────────────────────────────────

  /** Turn a reserved slot into a running service */
  register(slot: ServiceSlot, started: ServiceStarted, environment: Environment, launcher?: string): ServiceHandle {
    slot.release();
    const serviceId = generateServiceId();
    const service: Service = {
      service_id: serviceId,
      language: environment.language,
      pid: started.pid,
      process: started.process,
      environment,
      script_path: started.script_path,
      launcher: launcher ?? null,
      started_at: new Date().toISOString(),
      stdout: started.stdout,
      stderr: started.stderr,
    };
    this.services.set(serviceId, service);

    started.process.on('error', (err) => logger.error(`Service ${serviceId} process error`, err));
    started.process.on('exit', (code, signal) => {
      // Only services still registered exited unexpectedly; stop() removes first
      if (this.services.get(serviceId) === service) {
        this.handleExit(service, code, signal).catch((err) =>
          logger.error(`Exit cleanup failed for ${serviceId}`, err),
        );
      }
    });

    logServiceEvent(this.config.logDir, {
      type: 'service_start',
      service_id: serviceId,
      env_id: environment.env_id,
      language: environment.language,
      pid: started.pid,
      launcher: service.launcher,
      at: service.started_at,
    }).catch((err) => logger.error(`Log write failed: ${err}`));

    logger.info(`Registered service ${serviceId}`, { pid: started.pid, env_id: environment.env_id });
    return toHandle(service);
  }

  // ── Stop ──────────────────────────────────────────────────────────────────

  async stop(serviceId: string, reason: StopServiceResult['reason'] = 'manual'): Promise<StopServiceResult> {
    const service = this.services.get(serviceId);
    if (!service) {
      throw new ServiceNotFoundError(serviceId);
    }
    this.services.delete(serviceId);

    await this.terminate(service.process);
    await this.provisioner.destroy(service.environment);

    const uptime = uptimeMs(service);
    logServiceEvent(this.config.logDir, {
      type: 'service_stop',
      service_id: serviceId,
      reason,
      uptime_ms: uptime,
      at: new Date().toISOString(),
    }).catch((err) => logger.error(`Log write failed: ${err}`));

    logger.info(`Stopped service ${serviceId}`, { reason });
    return { service_id: serviceId, uptime_ms: uptime, reason };
  }

  // ── List ──────────────────────────────────────────────────────────────────

  list(): ServiceInfo[] {
    return [...this.services.values()].map((service) => ({
      ...toHandle(service),
      language: service.language,
      launcher: service.launcher,
      uptime_ms: uptimeMs(service),
      stdout_tail: service.stdout.toString().slice(-TAIL_CHARS),
      stderr_tail: service.stderr.toString().slice(-TAIL_CHARS),
    }));
  }

  // ── Shutdown All ──────────────────────────────────────────────────────────

  async shutdownAll(): Promise<void> {
    const ids = [...this.services.keys()];
    await Promise.allSettled(ids.map((id) => this.stop(id, 'shutdown')));
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private async handleExit(service: Service, code: number | null, signal: NodeJS.Signals | null): Promise<void> {
    this.services.delete(service.service_id);
    releaseStdio(service.process);
    logger.warn(`Service ${service.service_id} exited on its own`, { exit_code: code, signal });

    await this.provisioner.destroy(service.environment);
    await logServiceEvent(this.config.logDir, {
      type: 'service_exit',
      service_id: service.service_id,
      exit_code: code,
      signal,
      uptime_ms: uptimeMs(service),
      stderr_tail: service.stderr.toString().slice(-TAIL_CHARS),
      at: new Date().toISOString(),
    });
  }

  private terminate(proc: ChildProcess): Promise<void> {
    if (proc.exitCode !== null || proc.signalCode !== null) {
      releaseStdio(proc);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      let postKillTimer: ReturnType<typeof setTimeout> | null = null;
      const done = () => {
        clearTimeout(killTimer);
        if (postKillTimer) clearTimeout(postKillTimer);
        releaseStdio(proc);
        resolve();
      };
      const killTimer = setTimeout(() => {
        signalProcessTree(proc, 'SIGKILL');
        postKillTimer = setTimeout(done, POST_KILL_WAIT_MS);
      }, this.config.killGraceMs);

      proc.once('exit', done);

      signalProcessTree(proc, 'SIGTERM');
    });
  }
}

function toHandle(service: Service): ServiceHandle {
  return {
    service_id: service.service_id,
    pid: service.pid,
    env_id: service.environment.env_id,
    started_at: service.started_at,
  };
}

function uptimeMs(service: Service): number {
  return Date.now() - new Date(service.started_at).getTime();
}
