import { BaseError } from '@appforge/shared/Types/errors.js';
import type { FailureKind } from './executor/types.js';

/**
 * Base error for the Forge execution core.
 */
export class ForgeError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'ForgeError';
  }
}

/**
 * Creating the sandbox itself failed (disk, permissions, missing interpreter)
 */
export class ProvisioningError extends ForgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROVISIONING_ERROR', details);
    this.name = 'ProvisioningError';
  }
}

/**
 * The package installer exited non-zero or timed out. `output` holds its combined output.
 */
export class PopulationError extends ForgeError {
  public readonly output: string;

  constructor(message: string, output: string, exitCode: number | null) {
    super(message, 'POPULATION_ERROR', { exitCode });
    this.name = 'PopulationError';
    this.output = output;
  }
}

/**
 * The program exited non-zero, timed out, or died within the service grace window
 */
export class RuntimeFailure extends ForgeError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly timedOut: boolean,
    public readonly kind: FailureKind,
  ) {
    super(message, 'RUNTIME_FAILURE', { exitCode, timedOut, kind });
    this.name = 'RuntimeFailure';
  }
}

/**
 * The repair collaborator failed or returned no usable code
 */
export class RepairGenerationError extends ForgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'REPAIR_GENERATION_ERROR', details);
    this.name = 'RepairGenerationError';
  }
}

export class ServiceNotFoundError extends ForgeError {
  constructor(serviceId: string) {
    super(`Service ${serviceId} not found`, 'SERVICE_NOT_FOUND', { serviceId });
    this.name = 'ServiceNotFoundError';
  }
}

export class ServiceLimitError extends ForgeError {
  constructor(limit: number) {
    super(`Maximum ${limit} concurrent services reached. Stop a service first.`, 'SERVICE_LIMIT', { limit });
    this.name = 'ServiceLimitError';
  }
}

export class AppNotFoundError extends ForgeError {
  constructor(name: string) {
    super(`App "${name}" not found`, 'APP_NOT_FOUND', { name });
    this.name = 'AppNotFoundError';
  }
}
