export class GatehouseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GatehouseError';
  }
}

export class ConfigError extends GatehouseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/** A verdict broke the decision lattice (e.g. a non-sealing layer tried to seal). */
export class SealViolationError extends GatehouseError {
  constructor(message: string, public readonly layer: string) {
    super(message, 'SEAL_VIOLATION', 'gate');
    this.name = 'SealViolationError';
  }
}

export class GateOrderError extends GatehouseError {
  constructor(
    public readonly gate: string,
    public readonly after: string,
  ) {
    super(`Gate "${gate}" evaluated out of order after "${after}"`, 'GATE_ORDER', 'gate');
    this.name = 'GateOrderError';
  }
}

export class AuditError extends GatehouseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'AUDIT_ERROR', 'audit', cause);
    this.name = 'AuditError';
  }
}

export class IntegrityError extends GatehouseError {
  constructor(message: string) {
    super(message, 'INTEGRITY_ERROR', 'audit');
    this.name = 'IntegrityError';
  }
}

export class InvariantError extends GatehouseError {
  constructor(message: string, public readonly details: string[] = []) {
    super(message, 'INVARIANT_VIOLATION', 'orchestrator');
    this.name = 'InvariantError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
