/**
 * Error taxonomy for a certificate lifecycle run.
 *
 * Every error names the stage it was raised in, so the single failure log line
 * written by the run controller says where the run stopped.
 */

export type RunStage =
  | 'parameters'
  | 'prerequisites'
  | 'lock'
  | 'credentials'
  | 'state-read'
  | 'issuance'
  | 'delivery'
  | 'state-write';

/**
 * Base class for every failure that ends a run.
 */
export class LifecycleError extends Error {
  public readonly stage: RunStage;

  constructor(stage: RunStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LifecycleError';
    this.stage = stage;
  }
}

/**
 * Invocation flags are missing or malformed. Raised before anything external is touched.
 */
export class ParameterValidationError extends LifecycleError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('parameters', `Parameter validation failed: ${issues.join('; ')}`);
    this.name = 'ParameterValidationError';
    this.issues = issues;
  }
}

/**
 * A required external tool or plugin is not installed.
 */
export class PrerequisiteMissingError extends LifecycleError {
  constructor(message: string) {
    super('prerequisites', message);
    this.name = 'PrerequisiteMissingError';
  }
}

export class CredentialSetupError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('credentials', message, options);
    this.name = 'CredentialSetupError';
  }
}

/**
 * The issuance client exited unsuccessfully, or reported success without producing artifacts.
 */
export class IssuanceError extends LifecycleError {
  constructor(message: string) {
    super('issuance', message);
    this.name = 'IssuanceError';
  }
}

/**
 * Import into the target server, or its restart, failed. The issued certificate stays on disk.
 */
export class DeliveryError extends LifecycleError {
  constructor(message: string) {
    super('delivery', message);
    this.name = 'DeliveryError';
  }
}

export class StatePersistenceError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('state-write', message, options);
    this.name = 'StatePersistenceError';
  }
}
