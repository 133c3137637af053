/**
 * Error taxonomy for the release engine.
 *
 * Every error carries the phase it was raised in and, where one applies, the
 * setting path that caused it. Operators see `[phase] message`.
 */

import type { ArkErrors } from 'arktype';

export type OperationPhase =
  | 'resolve'
  | 'render'
  | 'migrate'
  | 'rollout'
  | 'driver'
  | 'teardown'
  | 'status'
  | 'logs';

export interface ErrorDetails {
  phase: OperationPhase;
  settingPath?: string | undefined;
  context?: Record<string, unknown> | undefined;
}

export class ChartwrightError extends Error {
  public readonly phase: OperationPhase;
  public readonly settingPath: string | undefined;
  public readonly context: Record<string, unknown> | undefined;

  constructor(
    message: string,
    public readonly code: string,
    details: ErrorDetails
  ) {
    super(message);
    this.name = 'ChartwrightError';
    this.phase = details.phase;
    this.settingPath = details.settingPath;
    this.context = details.context;
  }

  /**
   * Message as shown to operators, prefixed with the failing phase
   */
  describe(): string {
    const path = this.settingPath ? ` (setting: ${this.settingPath})` : '';
    return `[${this.phase}] ${this.message}${path}`;
  }
}

/**
 * A settings scope changed the shape of a path (scalar, mapping or sequence)
 */
export class ConflictError extends ChartwrightError {
  constructor(
    message: string,
    settingPath: string,
    public readonly scope: string
  ) {
    super(message, 'SETTINGS_CONFLICT', { phase: 'resolve', settingPath, context: { scope } });
    this.name = 'ConflictError';
  }
}

/**
 * A required value is missing or two values contradict each other
 */
export class ConfigurationError extends ChartwrightError {
  constructor(
    message: string,
    settingPath: string | undefined,
    phase: OperationPhase = 'render',
    public readonly problems: string[] = []
  ) {
    super(message, 'CONFIGURATION_ERROR', { phase, settingPath, context: { problems } });
    this.name = 'ConfigurationError';
  }
}

/**
 * Two distinct components of one release produced the same resource name
 */
export class NamingCollisionError extends ChartwrightError {
  constructor(
    public readonly resourceName: string,
    public readonly components: readonly string[]
  ) {
    super(
      `Resource name '${resourceName}' is produced by more than one component: ${components.join(', ')}`,
      'NAMING_COLLISION',
      { phase: 'render', context: { resourceName, components } }
    );
    this.name = 'NamingCollisionError';
  }
}

export type MigrationFailureReason = 'TaskFailed' | 'Timeout';

export class MigrationFailedError extends ChartwrightError {
  constructor(
    message: string,
    public readonly reason: MigrationFailureReason,
    public readonly taskName: string,
    public readonly revision: number
  ) {
    super(message, 'MIGRATION_FAILED', {
      phase: 'migrate',
      settingPath: reason === 'Timeout' ? 'migration.timeoutSeconds' : undefined,
      context: { reason, taskName, revision },
    });
    this.name = 'MigrationFailed';
  }
}

/**
 * An orchestrator API call failed. Raised verbatim, never retried.
 */
export class DriverError extends ChartwrightError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly statusCode: number | undefined,
    public readonly originalError?: unknown
  ) {
    super(message, 'DRIVER_ERROR', { phase: 'driver', context: { operation, statusCode } });
    this.name = 'DriverError';
  }
}

export class RolloutTimeoutError extends ChartwrightError {
  constructor(
    public readonly resourceId: string,
    public readonly timeoutMs: number,
    public readonly lastMessage?: string
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for ${resourceId} to become ready${lastMessage ? `: ${lastMessage}` : ''}`,
      'ROLLOUT_TIMEOUT',
      { phase: 'rollout', context: { resourceId, timeoutMs } }
    );
    this.name = 'RolloutTimeoutError';
  }
}

/**
 * The release history does not allow the requested operation, such as
 * installing over a deployed release
 */
export class ReleaseStateError extends ChartwrightError {
  constructor(
    message: string,
    public readonly releaseName: string,
    phase: OperationPhase = 'resolve'
  ) {
    super(message, 'RELEASE_STATE', { phase, context: { releaseName } });
    this.name = 'ReleaseStateError';
  }
}

/**
 * Wrap an error that carries no phase so operators still see where it happened
 */
export function withPhase(error: unknown, phase: OperationPhase): ChartwrightError {
  if (error instanceof ChartwrightError) {
    return error;
  }
  const cause = toError(error);
  const wrapped = new ChartwrightError(cause.message, 'UNEXPECTED_ERROR', { phase });
  wrapped.cause = cause;
  return wrapped;
}

/**
 * The lifecycle state machine was asked to make a transition it does not allow
 */
export class IllegalTransitionError extends ChartwrightError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    phase: OperationPhase
  ) {
    super(`Illegal lifecycle transition ${from} -> ${to}`, 'ILLEGAL_TRANSITION', {
      phase,
      context: { from, to },
    });
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Format arktype validation errors into a ConfigurationError pointing at the
 * first offending setting path
 */
export function formatSettingsValidationError(errors: ArkErrors, scope = 'settings'): ConfigurationError {
  const problems = errors.map((problem) => problem.message);

  const first = errors[0];
  const firstPath = first && first.path.length > 0 ? first.path.join('.') : undefined;

  let message = `Invalid ${scope}: ${problems[0] ?? errors.summary}`;
  if (problems.length > 1) {
    message += '\n\nAdditional validation errors:';
    problems.slice(1).forEach((problem, index) => {
      message += `\n  ${index + 2}. ${problem}`;
    });
  }

  return new ConfigurationError(message, firstPath, 'resolve', problems);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
