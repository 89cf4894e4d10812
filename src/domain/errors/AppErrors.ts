/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The resolution cascade was exhausted without a visible match.
 */
export class ElementNotFoundError extends DomainError {
  constructor(public readonly target: string) {
    super(`element not found: ${target}`);
  }
}

/**
 * The browser-action collaborator failed, fallbacks included.
 */
export class ActionExecutionError extends DomainError {
  constructor(
    public readonly action: string,
    public readonly target: string,
    reason?: string
  ) {
    super(`action failed: ${action} on ${target}${reason ? ` (${reason})` : ''}`);
  }
}

/**
 * Navigation to a URL failed.
 */
export class NavigationError extends DomainError {
  constructor(
    public readonly url: string,
    reason?: string
  ) {
    super(`failed to navigate to ${url}${reason ? `: ${reason}` : ''}`);
  }
}

/**
 * A planner produced output that does not match the TaskPlan shape.
 */
export class PlanValidationError extends DomainError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(`Invalid plan: ${message}`);
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error thrown when a stored workflow record cannot be read back.
 */
export class RecordCorruptedError extends DomainError {
  constructor(
    public readonly taskId: string,
    reason: string
  ) {
    super(`Workflow record ${taskId} is unreadable: ${reason}`);
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
