// Domain-specific error types for the city orchestrator

/**
 * Base error class for all orchestrator errors
 */
export abstract class CityError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends CityError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Configuration file could not be read or does not match the schema
 */
export class ConfigError extends CityError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 3;
}

/**
 * Not found errors
 */
export class NotFoundError extends CityError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * A department process could not be spawned
 */
export class ProcessLaunchError extends CityError {
  readonly code = 'PROCESS_LAUNCH_ERROR';
  readonly exitCode = 5;

  constructor(public readonly department: string, reason: string) {
    super(`Failed to launch ${department}: ${reason}`, { department });
  }
}

/**
 * Inbound message that does not match its declared type
 */
export class MessageError extends CityError {
  readonly code = 'MESSAGE_ERROR';
  readonly exitCode = 6;

  constructor(message: string, public readonly messageType?: string, context?: Record<string, unknown>) {
    super(message, { ...context, messageType });
  }
}

/**
 * A unit of work that no live department could accept
 */
export class UndeliverableError extends CityError {
  readonly code = 'UNDELIVERABLE';
  readonly exitCode = 7;

  constructor(public readonly callId: string, public readonly departments: string[]) {
    super(`Call ${callId} is undeliverable: no live department among ${departments.join(', ') || '(none)'}`, {
      callId,
      departments
    });
  }
}
