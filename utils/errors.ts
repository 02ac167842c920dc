/**
 * @brief Base class for every error the API reports to callers
 * @description Carries the HTTP status code the controller answers with
 */
export class ElevatorApiError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidFloorError extends ElevatorApiError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ValidationError extends ElevatorApiError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ElevatorNotFoundError extends ElevatorApiError {
  constructor(elevatorId: number | string) {
    super(`Elevator ${elevatorId} not found`, 404);
  }
}

export class IdempotencyConflictError extends ElevatorApiError {
  constructor(key: string) {
    super(`Idempotency key "${key}" was already used with a different request`, 409);
  }
}

export class NoAvailableElevatorError extends ElevatorApiError {
  constructor() {
    super('No elevators currently available', 503);
  }
}

export class DispatcherClosedError extends ElevatorApiError {
  constructor() {
    super('Dispatcher is shutting down', 503);
  }
}

/**
 * @brief Failure while a unit is moving
 * @description Never thrown back to the caller of assign; surfaces through task status
 */
export class UnitFaultError extends ElevatorApiError {
  constructor(public readonly elevatorId: number, message: string) {
    super(`Elevator ${elevatorId} fault: ${message}`, 500);
  }
}

export class DatabaseError extends ElevatorApiError {
  constructor(message: string) {
    super(`Database error: ${message}`, 500);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
