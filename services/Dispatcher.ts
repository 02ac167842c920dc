import { ElevatorUnit } from './ElevatorUnit';
import { IdempotencyStore, fingerprintRequest } from './IdempotencyStore';
import { TaskRegistry } from './TaskRegistry';
import {
  canPickUp,
  estimateArrival,
  pickClosest,
  requiredDirection,
} from './dispatchPolicy';
import {
  DispatcherClosedError,
  ElevatorNotFoundError,
  InvalidFloorError,
  NoAvailableElevatorError,
  errorMessage,
} from '../utils/errors';
import { Mutex } from '../utils/Mutex';
import { fireAndForget, logger } from '../utils/logger';
import type {
  AssignmentResult,
  BuildingConfig,
  DispatcherMetrics,
  ElevatorEvent,
  ElevatorRequest,
  PersistenceGateway,
  StatusSnapshot,
  TaskRecord,
} from '../utils/types';

type Reservation =
  | { kind: 'replayed'; result: AssignmentResult }
  | { kind: 'assigned'; result: AssignmentResult; unit: ElevatorUnit };

export interface DispatcherOptions {
  /** Clock for idempotency expiry */
  now?: () => number;
  /** Terminal task outcomes kept for polling */
  taskHistoryLimit?: number;
}

/**
 * @brief Assigns calls to elevator units and runs the resulting movements
 * @description Selection and reservation happen under one fleet-wide lock; the movement
 * itself runs outside it as an independent task whose outcome is polled by task id.
 */
export class Dispatcher {
  private readonly fleetLock = new Mutex();
  private readonly idempotency: IdempotencyStore;
  private readonly tasks: TaskRegistry;
  private readonly log = logger.child('dispatcher');
  private closed = false;
  private metrics: DispatcherMetrics = {
    totalCalls: 0,
    successfulAssignments: 0,
    failedAssignments: 0,
    idempotentReplays: 0,
    completedCalls: 0,
    failedCalls: 0,
  };

  /**
   * @param elevators - The fleet; ids must be unique
   * @param config - Building configuration
   * @param gateway - Receives the audit events
   */
  constructor(
    private readonly elevators: ElevatorUnit[],
    private readonly config: BuildingConfig,
    private readonly gateway: PersistenceGateway,
    options: DispatcherOptions = {}
  ) {
    this.idempotency = new IdempotencyStore(config.idempotencyTtl * 1000, options.now);
    this.tasks = new TaskRegistry(options.taskHistoryLimit);
    this.log.info(`Initialized with ${elevators.length} elevators`, {
      floors: config.totalFloors,
    });
  }

  /**
   * @brief Assign an elevator to a call and start serving it
   * @returns As soon as a unit is reserved; progress is read with getTaskStatus
   * @throws InvalidFloorError, IdempotencyConflictError, NoAvailableElevatorError, DispatcherClosedError
   */
  async assign(request: ElevatorRequest): Promise<AssignmentResult> {
    const { fromFloor, toFloor, requestedBy } = request;
    this.metrics.totalCalls++;

    let reservation: Reservation;
    try {
      this.validateFloor('From', fromFloor);
      this.validateFloor('To', toFloor);
      reservation = await this.fleetLock.runExclusive(() => this.reserve(request));
    } catch (error) {
      this.metrics.failedAssignments++;
      this.log.warn('Assignment failed', { fromFloor, toFloor, requestedBy, error: errorMessage(error) });
      throw error;
    }

    const { result } = reservation;
    if (reservation.kind === 'replayed') {
      this.metrics.idempotentReplays++;
      this.log.info('Replayed assignment for idempotency key', { taskId: result.taskId });
      return result;
    }

    this.metrics.successfulAssignments++;
    this.log.info(`Assigned elevator ${result.elevatorId}`, { fromFloor, toFloor, taskId: result.taskId });
    this.record({
      eventType: 'ELEVATOR_ASSIGNED',
      details: `Assigned elevator ${result.elevatorId} for ${fromFloor}→${toFloor}`,
      source: requestedBy,
      elevatorId: result.elevatorId,
      severity: 'INFO',
    });

    const done = this.executeCall(reservation.unit, request, result.taskId);
    this.tasks.track(result.taskId, done);
    return result;
  }

  /**
   * @description Runs under the fleet lock. Nothing here awaits, so the whole
   * check-select-reserve-store sequence is one step relative to other calls.
   */
  private reserve(request: ElevatorRequest): Reservation {
    const { fromFloor, toFloor, idempotencyKey } = request;
    if (this.closed) {
      throw new DispatcherClosedError();
    }

    this.idempotency.sweep();
    const fingerprint = fingerprintRequest(fromFloor, toFloor);
    if (idempotencyKey !== undefined) {
      const cached = this.idempotency.lookup(idempotencyKey, fingerprint);
      if (cached) {
        return { kind: 'replayed', result: cached };
      }
    }

    const direction = requiredDirection(fromFloor, toFloor);
    const unit = this.selectElevator(fromFloor, direction);
    if (!unit) {
      throw new NoAvailableElevatorError();
    }

    const estimatedArrivalTime = estimateArrival(unit.snapshot(), fromFloor, toFloor, this.config);
    const rollback = unit.reserve(direction, toFloor);
    let taskId: string | undefined;
    try {
      taskId = this.tasks.nextTaskId(unit.id);
      this.tasks.register(taskId, unit.id);
      const result: AssignmentResult = { elevatorId: unit.id, taskId, estimatedArrivalTime };
      if (idempotencyKey !== undefined) {
        this.idempotency.store(idempotencyKey, fingerprint, result);
      }
      return { kind: 'assigned', result, unit };
    } catch (error) {
      if (taskId !== undefined) {
        this.tasks.discard(taskId);
      }
      rollback();
      throw error;
    }
  }

  /**
   * @brief Greedy selection: nearest idle unit, else nearest unit already passing the pickup floor
   */
  private selectElevator(fromFloor: number, direction: 'UP' | 'DOWN'): ElevatorUnit | undefined {
    const idle = this.elevators.filter((unit) => {
      const state = unit.snapshot();
      return state.state === 'IDLE' && !state.maintenanceMode && !this.tasks.hasActiveTaskFor(unit.id);
    });
    if (idle.length > 0) {
      return pickClosest(idle, fromFloor);
    }

    const enRoute = this.elevators.filter((unit) => {
      const state = unit.snapshot();
      return (
        state.state === 'MOVING' &&
        !state.maintenanceMode &&
        state.direction === direction &&
        canPickUp(state, fromFloor)
      );
    });
    return pickClosest(enRoute, fromFloor);
  }

  private async executeCall(
    unit: ElevatorUnit,
    request: ElevatorRequest,
    taskId: string
  ): Promise<TaskRecord> {
    const { fromFloor, toFloor, requestedBy } = request;
    try {
      if (unit.snapshot().currentFloor !== fromFloor) {
        await unit.moveTo(fromFloor);
      }
      await unit.moveTo(toFloor);
    } catch (error) {
      const reason = errorMessage(error);
      unit.fail(reason);
      this.metrics.failedCalls++;
      this.record({
        eventType: 'CALL_FAILED',
        details: `Failed call ${fromFloor}→${toFloor}: ${reason}`,
        source: requestedBy,
        elevatorId: unit.id,
        severity: 'ERROR',
      });
      return this.tasks.fail(taskId, reason);
    }

    unit.settle();
    this.metrics.completedCalls++;
    this.record({
      eventType: 'CALL_COMPLETED',
      details: `Completed call ${fromFloor}→${toFloor}`,
      source: requestedBy,
      elevatorId: unit.id,
      severity: 'INFO',
    });
    return this.tasks.complete(taskId);
  }

  private validateFloor(label: 'From' | 'To', floor: number) {
    const maxFloor = this.config.totalFloors;
    if (!Number.isInteger(floor) || floor < 1 || floor > maxFloor) {
      throw new InvalidFloorError(`${label} floor must be 1-${maxFloor} (got ${floor})`);
    }
  }

  private record(event: ElevatorEvent) {
    fireAndForget(this.log, `${event.eventType} event`, () => this.gateway.appendEvent(event));
  }

  /**
   * @brief Take a unit in or out of maintenance
   */
  async setMaintenance(elevatorId: number, enabled: boolean): Promise<void> {
    await this.fleetLock.runExclusive(() => {
      const unit = this.elevators.find((candidate) => candidate.id === elevatorId);
      if (!unit) {
        throw new ElevatorNotFoundError(elevatorId);
      }
      unit.setMaintenance(enabled);
    });

    this.record({
      eventType: 'MAINTENANCE_CHANGED',
      details: `Maintenance mode ${enabled ? 'enabled' : 'disabled'} for elevator ${elevatorId}`,
      source: 'system',
      elevatorId,
      severity: 'WARNING',
    });
  }

  getStatus(): StatusSnapshot {
    const elevators = this.elevators.map((unit) => unit.snapshot());
    return {
      elevators,
      activeTasks: this.tasks.activeCount,
      systemHealth: elevators.every((unit) => unit.state !== 'IDLE') ? 'BUSY' : 'HEALTHY',
      metrics: { ...this.metrics },
      timestamp: new Date().toISOString(),
    };
  }

  getTaskStatus(taskId: string): TaskRecord {
    return this.tasks.get(taskId);
  }

  /**
   * @brief Resolves once the task is completed or failed
   */
  waitForTask(taskId: string): Promise<TaskRecord> {
    return this.tasks.wait(taskId);
  }

  getBuildingConfig(): BuildingConfig {
    return { ...this.config };
  }

  /**
   * @brief Refuse new assignments and wait for every running task
   */
  async shutdown(): Promise<void> {
    await this.fleetLock.runExclusive(() => {
      this.closed = true;
    });
    this.log.info('Waiting for running tasks', { activeTasks: this.tasks.activeCount });
    await this.tasks.waitForAll();
  }
}
