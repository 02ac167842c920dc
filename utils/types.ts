/**
 * @brief Elevator state
 */
export type ElevatorState = 'IDLE' | 'MOVING' | 'DOOR_OPENING' | 'DOOR_CLOSING' | 'ERROR';

/**
 * @brief Travel direction
 */
export type Direction = 'UP' | 'DOWN' | 'NONE';

/**
 * @brief Point-in-time view of one elevator unit
 */
export interface ElevatorSnapshot {
    id: number;
    currentFloor: number;
    state: ElevatorState;
    direction: Direction;
    destinationFloor: number | null;
    tripsCompleted: number;
    maintenanceMode: boolean;
}

/**
 * @brief Persisted elevator row
 */
export interface Elevator extends ElevatorSnapshot {
    lastUpdated: string;
}

export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type ElevatorEventType =
    | 'ELEVATOR_ASSIGNED'
    | 'CALL_COMPLETED'
    | 'CALL_FAILED'
    | 'MAINTENANCE_CHANGED';

/**
 * @brief Audit event appended by the dispatcher
 */
export interface ElevatorEvent {
    eventType: ElevatorEventType;
    details: string;
    source: string;
    elevatorId?: number;
    severity: Severity;
}

/**
 * @brief Elevator log interface
 */
export interface ElevatorLog extends ElevatorEvent {
    id: number;
    timestamp: string;
}

/**
 * @brief Query log interface
 */
export interface QueryLog {
    id: number;
    query: string;
    parameters: string | null;
    operation: string;
    source: string;
    executionTimeMs: number;
    error: string | null;
    executedAt: string;
}

export interface LogQuery {
    limit?: number;
    offset?: number;
    eventType?: string;
    elevatorId?: number;
}

/**
 * @brief Durable mirror of unit state and the event trail.
 * Best-effort: the core never reads it back and never fails because of it.
 */
export interface PersistenceGateway {
    upsertUnitState(unit: ElevatorSnapshot): Promise<void>;
    appendEvent(event: ElevatorEvent): Promise<void>;
}

/**
 * @brief Building config interface
 */
export interface BuildingConfig {
    totalFloors: number;
    totalElevators: number;
    floorMoveTime: number; // seconds
    doorOpenCloseTime: number; // seconds
    idempotencyTtl: number; // seconds
}

/**
 * @brief Elevator request interface
 */
export interface ElevatorRequest {
    fromFloor: number;
    toFloor: number;
    requestedBy: string;
    idempotencyKey?: string;
}

export interface AssignmentResult {
    elevatorId: number;
    taskId: string;
    estimatedArrivalTime: number; // seconds
}

export type TaskStatus = 'running' | 'completed' | 'failed';

export interface TaskRecord {
    taskId: string;
    elevatorId: number | null;
    status: TaskStatus;
    reason?: string;
    startedAt?: string;
    finishedAt?: string;
}

export type SystemHealth = 'HEALTHY' | 'BUSY';

export interface DispatcherMetrics {
    totalCalls: number;
    successfulAssignments: number;
    failedAssignments: number;
    idempotentReplays: number;
    completedCalls: number;
    failedCalls: number;
}

export interface StatusSnapshot {
    elevators: ElevatorSnapshot[];
    activeTasks: number;
    systemHealth: SystemHealth;
    metrics: DispatcherMetrics;
    timestamp: string;
}
