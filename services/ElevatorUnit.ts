import { InvalidFloorError, UnitFaultError } from '../utils/errors';
import { Mutex } from '../utils/Mutex';
import { fireAndForget, logger, type Logger } from '../utils/logger';
import type {
  BuildingConfig,
  Direction,
  ElevatorSnapshot,
  ElevatorState,
  PersistenceGateway,
} from '../utils/types';

export type Sleep = (ms: number) => Promise<void>;

export interface ElevatorUnitOptions {
  /** Replaces the timer used between floors and door phases */
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * @brief One elevator car and its movement state machine
 * @description Only moveTo drives the car between floors. The dispatcher may reserve,
 * settle or fail the unit, but never moves it.
 */
export class ElevatorUnit {
  private currentFloor = 1;
  private state: ElevatorState = 'IDLE';
  private direction: Direction = 'NONE';
  private destinationFloor: number | null = null;
  private tripsCompleted = 0;
  private maintenanceMode = false;

  private readonly lock = new Mutex();
  private readonly sleep: Sleep;
  private readonly log: Logger;

  /**
   * @param id - Stable identifier, assigned once at fleet creation
   * @param config - Building configuration (floor count and timings)
   * @param gateway - Receives a state upsert after every transition
   */
  constructor(
    readonly id: number,
    private readonly config: BuildingConfig,
    private readonly gateway: PersistenceGateway,
    options: ElevatorUnitOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.log = logger.child(`elevator-${id}`);
    this.publish();
  }

  snapshot(): ElevatorSnapshot {
    return {
      id: this.id,
      currentFloor: this.currentFloor,
      state: this.state,
      direction: this.direction,
      destinationFloor: this.destinationFloor,
      tripsCompleted: this.tripsCompleted,
      maintenanceMode: this.maintenanceMode,
    };
  }

  /**
   * @brief Move the car to a floor, then cycle the doors
   * @description Calls on the same unit run one after another. Resolves once the car is IDLE
   * at the floor; any failure along the way rejects.
   */
  async moveTo(floor: number): Promise<void> {
    if (!Number.isInteger(floor) || floor < 1 || floor > this.config.totalFloors) {
      throw new InvalidFloorError(
        `Floor must be an integer between 1 and ${this.config.totalFloors} (got ${floor})`
      );
    }

    await this.lock.runExclusive(async () => {
      if (this.state === 'ERROR') {
        throw new UnitFaultError(this.id, 'unit is out of service');
      }
      if (floor === this.currentFloor) {
        return;
      }

      this.destinationFloor = floor;
      this.direction = floor > this.currentFloor ? 'UP' : 'DOWN';
      this.state = 'MOVING';
      this.publish();

      const step = this.direction === 'UP' ? 1 : -1;
      while (this.currentFloor !== floor) {
        await this.sleep(this.config.floorMoveTime * 1000);
        this.currentFloor += step;
        this.publish();
        this.log.debug(`Now at floor ${this.currentFloor}`, { destination: floor });
      }

      await this.cycleDoors();
    });
  }

  private async cycleDoors(): Promise<void> {
    this.state = 'DOOR_OPENING';
    this.publish();
    await this.sleep(this.config.doorOpenCloseTime * 1000);

    this.state = 'DOOR_CLOSING';
    this.publish();
    await this.sleep(this.config.doorOpenCloseTime * 1000);

    this.becomeIdle();
  }

  /**
   * @brief Speculative reservation made by the dispatcher under the fleet lock
   * @returns A function restoring the fields as they were before the reservation
   */
  reserve(direction: Exclude<Direction, 'NONE'>, destinationFloor: number): () => void {
    const previous = {
      state: this.state,
      direction: this.direction,
      destinationFloor: this.destinationFloor,
    };

    this.direction = direction;
    this.destinationFloor = destinationFloor;
    this.state = 'MOVING';
    this.publish();

    return () => {
      this.state = previous.state;
      this.direction = previous.direction;
      this.destinationFloor = previous.destinationFloor;
      this.publish();
    };
  }

  /**
   * @brief Close out a completed call
   * @description Counts the trip. The car is set IDLE unless it faulted or another
   * movement is queued on it.
   */
  settle(): void {
    this.tripsCompleted++;
    if (this.state !== 'ERROR' && !this.lock.isLocked()) {
      this.becomeIdle();
    } else {
      this.publish();
    }
  }

  /**
   * @brief Put the unit out of service. Terminal: nothing in this service resets it.
   */
  fail(reason: string): void {
    this.state = 'ERROR';
    this.publish();
    this.log.error('Unit faulted', { reason, floor: this.currentFloor });
  }

  setMaintenance(enabled: boolean): void {
    this.maintenanceMode = enabled;
    this.publish();
  }

  private becomeIdle() {
    this.state = 'IDLE';
    this.direction = 'NONE';
    this.destinationFloor = null;
    this.publish();
  }

  private publish() {
    const unit = this.snapshot();
    fireAndForget(this.log, 'State upsert', () => this.gateway.upsertUnitState(unit));
  }
}

/**
 * @brief Build the fleet: ids 1..totalElevators, every car IDLE at floor 1
 */
export function createFleet(
  config: BuildingConfig,
  gateway: PersistenceGateway,
  options: ElevatorUnitOptions = {}
): ElevatorUnit[] {
  return Array.from(
    { length: config.totalElevators },
    (_, index) => new ElevatorUnit(index + 1, config, gateway, options)
  );
}
