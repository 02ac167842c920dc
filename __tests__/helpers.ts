import { vi } from 'vitest';
import type { Sleep } from '../services/ElevatorUnit';
import type { BuildingConfig, ElevatorEvent, ElevatorSnapshot } from '../utils/types';

export const testConfig: BuildingConfig = {
  totalFloors: 10,
  totalElevators: 3,
  floorMoveTime: 2,
  doorOpenCloseTime: 1,
  idempotencyTtl: 600,
};

export const instantSleep: Sleep = () => Promise.resolve();

/**
 * Gateway whose calls are recorded
 */
export function createGateway() {
  return {
    upsertUnitState: vi.fn(async (_unit: ElevatorSnapshot) => {}),
    appendEvent: vi.fn(async (_event: ElevatorEvent) => {}),
  };
}

/**
 * Sleep that holds every caller until release() is called; afterwards it is instant
 */
export function createGate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  const sleep: Sleep = () => opened;
  return { sleep, release: () => open() };
}
