import type { BuildingConfig, Direction, ElevatorSnapshot } from '../utils/types';

export type TravelDirection = Exclude<Direction, 'NONE'>;

export function requiredDirection(fromFloor: number, toFloor: number): TravelDirection {
  return toFloor > fromFloor ? 'UP' : 'DOWN';
}

/**
 * @brief Whether a moving unit passes `floor` on its way to its destination
 * @description Both ends of the route are inclusive
 */
export function canPickUp(unit: ElevatorSnapshot, floor: number): boolean {
  if (unit.destinationFloor === null) {
    return false;
  }
  if (unit.direction === 'UP') {
    return unit.currentFloor <= floor && floor <= unit.destinationFloor;
  }
  if (unit.direction === 'DOWN') {
    return unit.destinationFloor <= floor && floor <= unit.currentFloor;
  }
  return false;
}

/**
 * @brief Closest unit to a floor, ties going to the lowest id
 */
export function pickClosest<T extends { snapshot(): ElevatorSnapshot }>(
  candidates: T[],
  floor: number
): T | undefined {
  let best: T | undefined;
  let bestDistance = Infinity;
  let bestId = Infinity;

  for (const candidate of candidates) {
    const { id, currentFloor } = candidate.snapshot();
    const distance = Math.abs(currentFloor - floor);
    if (distance < bestDistance || (distance === bestDistance && id < bestId)) {
      best = candidate;
      bestDistance = distance;
      bestId = id;
    }
  }
  return best;
}

/**
 * @brief Seconds until the passenger reaches `toFloor`
 * @description An idle unit goes straight to the pickup floor; a moving unit first
 * finishes its current leg. Two door cycles are counted: one for boarding, one at
 * the destination.
 * @param unit - The unit as it was before the reservation
 */
export function estimateArrival(
  unit: ElevatorSnapshot,
  fromFloor: number,
  toFloor: number,
  config: Pick<BuildingConfig, 'floorMoveTime' | 'doorOpenCloseTime'>
): number {
  let floorsToPickup = Math.abs(unit.currentFloor - fromFloor);
  if (unit.state === 'MOVING' && unit.destinationFloor !== null) {
    floorsToPickup =
      Math.abs(unit.currentFloor - unit.destinationFloor) +
      Math.abs(unit.destinationFloor - fromFloor);
  }
  const floorsToMove = floorsToPickup + Math.abs(fromFloor - toFloor);

  // open + close, at the pickup floor and again at the destination
  const doorCycle = 2 * config.doorOpenCloseTime;
  const doorTime = 2 * doorCycle;

  return floorsToMove * config.floorMoveTime + doorTime;
}
