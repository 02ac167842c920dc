import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ElevatorUnit, createFleet } from '../services/ElevatorUnit';
import { InvalidFloorError, UnitFaultError } from '../utils/errors';
import { createGateway, instantSleep, testConfig } from './helpers';

describe('ElevatorUnit', () => {
  let gateway: ReturnType<typeof createGateway>;

  beforeEach(() => {
    gateway = createGateway();
  });

  const published = () => gateway.upsertUnitState.mock.calls.map(([unit]) => unit);

  it('should start idle at floor 1 and publish that state', () => {
    const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });

    expect(unit.snapshot()).toEqual({
      id: 1,
      currentFloor: 1,
      state: 'IDLE',
      direction: 'NONE',
      destinationFloor: null,
      tripsCompleted: 0,
      maintenanceMode: false,
    });
    expect(gateway.upsertUnitState).toHaveBeenCalledTimes(1);
  });

  describe('moveTo', () => {
    it('should visit every floor in order, cycle the doors and end idle', async () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      gateway.upsertUnitState.mockClear();

      await unit.moveTo(4);

      expect(published().map((u) => [u.state, u.currentFloor])).toEqual([
        ['MOVING', 1],
        ['MOVING', 2],
        ['MOVING', 3],
        ['MOVING', 4],
        ['DOOR_OPENING', 4],
        ['DOOR_CLOSING', 4],
        ['IDLE', 4],
      ]);
      expect(published()[0]).toMatchObject({ direction: 'UP', destinationFloor: 4 });
      expect(unit.snapshot()).toMatchObject({
        currentFloor: 4,
        state: 'IDLE',
        direction: 'NONE',
        destinationFloor: null,
      });
    });

    it('should sleep one transit per floor and one door duration per door phase', async () => {
      const sleep = vi.fn(instantSleep);
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep });

      await unit.moveTo(3);

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000, 1000, 1000]);
    });

    it('should move down with direction DOWN', async () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      await unit.moveTo(3);
      gateway.upsertUnitState.mockClear();

      await unit.moveTo(1);

      expect(published()[0]).toMatchObject({ state: 'MOVING', direction: 'DOWN', destinationFloor: 1 });
      expect(published().filter((u) => u.state === 'MOVING').map((u) => u.currentFloor)).toEqual([3, 2, 1]);
    });

    it('should do nothing when already at the floor', async () => {
      const sleep = vi.fn(instantSleep);
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep });
      gateway.upsertUnitState.mockClear();

      await unit.moveTo(1);

      expect(sleep).not.toHaveBeenCalled();
      expect(gateway.upsertUnitState).not.toHaveBeenCalled();
    });

    it('should reject floors outside the building or not whole', async () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });

      await expect(unit.moveTo(0)).rejects.toThrow(InvalidFloorError);
      await expect(unit.moveTo(11)).rejects.toThrow(
        'Floor must be an integer between 1 and 10 (got 11)'
      );
      await expect(unit.moveTo(2.5)).rejects.toThrow(InvalidFloorError);
      expect(unit.snapshot().currentFloor).toBe(1);
    });

    it('should run concurrent calls on the same unit one after another', async () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      gateway.upsertUnitState.mockClear();

      await Promise.all([unit.moveTo(4), unit.moveTo(2)]);

      const floors = published()
        .filter((u) => u.state === 'MOVING')
        .map((u) => u.currentFloor);
      expect(floors).toEqual([1, 2, 3, 4, 4, 3, 2]);
      expect(unit.snapshot()).toMatchObject({ currentFloor: 2, state: 'IDLE' });
    });

    it('should not fail when the gateway rejects or throws', async () => {
      gateway.upsertUnitState.mockRejectedValueOnce(new Error('disk full'));
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      gateway.upsertUnitState.mockImplementation(() => {
        throw new Error('connection lost');
      });

      await expect(unit.moveTo(3)).resolves.toBeUndefined();
      expect(unit.snapshot()).toMatchObject({ currentFloor: 3, state: 'IDLE' });
    });

    it('should propagate a failure during the movement sequence', async () => {
      const sleep = vi.fn(() => Promise.reject(new Error('motor stalled')));
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep });

      await expect(unit.moveTo(5)).rejects.toThrow('motor stalled');
      expect(unit.snapshot()).toMatchObject({ currentFloor: 1, state: 'MOVING' });
    });

    it('should refuse to move once the unit has faulted', async () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      unit.fail('door sensor');

      await expect(unit.moveTo(3)).rejects.toThrow(UnitFaultError);
      await expect(unit.moveTo(3)).rejects.toThrow('Elevator 1 fault: unit is out of service');
    });
  });

  describe('reservation', () => {
    it('should reserve and roll back to the previous fields', () => {
      const unit = new ElevatorUnit(2, testConfig, gateway, { sleep: instantSleep });

      const rollback = unit.reserve('UP', 7);
      expect(unit.snapshot()).toMatchObject({ state: 'MOVING', direction: 'UP', destinationFloor: 7 });

      rollback();
      expect(unit.snapshot()).toMatchObject({ state: 'IDLE', direction: 'NONE', destinationFloor: null });
    });

    it('should count a trip and become idle when settled', () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      unit.reserve('DOWN', 1);

      unit.settle();

      expect(unit.snapshot()).toMatchObject({
        state: 'IDLE',
        direction: 'NONE',
        destinationFloor: null,
        tripsCompleted: 1,
      });
    });

    it('should stay in ERROR when settled after a fault', () => {
      const unit = new ElevatorUnit(1, testConfig, gateway, { sleep: instantSleep });
      unit.fail('brake fault');

      unit.settle();

      expect(unit.snapshot()).toMatchObject({ state: 'ERROR', tripsCompleted: 1 });
    });
  });

  it('should build a fleet with ids starting at 1', () => {
    const fleet = createFleet(testConfig, gateway, { sleep: instantSleep });

    expect(fleet.map((unit) => unit.id)).toEqual([1, 2, 3]);
    expect(fleet.every((unit) => unit.snapshot().currentFloor === 1)).toBe(true);
  });
});
