import type { WebSocketService } from './WebSocketService';
import type { ElevatorEvent, ElevatorSnapshot, PersistenceGateway } from '../utils/types';

type Broadcaster = Pick<WebSocketService, 'broadcastElevatorUpdate' | 'broadcastElevatorEvent'>;

/**
 * @brief Persistence gateway that also pushes every write to WebSocket clients
 * @description Clients are notified first, so a failing store does not hide live state.
 */
export class BroadcastGateway implements PersistenceGateway {
  constructor(
    private readonly store: PersistenceGateway,
    private readonly wsService: Broadcaster
  ) {}

  async upsertUnitState(unit: ElevatorSnapshot): Promise<void> {
    this.wsService.broadcastElevatorUpdate(unit);
    await this.store.upsertUnitState(unit);
  }

  async appendEvent(event: ElevatorEvent): Promise<void> {
    this.wsService.broadcastElevatorEvent(event);
    await this.store.appendEvent(event);
  }
}
