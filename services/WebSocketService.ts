import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { logger } from '../utils/logger';
import type { ElevatorEvent, ElevatorSnapshot } from '../utils/types';

type OutgoingType = 'elevator_update' | 'elevator_event' | 'error' | 'connected' | 'info';

interface WebSocketMessage {
  type: OutgoingType;
  data?: unknown;
  timestamp: string;
}

/**
 * @brief Pushes live elevator state and events to every connected client
 */
export class WebSocketService {
  private wss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private log = logger.child('websocket');

  constructor(wss: WebSocketServer) {
    this.wss = wss;
    this.setupWebSocket();
  }

  private setupWebSocket() {
    this.wss.on('connection', (ws: WebSocket, req) => {
      this.log.info('Client connected', { remoteAddress: req.socket.remoteAddress });
      this.clients.add(ws);

      this.sendToClient(ws, {
        type: 'connected',
        data: {
          message: 'Connected to Elevator Dispatch WebSocket',
          availableEvents: [
            'elevator_update - Unit state after every floor and door transition',
            'elevator_event - Assignment, completion and failure events',
          ],
        },
        timestamp: new Date().toISOString(),
      });

      ws.on('message', (message: RawData) => {
        let data: unknown;
        try {
          data = JSON.parse(message.toString());
        } catch {
          this.sendToClient(ws, {
            type: 'error',
            data: { message: 'Invalid JSON message' },
            timestamp: new Date().toISOString(),
          });
          return;
        }
        this.handleClientMessage(ws, data);
      });

      ws.on('close', () => {
        this.log.info('Client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.log.error('Client error', { error: error.message });
        this.clients.delete(ws);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, data: unknown) {
    if (typeof data === 'object' && data !== null && 'action' in data && data.action === 'ping') {
      this.sendToClient(ws, {
        type: 'info',
        data: { message: 'pong', connectedClients: this.clients.size },
        timestamp: new Date().toISOString(),
      });
    }
  }

  private sendToClient(ws: WebSocket, message: WebSocketMessage) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  /**
   * Broadcast elevator state to all connected clients
   */
  broadcastElevatorUpdate(elevator: ElevatorSnapshot) {
    this.broadcast({
      type: 'elevator_update',
      data: elevator,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Broadcast a dispatcher event to all connected clients
   */
  broadcastElevatorEvent(event: ElevatorEvent) {
    this.broadcast({
      type: 'elevator_event',
      data: event,
      timestamp: new Date().toISOString(),
    });
  }

  private broadcast(message: WebSocketMessage) {
    const messageStr = JSON.stringify(message);

    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(messageStr);
      }
    });
  }

  getConnectedClientsCount(): number {
    return this.clients.size;
  }

  closeAll() {
    this.clients.forEach((client) => {
      client.close();
    });
    this.clients.clear();
  }
}
