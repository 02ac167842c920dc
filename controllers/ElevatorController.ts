import type { Request, Response } from 'express';
import type { Dispatcher } from '../services/Dispatcher';
import type { DatabaseManager } from '../Database/DatabaseManager';
import { ElevatorApiError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  callRequestSchema,
  elevatorIdSchema,
  idempotencyKeySchema,
  logsQuerySchema,
  maintenanceSchema,
  parseWith,
  queryLogsQuerySchema,
} from '../utils/validation';

export type DispatchApi = Pick<
  Dispatcher,
  'assign' | 'getStatus' | 'getTaskStatus' | 'setMaintenance' | 'getBuildingConfig'
>;

export type LogReader = Pick<DatabaseManager, 'getLogs' | 'getQueryLogs'>;

const log = logger.child('http');

/**
 * @brief Elevator controller class
 * @description Translates HTTP requests into dispatcher calls and errors into status codes
 */
export class ElevatorController {
  /**
   * @param dispatcher - The dispatcher instance
   * @param logs - Reader for the persisted event and query logs
   */
  constructor(
    private dispatcher: DispatchApi,
    private logs: LogReader
  ) {}

  // POST /call
  /**
   * @brief Call elevator
   * @description Body: fromFloor, toFloor, requestedBy. An Idempotency-Key header makes retries safe.
   */
  async callElevator(req: Request, res: Response) {
    try {
      const body: unknown = req.body ?? {};
      if (!hasFloors(body)) {
        return res.status(400).json({
          error: 'fromFloor and toFloor are required'
        });
      }

      const { fromFloor, toFloor, requestedBy } = parseWith(callRequestSchema, body);
      const header = req.headers['idempotency-key'];
      const rawKey = Array.isArray(header) ? header[0] : header;
      const idempotencyKey = rawKey === undefined ? undefined : parseWith(idempotencyKeySchema, rawKey);

      const result = await this.dispatcher.assign({
        fromFloor,
        toFloor,
        requestedBy: requestedBy ?? req.ip ?? 'anonymous',
        idempotencyKey
      });

      res.json({
        success: true,
        message: `Elevator ${result.elevatorId} assigned`,
        data: result
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // GET /status
  async getStatus(req: Request, res: Response) {
    try {
      res.json({
        success: true,
        data: this.dispatcher.getStatus()
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // GET /tasks/:taskId
  async getTask(req: Request, res: Response) {
    try {
      res.json({
        success: true,
        data: this.dispatcher.getTaskStatus(req.params.taskId)
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // GET /logs/:elevatorId?
  /**
   * @brief Get elevator logs
   * @description Query: limit, offset, eventType
   */
  async getLogs(req: Request, res: Response) {
    try {
      const { elevatorId } = req.params;
      const query = parseWith(logsQuerySchema, req.query);

      const logs = await this.logs.getLogs({
        ...query,
        elevatorId: elevatorId === undefined ? undefined : parseWith(elevatorIdSchema, elevatorId)
      });

      res.json({
        success: true,
        data: logs
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // GET /query-logs
  async getQueryLogs(req: Request, res: Response) {
    try {
      const { limit } = parseWith(queryLogsQuerySchema, req.query);
      const logs = await this.logs.getQueryLogs(limit);

      res.json({
        success: true,
        data: logs
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // PUT /:elevatorId/maintenance
  async setMaintenance(req: Request, res: Response) {
    try {
      const elevatorId = parseWith(elevatorIdSchema, req.params.elevatorId);
      const { enabled } = parseWith(maintenanceSchema, req.body);

      await this.dispatcher.setMaintenance(elevatorId, enabled);

      res.json({
        success: true,
        message: `Maintenance mode ${enabled ? 'enabled' : 'disabled'} for elevator ${elevatorId}`
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  // GET /config
  async getConfig(req: Request, res: Response) {
    try {
      res.json({
        success: true,
        data: this.dispatcher.getBuildingConfig()
      });
    } catch (error) {
      this.fail(res, error);
    }
  }

  private fail(res: Response, error: unknown) {
    if (error instanceof ElevatorApiError) {
      res.status(error.statusCode).json({ error: error.message });
      return;
    }
    log.error('Unhandled request error', {
      error: error instanceof Error ? error.message : String(error)
    });
    res.status(500).json({ error: 'Internal server error' });
  }
}

function hasFloors(body: unknown): boolean {
  return (
    typeof body === 'object' &&
    body !== null &&
    'fromFloor' in body &&
    'toFloor' in body &&
    body.fromFloor !== undefined &&
    body.fromFloor !== null &&
    body.toFloor !== undefined &&
    body.toFloor !== null
  );
}
