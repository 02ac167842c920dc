import Database from "sqlite3";
import { z } from "zod";
import { DatabaseError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type {
  Elevator,
  ElevatorEvent,
  ElevatorLog,
  ElevatorSnapshot,
  LogQuery,
  PersistenceGateway,
  QueryLog,
} from "../utils/types";

type SqlParam = string | number | boolean | null;

const MAX_LOG_LIMIT = 1000;

const elevatorRow = z.object({
  id: z.number(),
  current_floor: z.number(),
  state: z.enum(["IDLE", "MOVING", "DOOR_OPENING", "DOOR_CLOSING", "ERROR"]),
  direction: z.enum(["UP", "DOWN", "NONE"]),
  destination_floor: z.number().nullable(),
  trips_completed: z.number(),
  maintenance_mode: z.number(),
  last_updated: z.string(),
});

const elevatorLogRow = z.object({
  id: z.number(),
  elevator_id: z.number().nullable(),
  event_type: z.enum(["ELEVATOR_ASSIGNED", "CALL_COMPLETED", "CALL_FAILED", "MAINTENANCE_CHANGED"]),
  details: z.string(),
  source: z.string(),
  severity: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]),
  timestamp: z.string(),
});

const queryLogRow = z.object({
  id: z.number(),
  query: z.string(),
  parameters: z.string().nullable(),
  operation: z.string(),
  source: z.string(),
  execution_time_ms: z.number(),
  error: z.string().nullable(),
  executed_at: z.string(),
});

/**
 * @brief Database manager class
 * @description sqlite-backed persistence gateway. Mirrors unit state, keeps the event
 * trail and records every statement it runs in query_logs.
 */
export class DatabaseManager implements PersistenceGateway {
  /**
   * @brief Database instance
   */
  private db: Database.Database;
  private log = logger.child("database");

  /**
   * @param path - sqlite file, or ":memory:"
   */
  constructor(path: string = process.env.DB_PATH || "./Database/Elevator.db") {
    this.db = new Database.Database(path);
    // Statements run in submission order, so fire-and-forget upserts land in sequence
    this.db.serialize();
  }

  /**
   * @brief Initialize the database
   * @description Create the elevators, elevator_logs and query_logs tables
   */
  async initialize(): Promise<void> {
    await this.exec(`
            CREATE TABLE IF NOT EXISTS elevators (
                id INTEGER PRIMARY KEY,
                current_floor INTEGER NOT NULL,
                state TEXT NOT NULL,
                direction TEXT NOT NULL,
                destination_floor INTEGER,
                trips_completed INTEGER NOT NULL DEFAULT 0,
                maintenance_mode INTEGER NOT NULL DEFAULT 0,
                last_updated TEXT NOT NULL
            )
        `);

    await this.exec(`
            CREATE TABLE IF NOT EXISTS elevator_logs (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            elevator_id INTEGER,
            event_type TEXT NOT NULL,
            details TEXT NOT NULL,
            source TEXT NOT NULL,
            severity TEXT NOT NULL DEFAULT 'INFO',
            timestamp TEXT NOT NULL
            )
        `);

    await this.exec(`
            CREATE TABLE IF NOT EXISTS query_logs (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            query TEXT NOT NULL,
            parameters TEXT,
            operation TEXT NOT NULL,
            source TEXT NOT NULL,
            execution_time_ms REAL NOT NULL,
            error TEXT,
            executed_at TEXT NOT NULL
            )
        `);

    this.log.info("Database initialized");
  }

  /**
   * @brief Insert or update the mirrored state of one unit
   */
  async upsertUnitState(unit: ElevatorSnapshot): Promise<void> {
    await this.tracked(
      "upsertUnitState",
      `
      INSERT INTO elevators (id, current_floor, state, direction, destination_floor, trips_completed, maintenance_mode, last_updated)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (id) DO UPDATE SET
        current_floor = excluded.current_floor,
        state = excluded.state,
        direction = excluded.direction,
        destination_floor = excluded.destination_floor,
        trips_completed = excluded.trips_completed,
        maintenance_mode = excluded.maintenance_mode,
        last_updated = excluded.last_updated
    `,
      [
        unit.id,
        unit.currentFloor,
        unit.state,
        unit.direction,
        unit.destinationFloor,
        unit.tripsCompleted,
        unit.maintenanceMode ? 1 : 0,
        new Date().toISOString(),
      ],
      (sql, params) => this.run(sql, params)
    );
  }

  /**
   * @brief Append an event to the audit trail
   */
  async appendEvent(event: ElevatorEvent): Promise<void> {
    await this.tracked(
      "appendEvent",
      `
      INSERT INTO elevator_logs (elevator_id, event_type, details, source, severity, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `,
      [
        event.elevatorId ?? null,
        event.eventType,
        event.details,
        event.source,
        event.severity,
        new Date().toISOString(),
      ],
      (sql, params) => this.run(sql, params)
    );
  }

  /**
   * @brief Get all elevators
   * @returns All mirrored elevators ordered by id
   */
  async getAllElevators(): Promise<Elevator[]> {
    const rows = await this.tracked(
      "getAllElevators",
      "SELECT * FROM elevators ORDER BY id",
      [],
      (sql, params) => this.all(sql, params)
    );
    return rows.map((row) => this.mapRowToElevator(row));
  }

  /**
   * @brief Get an elevator
   * @returns The elevator, or null when it was never mirrored
   */
  async getElevator(id: number): Promise<Elevator | null> {
    const row = await this.tracked(
      "getElevator",
      "SELECT * FROM elevators WHERE id = ?",
      [id],
      (sql, params) => this.get(sql, params)
    );
    return row === undefined ? null : this.mapRowToElevator(row);
  }

  /**
   * @brief Get elevator logs, newest first
   * @param query - limit (capped at 1000), offset, and optional event type / elevator filters
   */
  async getLogs(query: LogQuery = {}): Promise<ElevatorLog[]> {
    const limit = Math.min(query.limit ?? 100, MAX_LOG_LIMIT);
    const offset = query.offset ?? 0;
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    if (query.eventType) {
      conditions.push("event_type = ?");
      params.push(query.eventType);
    }
    if (query.elevatorId !== undefined) {
      conditions.push("elevator_id = ?");
      params.push(query.elevatorId);
    }

    let sql = "SELECT * FROM elevator_logs";
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(" AND ")}`;
    }
    sql += " ORDER BY id DESC LIMIT ? OFFSET ?";
    params.push(limit, offset);

    const rows = await this.tracked("getLogs", sql, params, (text, values) => this.all(text, values));
    return rows.map((row) => this.mapRowToElevatorLog(row));
  }

  /**
   * @brief Get query logs, newest first
   */
  async getQueryLogs(limit: number = 100): Promise<QueryLog[]> {
    const rows = await this.all(
      "SELECT * FROM query_logs ORDER BY id DESC LIMIT ?",
      [Math.min(limit, MAX_LOG_LIMIT)]
    );
    return rows.map((row) => this.mapRowToQueryLog(row));
  }

  /**
   * @brief Run a statement and record it in query_logs, with its duration and any error
   */
  private async tracked<T>(
    source: string,
    sql: string,
    params: SqlParam[],
    execute: (sql: string, params: SqlParam[]) => Promise<T>
  ): Promise<T> {
    const started = performance.now();
    try {
      const result = await execute(sql, params);
      await this.logQuery(sql, params, source, performance.now() - started, null);
      return result;
    } catch (error) {
      await this.logQuery(sql, params, source, performance.now() - started, errorMessage(error));
      throw new DatabaseError(errorMessage(error));
    }
  }

  /**
   * @brief Log a query
   * @description A failure to log is reported but does not fail the tracked statement
   */
  async logQuery(
    query: string,
    parameters: SqlParam[],
    source: string,
    executionTimeMs: number = 0,
    error: string | null = null
  ): Promise<void> {
    const text = query.trim().replace(/\s+/g, " ");
    try {
      await this.run(
        `
      INSERT INTO query_logs (query, parameters, operation, source, execution_time_ms, error, executed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `,
        [
          text,
          parameters.length > 0 ? JSON.stringify(parameters) : null,
          text.split(" ")[0].toUpperCase(),
          source,
          executionTimeMs,
          error,
          new Date().toISOString(),
        ]
      );
    } catch (logError) {
      this.log.error("Failed to log query", { source, error: errorMessage(logError) });
    }
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (error: Error | null) => (error ? reject(error) : resolve()));
    });
  }

  private run(sql: string, params: SqlParam[] = []): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, (error: Error | null) => (error ? reject(error) : resolve()));
    });
  }

  private get(sql: string, params: SqlParam[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (error: Error | null, row: unknown) =>
        error ? reject(error) : resolve(row)
      );
    });
  }

  private all(sql: string, params: SqlParam[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (error: Error | null, rows: unknown[]) =>
        error ? reject(error) : resolve(rows)
      );
    });
  }

  /**
   * @brief Map a row to an elevator
   */
  private mapRowToElevator(raw: unknown): Elevator {
    const row = elevatorRow.parse(raw);
    return {
      id: row.id,
      currentFloor: row.current_floor,
      state: row.state,
      direction: row.direction,
      destinationFloor: row.destination_floor,
      tripsCompleted: row.trips_completed,
      maintenanceMode: Boolean(row.maintenance_mode),
      lastUpdated: row.last_updated,
    };
  }

  /**
   * @brief Map a row to an elevator log
   */
  private mapRowToElevatorLog(raw: unknown): ElevatorLog {
    const row = elevatorLogRow.parse(raw);
    return {
      id: row.id,
      elevatorId: row.elevator_id ?? undefined,
      eventType: row.event_type,
      details: row.details,
      source: row.source,
      severity: row.severity,
      timestamp: row.timestamp,
    };
  }

  /**
   * @brief Map a row to a query log
   */
  private mapRowToQueryLog(raw: unknown): QueryLog {
    const row = queryLogRow.parse(raw);
    return {
      id: row.id,
      query: row.query,
      parameters: row.parameters,
      operation: row.operation,
      source: row.source,
      executionTimeMs: row.execution_time_ms,
      error: row.error,
      executedAt: row.executed_at,
    };
  }

  /**
   * @brief Close the database
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((error: Error | null) => (error ? reject(error) : resolve()));
    });
  }
}
