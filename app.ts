import cors from "cors";
import express from "express";
import type { Request, Response } from 'express';
import { createServer } from "http";
import { WebSocketServer } from "ws";
import { DatabaseManager } from "./Database/DatabaseManager";
import { Dispatcher } from "./services/Dispatcher";
import { createFleet } from "./services/ElevatorUnit";
import { BroadcastGateway } from "./services/BroadcastGateway";
import { WebSocketService } from "./services/WebSocketService";
import { createElevatorRoutes } from "./routes/ElevatorRoutes";
import { ElevatorController } from "./controllers/ElevatorController";
import { loadConfig } from "./utils/config";
import { logger, setLogLevel } from "./utils/logger";

const config = loadConfig();
setLogLevel(config.logLevel);

const app = express();

// Configure express
app.use(express.json());
app.use(cors());

// Create HTTP server
const server = createServer(app);

// Initialize WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });

// Initialize database
const db = new DatabaseManager(config.dbPath);
await db.initialize();

// Initialize services
const wsService = new WebSocketService(wss);
const gateway = new BroadcastGateway(db, wsService);
const dispatcher = new Dispatcher(createFleet(config.building, gateway), config.building, gateway);
const elevatorController = new ElevatorController(dispatcher, db);

app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Elevator Dispatch API",
        version: "1.0.0",
        endpoints: {
            "POST /api/elevator/call": "Call an elevator from one floor to another (Idempotency-Key header supported)",
            "GET /api/elevator/status": "Fleet status, active tasks, health and metrics",
            "GET /api/elevator/tasks/:taskId": "Progress of one assignment",
            "GET /api/elevator/logs/:elevatorId?": "Event logs (limit, offset, eventType)",
            "GET /api/elevator/query-logs": "SQL query logs",
            "PUT /api/elevator/:elevatorId/maintenance": "Take a unit in or out of maintenance",
            "GET /api/elevator/config": "Building configuration",
            "WS /ws": "Live elevator updates and events"
        }
    });
})

// Elevator API routes
app.use("/api/elevator", createElevatorRoutes(elevatorController));

// Start server
server.listen(config.port, () => {
    logger.info(`Elevator Server is running on port ${config.port}`);
    logger.info(`WebSocket available at ws://localhost:${config.port}/ws`);
})

let shuttingDown = false;

async function shutdown(signal: string) {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, closing server...`);

    server.close();
    await dispatcher.shutdown();
    wsService.closeAll();
    wss.close();
    await db.close();
    process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
            logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
            process.exit(1);
        });
    });
}
