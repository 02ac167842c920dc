import { Router } from 'express';
import type { ElevatorController } from '../controllers/ElevatorController';

/**
 * @brief Create elevator routes
 * @param elevatorController - The elevator controller instance
 * @returns The router
 */
export function createElevatorRoutes(elevatorController: ElevatorController): Router {
  const router = Router();

  // Call elevator
  router.post('/call', (req, res) => elevatorController.callElevator(req, res));

  // Fleet status
  router.get('/status', (req, res) => elevatorController.getStatus(req, res));

  // Task progress
  router.get('/tasks/:taskId', (req, res) => elevatorController.getTask(req, res));

  // Event logs
  router.get('/logs{/:elevatorId}', (req, res) => elevatorController.getLogs(req, res));

  // Query logs
  router.get('/query-logs', (req, res) => elevatorController.getQueryLogs(req, res));

  router.get('/config', (req, res) => elevatorController.getConfig(req, res));

  router.put('/:elevatorId/maintenance', (req, res) => elevatorController.setMaintenance(req, res));

  return router;
}
