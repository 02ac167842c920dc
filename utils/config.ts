import dotenv from 'dotenv';
import { z } from 'zod';
import type { BuildingConfig } from './types';
import type { LogLevel } from './logger';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NUM_FLOORS: z.coerce.number().int().min(2).default(10),
  NUM_ELEVATORS: z.coerce.number().int().min(1).default(5),
  FLOOR_MOVE_TIME: z.coerce.number().min(0).default(5),
  DOOR_TIME: z.coerce.number().min(0).default(2),
  IDEMPOTENCY_TTL_SECONDS: z.coerce.number().min(0).default(600),
  DB_PATH: z.string().min(1).default('./Database/Elevator.db'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  port: number;
  dbPath: string;
  logLevel: LogLevel;
  building: BuildingConfig;
}

/**
 * @brief Read the application configuration from the environment
 * @param env - Defaults to process.env after loading .env
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    dbPath: vars.DB_PATH,
    logLevel: vars.LOG_LEVEL,
    building: {
      totalFloors: vars.NUM_FLOORS,
      totalElevators: vars.NUM_ELEVATORS,
      floorMoveTime: vars.FLOOR_MOVE_TIME,
      doorOpenCloseTime: vars.DOOR_TIME,
      idempotencyTtl: vars.IDEMPOTENCY_TTL_SECONDS,
    },
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
