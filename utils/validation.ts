import { z } from 'zod';
import { ValidationError } from './errors';

// Numbers or numeric strings only
const floor = z
  .union(
    [z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'must be a number')],
    { errorMap: () => ({ message: 'must be a number' }) }
  )
  .pipe(z.coerce.number().finite());

export const callRequestSchema = z.object({
  fromFloor: floor,
  toFloor: floor,
  requestedBy: z.string().trim().min(1).max(255).optional(),
});

export const idempotencyKeySchema = z.string().trim().min(1).max(255);

export const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
  eventType: z.string().min(1).optional(),
});

export const queryLogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const maintenanceSchema = z.object({
  enabled: z.boolean(),
});

export const elevatorIdSchema = z.coerce.number().int().min(1);

/**
 * @brief Parse a value, turning schema failures into a 400 ValidationError
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(problems);
  }
  return result.data;
}
