import type { TaskRecord } from '../utils/types';

interface RunningTask {
  record: TaskRecord;
  done: Promise<TaskRecord>;
}

const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * @brief Tracks movement executions for status polling
 * @description A task is in the running set from registration until it is terminal.
 * Terminal outcomes go to a bounded history, oldest first out.
 */
export class TaskRegistry {
  private running: Map<string, RunningTask> = new Map();
  private history: Map<string, TaskRecord> = new Map();
  private sequence = 0;

  constructor(private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT) {}

  nextTaskId(elevatorId: number): string {
    this.sequence++;
    return `task-${elevatorId}-${Date.now()}-${this.sequence}`;
  }

  register(taskId: string, elevatorId: number): TaskRecord {
    const record: TaskRecord = {
      taskId,
      elevatorId,
      status: 'running',
      startedAt: new Date().toISOString(),
    };
    this.running.set(taskId, { record, done: Promise.resolve(record) });
    return record;
  }

  /**
   * @brief Attach the execution promise of a registered task
   */
  track(taskId: string, done: Promise<TaskRecord>): void {
    const task = this.running.get(taskId);
    if (task) {
      task.done = done;
    }
  }

  /**
   * @brief Undo a registration made in a reservation that was rolled back
   */
  discard(taskId: string): void {
    this.running.delete(taskId);
  }

  complete(taskId: string): TaskRecord {
    return this.finish(taskId, { status: 'completed' });
  }

  fail(taskId: string, reason: string): TaskRecord {
    return this.finish(taskId, { status: 'failed', reason });
  }

  /**
   * @brief Current record for a task
   * @description Ids never registered, or pruned from history, read as completed.
   */
  get(taskId: string): TaskRecord {
    const running = this.running.get(taskId);
    if (running) {
      return { ...running.record };
    }
    const finished = this.history.get(taskId);
    if (finished) {
      return { ...finished };
    }
    return { taskId, elevatorId: null, status: 'completed' };
  }

  /**
   * @brief Resolves with the terminal record of a task
   */
  wait(taskId: string): Promise<TaskRecord> {
    const running = this.running.get(taskId);
    return running ? running.done : Promise.resolve(this.get(taskId));
  }

  waitForAll(): Promise<TaskRecord[]> {
    return Promise.all([...this.running.values()].map((task) => task.done));
  }

  hasActiveTaskFor(elevatorId: number): boolean {
    for (const task of this.running.values()) {
      if (task.record.elevatorId === elevatorId) {
        return true;
      }
    }
    return false;
  }

  get activeCount(): number {
    return this.running.size;
  }

  private finish(taskId: string, outcome: Pick<TaskRecord, 'status' | 'reason'>): TaskRecord {
    const task = this.running.get(taskId);
    const record: TaskRecord = {
      ...(task ? task.record : { taskId, elevatorId: null }),
      ...outcome,
      finishedAt: new Date().toISOString(),
    };

    this.running.delete(taskId);
    this.history.set(taskId, record);
    while (this.history.size > this.historyLimit) {
      const oldest = this.history.keys().next();
      if (oldest.done) {
        break;
      }
      this.history.delete(oldest.value);
    }
    return record;
  }
}
