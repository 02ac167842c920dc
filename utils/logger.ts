export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

/**
 * @brief Structured console logger
 * @description Writes one JSON line per entry, tagged with the component scope
 */
export class Logger {
  constructor(private readonly scope: string) {}

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  debug(message: string, meta?: LogMeta) {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return;
    }

    const line = JSON.stringify({
      level,
      scope: this.scope,
      message,
      ...meta,
      timestamp: new Date().toISOString(),
    });

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger('elevator-api');

/**
 * @brief Run a side effect without letting it fail the caller
 * @description Synchronous throws and rejections are both logged and dropped
 */
export function fireAndForget(log: Logger, label: string, work: () => Promise<void>): void {
  const report = (error: unknown) => {
    log.error(`${label} failed`, {
      error: error instanceof Error ? error.message : String(error),
    });
  };

  try {
    void work().catch(report);
  } catch (error) {
    report(error);
  }
}
