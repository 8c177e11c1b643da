import { appendText } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

/**
 * Console logging plus, once a run directory exists, a timestamped copy of
 * every line in `suite.log`. File writes are chained so lines keep their order.
 */
export class RunLogger {
  private filePath: string | null = null;
  private pending: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(
    private readonly prefix = "[harness]",
    private readonly sink: LogSink | null = console
  ) {}

  attach(filePath: string): void {
    this.filePath = filePath;
  }

  info(message: string): void {
    this.sink?.log(`${this.prefix} ${message}`);
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.sink?.error(`${this.prefix} WARN ${message}`);
    this.write("WARN", message);
  }

  error(message: string): void {
    this.sink?.error(`${this.prefix} ERROR ${message}`);
    this.write("ERROR", message);
  }

  /** Written to suite.log only. */
  detail(message: string): void {
    this.write("INFO", message);
  }

  /** Waits for queued file writes; rethrows the first one that failed. */
  async flush(): Promise<void> {
    await this.pending;
    if (this.failure !== null) throw this.failure;
  }

  private write(level: string, message: string): void {
    const filePath = this.filePath;
    if (!filePath) return;
    const line = `${nowUtcIsoSeconds()} ${level.padEnd(5)} ${message}\n`;
    this.pending = this.pending
      .then(() => appendText(filePath, line))
      .catch((error: unknown) => {
        if (this.failure === null) this.failure = error;
      });
  }
}

export function silentLogger(): RunLogger {
  return new RunLogger("[harness]", null);
}
