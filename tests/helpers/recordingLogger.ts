import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger for tests that need to observe structured entries without writing
 * anything. It subclasses {@link StructuredLogger} so it can be passed
 * wherever the production logger is expected.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    super({ logFile: null, sink: null, minLevel: "debug" });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push(payload === undefined ? { level, message } : { level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }
}
