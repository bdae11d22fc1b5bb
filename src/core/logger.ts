import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type LoggerDefaults = {
  command?: string;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

/**
 * Appends one JSON object per line. Each line carries `ts`, `type`, the logger
 * defaults and the event payload.
 */
export class JsonlLogger {
  private ensuredDir = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: LoggerDefaults = {},
    private readonly now: () => Date = () => new Date(),
  ) {}

  log(event: LogEvent): void {
    if (!this.ensuredDir) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensuredDir = true;
    }

    const line: JsonObject = { ts: this.now().toISOString(), type: event.type };
    if (this.defaults.command) {
      line.command = this.defaults.command;
    }
    if (event.payload) {
      line.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

export function logQaEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log({ type, payload });
}
