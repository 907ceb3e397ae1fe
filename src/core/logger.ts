import path from "node:path";

import fse from "fs-extra";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type GeneratorEventType = "generate.start" | "generate.complete" | "generate.failed";

// Appends one JSON object per line. Writes are synchronous so events keep call order.
export class JsonlLogger {
  readonly filePath: string;
  private readonly base: JsonObject;

  constructor(filePath: string, base: JsonObject = {}) {
    this.filePath = path.resolve(filePath);
    this.base = base;
    fse.ensureDirSync(path.dirname(this.filePath));
  }

  log(event: JsonObject): void {
    fse.appendFileSync(this.filePath, `${JSON.stringify({ ...this.base, ...event })}\n`, "utf8");
  }
}

export function logGeneratorEvent(
  logger: JsonlLogger | undefined,
  type: GeneratorEventType,
  payload: JsonObject = {},
): void {
  logger?.log({ ts: new Date().toISOString(), type, ...payload });
}
