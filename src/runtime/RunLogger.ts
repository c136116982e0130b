import { promises as fs } from "node:fs";
import path from "node:path";
import { hasErrorCode } from "./DocgapErrors.js";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(logDir: string, runId: string) {
    this.logDir = path.resolve(logDir);
    this.runId = runId;
    this.logPath = path.join(this.logDir, `${runId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    // appends are chained so events land in call order
    const write = this.pending.then(async () => {
      await fs.mkdir(this.logDir, { recursive: true });
      await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
    });
    this.pending = write.catch(() => undefined);
    await write;
  }

  async readEvents(): Promise<RunLogEvent[]> {
    await this.pending;
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as RunLogEvent);
  }
}
