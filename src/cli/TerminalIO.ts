import { createInterface, type Interface } from "node:readline";
import process from "node:process";
import type { LineIO } from "../editor/InlineEditor.js";

/** Lets another program own the terminal for a while. */
export interface TerminalControl {
  pause(): void;
  resume(): void;
}

/**
 * One readline interface for the whole session. Lines that arrive before they
 * are asked for are queued, so piped answers are not lost. Once input ends or
 * Ctrl+C is pressed every `ask` resolves undefined.
 */
export class TerminalIO implements LineIO, TerminalControl {
  private rl?: Interface;
  private queued: string[] = [];
  private waiting?: (line: string | undefined) => void;
  private closed = false;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stderr,
  ) {}

  private open(): Interface {
    if (this.rl) return this.rl;
    const rl = createInterface({ input: this.input, output: this.output });
    rl.on("line", (line) => this.deliver(line));
    rl.on("close", () => {
      this.closed = true;
      this.deliver(undefined);
    });
    rl.on("SIGINT", () => rl.close());
    this.rl = rl;
    return rl;
  }

  private deliver(line: string | undefined): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting(line);
    } else if (line !== undefined) {
      this.queued.push(line);
    }
  }

  async ask(prompt: string): Promise<string | undefined> {
    const rl = this.open();
    if (!this.closed) {
      rl.setPrompt(prompt);
      rl.prompt();
    }
    const next = this.queued.shift();
    if (next !== undefined) return next;
    if (this.closed) return undefined;
    return new Promise<string | undefined>((resolve) => {
      this.waiting = resolve;
    });
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  pause(): void {
    if (!this.closed) this.rl?.pause();
  }

  resume(): void {
    if (!this.closed) this.rl?.resume();
  }

  close(): void {
    this.rl?.close();
  }
}
