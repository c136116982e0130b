import type { DocstringEditor, EditRequest } from "../session/SessionTypes.js";

/** Line-oriented terminal access; `ask` resolves undefined once input has ended. */
export interface LineIO {
  ask(prompt: string): Promise<string | undefined>;
  print(text: string): void;
}

/**
 * Collects a docstring typed at the terminal, ending at the first blank line.
 * Entering nothing keeps the preloaded text.
 */
export class InlineEditor implements DocstringEditor {
  constructor(private io: LineIO) {}

  async edit(request: EditRequest): Promise<string> {
    this.io.print(request.title);
    if (request.initial.trim()) {
      this.io.print("Current text (enter replacement lines, then a blank line; a blank line alone keeps it):");
      for (const line of request.initial.split("\n")) {
        this.io.print(`  | ${line}`);
      }
    } else {
      this.io.print("Enter the docstring, then a blank line:");
    }
    const lines: string[] = [];
    while (true) {
      const line = await this.io.ask("> ");
      if (line === undefined || line.trim() === "") break;
      lines.push(line);
    }
    return lines.length > 0 ? lines.join("\n") : request.initial;
  }
}
