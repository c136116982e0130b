import { spawn } from "node:child_process";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { IOFailure } from "../runtime/DocgapErrors.js";
import type { DocstringEditor, EditRequest } from "../session/SessionTypes.js";

export type EditorExit = { launched: true; exitCode: number | null } | { launched: false; error: Error };

/** Runs an editor command line on a file and waits for it to exit. */
export type EditorLauncher = (command: string, filePath: string) => Promise<EditorExit>;

export interface ExternalEditorOptions {
  command: string;
  launcher?: EditorLauncher;
  /** Used when the command cannot be started at all. */
  fallback?: DocstringEditor;
  onWarning?: (message: string) => void;
  tmpDir?: string;
  /** Paused while the editor runs so it gets the terminal's input to itself. */
  terminal?: { pause(): void; resume(): void };
}

const HEADER_HINT = "# Lines starting with '#' at the top are ignored. Save and close to continue.";

const quoteArg = (value: string): string =>
  process.platform === "win32" ? `"${value.replace(/"/g, '""')}"` : `'${value.replace(/'/g, "'\\''")}'`;

export const launchInShell: EditorLauncher = (command, filePath) =>
  new Promise<EditorExit>((resolve) => {
    const child = spawn(`${command} ${quoteArg(filePath)}`, { shell: true, stdio: "inherit" });
    child.once("error", (error) => resolve({ launched: false, error }));
    child.once("exit", (exitCode) => {
      // sh reports an unknown command as 127
      if (exitCode === 127) resolve({ launched: false, error: new Error("command not found") });
      else resolve({ launched: true, exitCode });
    });
  });

export const stripEditorHeader = (content: string): string => {
  const lines = content.replace(/\r\n|\r/g, "\n").split("\n");
  let start = 0;
  while (start < lines.length && (lines[start] ?? "").startsWith("#")) start += 1;
  return lines.slice(start).join("\n").replace(/\n+$/, "");
};

export class ExternalEditor implements DocstringEditor {
  private launcher: EditorLauncher;

  constructor(private options: ExternalEditorOptions) {
    this.launcher = options.launcher ?? launchInShell;
  }

  async edit(request: EditRequest): Promise<string> {
    const dir = await fs.mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), "docgap-edit-"));
    const filePath = path.join(dir, "DOCSTRING.py");
    try {
      await fs.writeFile(filePath, [`# ${request.title}`, HEADER_HINT, request.initial, ""].join("\n"), "utf8");
      this.options.terminal?.pause();
      let exit: EditorExit;
      try {
        exit = await this.launcher(this.options.command, filePath);
      } finally {
        this.options.terminal?.resume();
      }
      if (!exit.launched) {
        if (!this.options.fallback) throw new IOFailure(filePath, `launch editor "${this.options.command}" for`, exit.error);
        this.options.onWarning?.(`Could not start editor "${this.options.command}": ${exit.error.message}`);
        return await this.options.fallback.edit(request);
      }
      if (exit.exitCode !== 0) {
        this.options.onWarning?.(`Editor exited with status ${exit.exitCode ?? "unknown"}; keeping the saved text.`);
      }
      const content = await fs.readFile(filePath, "utf8");
      return stripEditorHeader(content);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
