import type { LineIO } from "../editor/InlineEditor.js";
import type { ProviderFailure } from "../runtime/DocgapErrors.js";
import { gapLine } from "../scanner/GapScanner.js";
import type {
  FailedChoice,
  FixSource,
  GapView,
  PendingChoice,
  ReviewChoice,
  SessionPrompter,
} from "../session/SessionTypes.js";

interface MenuOption<T> {
  key: string;
  label: string;
  value: T;
}

const RULE = "=".repeat(72);

const indentBlock = (text: string, prefix = "    "): string[] => text.split("\n").map((line) => `${prefix}${line}`);

export const formatMenu = <T>(options: MenuOption<T>[]): string =>
  `${options.map((option) => option.label).join(" / ")} > `;

export class TerminalPrompter implements SessionPrompter {
  constructor(private io: LineIO) {}

  private async choose<T>(options: MenuOption<T>[], onEnd: T): Promise<T> {
    const prompt = formatMenu(options);
    while (true) {
      const answer = await this.io.ask(prompt);
      if (answer === undefined) return onEnd;
      const key = answer.trim().toLowerCase().charAt(0);
      const match = options.find((option) => option.key === key);
      if (match) return match.value;
      this.io.print(`Please enter one of: ${options.map((option) => option.key).join(", ")}.`);
    }
  }

  private header(view: GapView): void {
    this.io.print("");
    this.io.print(RULE);
    this.io.print(`[${view.index}/${view.total}] ${view.displayPath}:${gapLine(view.gap)}: ${view.gap.span.qualifiedName}`);
    this.io.print("");
    for (const line of indentBlock(view.preview)) this.io.print(line);
    this.io.print("");
  }

  async choosePending(view: GapView, options: { canSuggest: boolean }): Promise<PendingChoice> {
    this.header(view);
    const menu: MenuOption<PendingChoice>[] = [{ key: "m", label: "(m)anual", value: "manual" }];
    if (options.canSuggest) menu.push({ key: "g", label: "(g)enerate", value: "suggest" });
    menu.push({ key: "s", label: "(s)kip", value: "skip" }, { key: "q", label: "(q)uit", value: "quit" });
    return this.choose(menu, "quit");
  }

  async chooseReview(_view: GapView, candidate: FixSource): Promise<ReviewChoice> {
    if (candidate.kind === "llm_suggestion") {
      this.io.print(candidate.model ? `Suggested docstring (${candidate.model}):` : "Suggested docstring:");
    } else {
      this.io.print("Docstring:");
    }
    for (const line of indentBlock(candidate.text)) this.io.print(line);
    this.io.print("");
    const menu: MenuOption<ReviewChoice>[] = [
      { key: "a", label: "(a)ccept", value: "accept" },
      { key: "e", label: "(e)dit", value: "edit" },
    ];
    if (candidate.kind === "llm_suggestion") menu.push({ key: "r", label: "(r)egenerate", value: "regenerate" });
    menu.push({ key: "s", label: "(s)kip", value: "reject" }, { key: "q", label: "(q)uit", value: "quit" });
    return this.choose(menu, "quit");
  }

  async chooseFailed(_view: GapView, error: ProviderFailure): Promise<FailedChoice> {
    this.io.print(error.timedOut ? `Suggestion timed out: ${error.message}` : `Suggestion failed: ${error.message}`);
    return this.choose<FailedChoice>(
      [
        { key: "r", label: "(r)etry", value: "retry" },
        { key: "m", label: "(m)anual", value: "manual" },
        { key: "g", label: "(g)ive up", value: "give_up" },
        { key: "q", label: "(q)uit", value: "quit" },
      ],
      "quit",
    );
  }

  notify(message: string): void {
    this.io.print(message);
  }
}
