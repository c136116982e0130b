import { docstringContent } from "../patch/DocstringBlock.js";
import type { Provider } from "../providers/ProviderTypes.js";
import { describeError, ProviderFailure } from "../runtime/DocgapErrors.js";
import type { Suggestion, SuggestionProvider, SuggestionRequest } from "../session/SessionTypes.js";
import { buildSuggestionPrompt, DOCSTRING_SYSTEM_PROMPT } from "./Prompts.js";

export interface LlmSuggestionProviderOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const stripCodeFences = (input: string): string => {
  const match = input.match(/```(?:python|py|text)?[^\S\n]*\n?([\s\S]*?)```/i);
  if (match) {
    return (match[1] ?? "").trim();
  }
  return input.trim();
};

const DEFINITION_PATTERN = /^\s*(?:@|(?:async\s+)?def\s|class\s)/;
const EMBEDDED_LITERAL = /[rRuU]?("""|''')[\s\S]*?\1/;
const QUOTED_LINE = /^(["'])([^"'\n][^\n]*)\1$/;

/** Pulls the docstring out of a model reply: fences, quotes and an echoed definition are removed. */
export const extractDocstring = (raw: string): string => {
  let text = stripCodeFences(raw);
  if (DEFINITION_PATTERN.test(text)) {
    const literal = EMBEDDED_LITERAL.exec(text);
    if (literal) text = literal[0];
  }
  const quoted = QUOTED_LINE.exec(text);
  if (quoted) text = quoted[2] ?? "";
  return docstringContent(text);
};

export class LlmSuggestionProvider implements SuggestionProvider {
  constructor(
    private provider: Provider,
    private options: LlmSuggestionProviderOptions = {},
  ) {}

  async suggest(request: SuggestionRequest): Promise<Suggestion> {
    let raw: string;
    try {
      const response = await this.provider.generate({
        messages: [
          { role: "system", content: DOCSTRING_SYSTEM_PROMPT },
          { role: "user", content: buildSuggestionPrompt(request) },
        ],
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        signal: request.signal,
      });
      raw = response.message.content;
    } catch (error) {
      if (error instanceof ProviderFailure) throw error;
      throw new ProviderFailure(`${this.provider.name} request failed: ${describeError(error)}`, { cause: error });
    }
    const text = extractDocstring(raw);
    if (!text) {
      throw new ProviderFailure(`${this.provider.name} returned no docstring text.`);
    }
    return { text, raw, model: this.options.model };
  }
}
