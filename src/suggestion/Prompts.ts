import type { SuggestionRequest } from "../session/SessionTypes.js";

export const DOCSTRING_SYSTEM_PROMPT = [
  "ROLE: Python documentation assistant",
  "TASK: Write a concise PEP 257 docstring for the definition marked TARGET.",
  "CONSTRAINTS:",
  "- Match the tone and format of docstrings already present in the surrounding source.",
  "- Start with a one-line summary in the imperative mood.",
  "- Describe parameters, return value and raised exceptions only when they are not obvious.",
  "- Do not repeat the signature or restate type annotations.",
  "OUTPUT FORMAT:",
  "- Output ONLY the docstring text, without triple quotes and without markdown fences.",
].join("\n");

export const buildSuggestionPrompt = (request: SuggestionRequest): string =>
  [
    `FILE: ${request.displayPath}`,
    `TARGET: ${request.kind} ${request.qualifiedName}`,
    "SIGNATURE:",
    request.signature,
    "SOURCE:",
    "```python",
    request.context,
    "```",
  ].join("\n");
