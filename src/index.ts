export * from "./runtime/DocgapErrors.js";
export { RunLogger, type RunLogEvent } from "./runtime/RunLogger.js";
export * from "./config/Config.js";
export { loadConfig, mergeConfigs, type ConfigSource, type LoadConfigOptions } from "./config/ConfigLoader.js";
export * from "./source/SourceFile.js";
export { tokenize, type Token, type TokenType, type Position } from "./source/PythonTokenizer.js";
export {
  buildSourceModel,
  parseSource,
  type DefinitionKind,
  type DefinitionScope,
  type DefinitionSpan,
  type ParsedSource,
  type SourceModel,
  type TripleDelimiter,
} from "./source/SourceModel.js";
export * from "./scanner/GapScanner.js";
export { collectSources, type CollectOptions } from "./scanner/SourceCollector.js";
export * from "./scanner/ScanRunner.js";
export { renderDocstring, docstringContent, docstringTemplate, type RenderOptions } from "./patch/DocstringBlock.js";
export { AtomicWriter, type WriterFileSystem } from "./patch/AtomicWriter.js";
export { PatchEngine, planPatch, type AppliedPatch, type Patch, type PatchResult } from "./patch/PatchEngine.js";
export * from "./session/SessionTypes.js";
export { SessionController, type SessionControllerOptions } from "./session/SessionController.js";
export { render, renderFailures, renderJson, summarize, type ReportFailure } from "./report/Reporter.js";
export { OpenAiCompatibleProvider } from "./providers/OpenAiCompatibleProvider.js";
export type { Provider, ProviderConfig, ProviderRequest, ProviderResponse } from "./providers/ProviderTypes.js";
export { LlmSuggestionProvider, extractDocstring } from "./suggestion/LlmSuggestionProvider.js";
export { ExternalEditor } from "./editor/ExternalEditor.js";
export { InlineEditor, type LineIO } from "./editor/InlineEditor.js";
export { ScanCommand } from "./cli/ScanCommand.js";
