export { convertRecords, exportSession, generateMarkdown } from './commands/export.js';
export type { ExportResult, ExportSessionOptions } from './commands/export.js';
export { analyzeSession, inspectSession, renderInspection } from './commands/inspect.js';
export type { SessionInspection } from './commands/inspect.js';
export { applyCliFlags, getPreset, loadConfig, parseUserConfig, resolveBaseConfig } from './config/index.js';
export type { CliFormatFlags, ExportConfig, PresetName, ResolvedExportSettings } from './config/index.js';
export { ConfigFileError, InvalidModeError, LeafNotFoundError, MalformedRecordError, SessionExportError } from './errors.js';
export { logger, setLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export { collectBranchChain, resolveLeafId, selectBranch } from './parsers/branch.js';
export type { BranchSelection } from './parsers/branch.js';
export { buildRecordIndex } from './parsers/session-index.js';
export type * from './types/index.js';
export { parseJsonlLines, readJsonlFile } from './utils/jsonl.js';
export { classifyContentItem, extractContent } from './utils/content.js';
export { blockquote, renderDocument, renderShellExecution, renderThinkingDetails, renderTurn } from './utils/markdown.js';
export { formatTimestamp, parseTimestamp } from './utils/timestamps.js';
export { groupTurns } from './utils/turns.js';
