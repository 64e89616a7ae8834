import type { SessionRecord } from './schemas.js';

export type { SessionRecord, MessagePayload, ConversationMessage, ShellExecutionMessage } from './schemas.js';

export type ConversationRole = 'user' | 'assistant';

export type ExportMode = 'all' | 'branch';

export type ThinkingStyle = 'details' | 'omit';

/** Session-level facts taken from `type: "session"` records. */
export interface SessionMeta {
  sessionId: string;
  startedAt?: Date;
  cwd: string;
}

/**
 * Arena of records addressed by id. `order` keeps every id in arrival order,
 * duplicates included; `byId` holds the last record seen for each id.
 */
export interface RecordIndex {
  meta: SessionMeta;
  order: string[];
  byId: ReadonlyMap<string, SessionRecord>;
}

/** Content item classified by kind. */
export type ContentItem =
  | { kind: 'text'; text: string }
  | { kind: 'thinking'; thinking: string }
  | { kind: 'other'; type?: string };

export interface ExtractedContent {
  /** Text segments joined with a blank line, trimmed. */
  narration: string;
  /** One entry per non-blank thinking item, each trimmed. */
  reasoning: string[];
}

/** One or more consecutive same-role messages rendered under one heading. */
export interface Turn {
  kind: 'turn';
  role: ConversationRole;
  narration: string;
  reasoning: string[];
  firstTimestamp?: Date;
  lastTimestamp?: Date;
}

/** A shell command execution, rendered on its own. */
export interface ShellExecution {
  kind: 'shell';
  command?: string;
  output?: string;
  timestamp?: Date;
}

export type TranscriptBlock = Turn | ShellExecution;

export interface FormatOptions {
  thinkingStyle: ThinkingStyle;
  includeBash: boolean;
  includeTimestamps: boolean;
  groupTurns: boolean;
}

export interface ExportOptions extends FormatOptions {
  /** Shown in the title (basename) and the metadata block (as given). */
  sourcePath: string;
  mode: ExportMode;
  leafId?: string;
}
