/**
 * Markdown rendering for exported transcripts.
 */
import * as path from 'path';
import type { ExportOptions, FormatOptions, SessionMeta, ShellExecution, TranscriptBlock, Turn } from '../types/index.js';
import { formatTimestamp, sameInstant } from './timestamps.js';

// ── Building blocks ─────────────────────────────────────────────────────────

/**
 * Quote every line. Blank lines become a bare `>` so paragraph breaks stay
 * inside the quote.
 */
export function blockquote(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => (line.trim() === '' ? '>' : `> ${line}`))
    .join('\n');
}

function timestampLine(first?: Date, last?: Date): string | undefined {
  if (!first) return undefined;
  if (last && !sameInstant(first, last)) {
    return `_timestamps: ${formatTimestamp(first)} … ${formatTimestamp(last)}_`;
  }
  return `_timestamp: ${formatTimestamp(first)}_`;
}

/**
 * All reasoning segments of one turn in a single collapsible section. Each
 * segment is its own quote; segments are separated by a truly empty line.
 */
export function renderThinkingDetails(segments: string[]): string {
  const quotes = segments.filter((s) => s.trim()).map((s) => blockquote(s.trimEnd()));
  if (quotes.length === 0) return '';
  return ['<details>', '<summary>thinking</summary>', '', quotes.join('\n\n'), '', '</details>'].join('\n');
}

// ── Blocks ──────────────────────────────────────────────────────────────────

export function renderTurn(turn: Turn, options: Pick<FormatOptions, 'thinkingStyle' | 'includeTimestamps'>): string {
  const lines: string[] = [`### ${turn.role === 'user' ? 'USER' : 'ASSISTANT'}`, ''];

  if (options.includeTimestamps) {
    const ts = timestampLine(turn.firstTimestamp, turn.lastTimestamp);
    if (ts) lines.push(ts, '');
  }

  const reasoning = turn.role === 'assistant' ? turn.reasoning.filter((s) => s.trim()) : [];
  const narration = turn.narration.trimEnd();

  if (narration) {
    lines.push(narration);
  } else if (reasoning.length === 0) {
    lines.push('(no content)');
  }

  if (reasoning.length > 0 && options.thinkingStyle === 'details') {
    if (narration) lines.push('');
    lines.push(renderThinkingDetails(reasoning));
  }

  return lines.join('\n').trimEnd();
}

export function renderShellExecution(exec: ShellExecution, options: Pick<FormatOptions, 'includeTimestamps'>): string {
  const lines: string[] = ['### SYSTEM (bashExecution)', ''];

  if (options.includeTimestamps) {
    const ts = timestampLine(exec.timestamp);
    if (ts) lines.push(ts, '');
  }
  if (exec.command) {
    lines.push('Command:', '```bash', exec.command, '```', '');
  }
  if (exec.output) {
    lines.push('Output:', '```text', exec.output, '```', '');
  }

  return lines.join('\n').trimEnd();
}

export function renderBlock(block: TranscriptBlock, options: FormatOptions): string {
  return block.kind === 'turn' ? renderTurn(block, options) : renderShellExecution(block, options);
}

// ── Document ────────────────────────────────────────────────────────────────

export interface DocumentHeader {
  meta: SessionMeta;
  options: ExportOptions;
  /** Resolved leaf id in branch mode. */
  leafId?: string;
}

export function renderHeader({ meta, options, leafId }: DocumentHeader): string {
  const lines: string[] = [`# Session transcript — ${path.basename(options.sourcePath)}`, ''];

  if (meta.sessionId) lines.push(`- id: \`${meta.sessionId}\``);
  if (meta.startedAt) lines.push(`- started: \`${formatTimestamp(meta.startedAt)}\``);
  if (meta.cwd) lines.push(`- cwd: \`${meta.cwd}\``);
  lines.push(`- source: \`${options.sourcePath}\``);
  lines.push(`- mode: \`${options.mode}\``);
  if (options.mode === 'branch' && leafId) lines.push(`- leaf: \`${leafId}\``);
  lines.push(`- thinking: \`${options.thinkingStyle}\``);
  lines.push(`- group_turns: \`${options.groupTurns ? 'on' : 'off'}\``);
  if (options.includeTimestamps) lines.push('- timestamps: `on`');

  lines.push('', '---');
  return lines.join('\n');
}

/** Header, then each block followed by one blank line; ends with a single newline. */
export function renderDocument(header: DocumentHeader, blocks: TranscriptBlock[]): string {
  const out: string[] = [renderHeader(header), ''];
  for (const block of blocks) {
    out.push(renderBlock(block, header.options), '');
  }
  return out.join('\n').trimEnd() + '\n';
}
