/**
 * `session-md inspect <input>` — diagnostic command that runs the indexing
 * and branch pipeline and reports what the file contains and what an export
 * would keep.
 *
 * Designed for checking a session file before exporting it, e.g. to find a
 * leaf id for branch mode.
 */
import chalk from 'chalk';
import { resolveLeafId, selectBranch } from '../parsers/branch.js';
import { buildRecordIndex } from '../parsers/session-index.js';
import type { RecordIndex, SessionMeta, SessionRecord } from '../types/index.js';
import { readMessage, recordParentId, recordType } from '../types/schemas.js';
import { classifyContentItem } from '../utils/content.js';
import { readJsonlFile } from '../utils/jsonl.js';
import { formatTimestamp } from '../utils/timestamps.js';
import { groupTurns } from '../utils/turns.js';

// ── Analysis ────────────────────────────────────────────────────────────────

export interface SessionInspection {
  meta: SessionMeta;
  totalRecords: number;
  recordTypes: Map<string, number>;
  messageRoles: Map<string, number>;
  contentKinds: Map<string, number>;
  /** Ids that no record names as its parent, in arrival order. */
  leaves: string[];
  duplicateIds: number;
  /** Leaf the branch walk starts from; absent when the file has no message ids. */
  leafId?: string;
  chainLength: number;
  groupedBlocks: number;
  ungroupedBlocks: number;
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) || 0) + 1);
}

function findLeaves(index: RecordIndex): string[] {
  const parents = new Set<string>();
  for (const record of index.byId.values()) {
    const parent = recordParentId(record);
    if (parent) parents.add(parent);
  }
  return [...new Set(index.order)].filter((id) => !parents.has(id));
}

/** Summarize a parsed session. Throws LeafNotFoundError only for an explicit leaf that is not in the file. */
export function analyzeSession(records: SessionRecord[], opts: { leafId?: string; includeBash?: boolean } = {}): SessionInspection {
  const recordTypes = new Map<string, number>();
  const messageRoles = new Map<string, number>();
  const contentKinds = new Map<string, number>();

  for (const record of records) {
    increment(recordTypes, recordType(record) ?? 'unknown');

    const message = readMessage(record);
    if (!message) {
      if (recordType(record) === 'message') increment(messageRoles, 'other');
      continue;
    }
    increment(messageRoles, message.role);

    if (message.role !== 'bashExecution' && Array.isArray(message.content)) {
      for (const raw of message.content) {
        const item = classifyContentItem(raw);
        increment(contentKinds, item.kind === 'other' ? item.type ?? 'unknown' : item.kind);
      }
    } else if (message.role !== 'bashExecution' && typeof message.content === 'string') {
      increment(contentKinds, 'string');
    }
  }

  const index = buildRecordIndex(records);
  const branch = opts.leafId || resolveLeafId(index) ? selectBranch(index, opts.leafId) : undefined;
  const includeBash = opts.includeBash ?? false;

  return {
    meta: index.meta,
    totalRecords: records.length,
    recordTypes,
    messageRoles,
    contentKinds,
    leaves: findLeaves(index),
    duplicateIds: index.order.length - index.byId.size,
    leafId: branch?.leafId,
    chainLength: branch?.records.length ?? 0,
    groupedBlocks: groupTurns(records, { groupTurns: true, includeBash }).length,
    ungroupedBlocks: groupTurns(records, { groupTurns: false, includeBash }).length,
  };
}

// ── Output Rendering ────────────────────────────────────────────────────────

/** Right-pad a string to a given width. */
function pad(s: string, width: number): string {
  return s.length >= width ? s : s + ' '.repeat(width - s.length);
}

/** Right-align a number string to a given width. */
function rpad(n: number | string, width: number): string {
  const s = String(n);
  return s.length >= width ? s : ' '.repeat(width - s.length) + s;
}

/** Render a simple bar chart using unicode blocks. */
function bar(fraction: number, width = 30): string {
  const filled = Math.round(fraction * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function renderCounts(title: string, counts: Map<string, number>, total: number): string {
  const lines: string[] = [chalk.cyan.bold(title)];
  const sorted = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  if (sorted.length === 0) {
    lines.push('  (none)', '');
    return lines.join('\n');
  }

  const maxLabel = Math.max(...sorted.map(([k]) => k.length));
  for (const [label, count] of sorted) {
    const frac = total > 0 ? count / total : 0;
    lines.push(`  ${bar(frac)}  ${pad(label + ':', maxLabel + 1)} ${rpad(count, 6)}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function renderInspection(inspection: SessionInspection, source: string): string {
  const line = '═'.repeat(66);
  const { meta } = inspection;
  const output: string[] = ['', chalk.bold(line), chalk.bold(`  SESSION INSPECTION: ${source}`), chalk.bold(line), ''];

  output.push(chalk.cyan.bold('📂 Session'));
  output.push(`  id:       ${meta.sessionId || chalk.gray('(none)')}`);
  output.push(`  started:  ${meta.startedAt ? formatTimestamp(meta.startedAt) : chalk.gray('(unknown)')}`);
  output.push(`  cwd:      ${meta.cwd || chalk.gray('(unknown)')}`);
  output.push(`  records:  ${inspection.totalRecords}`);
  if (inspection.duplicateIds > 0) {
    output.push(`  ${chalk.yellow('!')} ${inspection.duplicateIds} repeated id(s); later records replace earlier ones`);
  }
  output.push('');

  output.push(renderCounts('📊 Record Types', inspection.recordTypes, inspection.totalRecords));
  const messageTotal = Array.from(inspection.messageRoles.values()).reduce((a, b) => a + b, 0);
  output.push(renderCounts('💬 Message Roles', inspection.messageRoles, messageTotal));
  const itemTotal = Array.from(inspection.contentKinds.values()).reduce((a, b) => a + b, 0);
  output.push(renderCounts('🧩 Content Items', inspection.contentKinds, itemTotal));

  output.push(chalk.cyan.bold(`🌿 Branches (${inspection.leaves.length} leaves)`));
  for (const leaf of inspection.leaves) {
    const marker = leaf === inspection.leafId ? chalk.green('→') : ' ';
    output.push(`  ${marker} ${leaf}`);
  }
  if (inspection.leafId) {
    output.push(`  Selected leaf: ${inspection.leafId} (${inspection.chainLength} records in chain)`);
  } else {
    output.push(`  Selected leaf: ${chalk.gray('(none)')}`);
  }
  output.push('');

  output.push(chalk.cyan.bold('📝 Export Preview (mode: all)'));
  output.push(`  Grouped turns:    ${rpad(inspection.groupedBlocks, 6)}`);
  output.push(`  Ungrouped turns:  ${rpad(inspection.ungroupedBlocks, 6)}`);
  output.push('');

  return output.join('\n');
}

// ── Main Entry Point ────────────────────────────────────────────────────────

/**
 * Inspect a session file and print diagnostics to stdout.
 *
 * @param opts.leafId - Leaf to resolve instead of the most recent message
 * @param opts.includeBash - Count shell executions as export blocks
 */
export function inspectSession(input: string, opts: { leafId?: string; includeBash?: boolean } = {}): SessionInspection {
  const records = readJsonlFile(input);
  const inspection = analyzeSession(records, opts);
  console.log(renderInspection(inspection, input));
  return inspection;
}
