/**
 * `session-md export <input>` — the conversion pipeline:
 * records → index → (branch) chain → turns → Markdown.
 */
import * as fs from 'fs';
import * as path from 'path';
import { ExportModeSchema } from '../config/index.js';
import { InvalidModeError } from '../errors.js';
import { logger } from '../logger.js';
import { selectBranch } from '../parsers/branch.js';
import { buildRecordIndex } from '../parsers/session-index.js';
import type { ExportOptions, SessionRecord, TranscriptBlock } from '../types/index.js';
import { readJsonlFile } from '../utils/jsonl.js';
import { renderDocument } from '../utils/markdown.js';
import { groupTurns } from '../utils/turns.js';

export const STDOUT = '-';

export interface ExportResult {
  markdown: string;
  blocks: TranscriptBlock[];
  /** Records parsed from the input. */
  recordsRead: number;
  /** Records left after mode selection; equals recordsRead in `all` mode. */
  selectedRecords: number;
  leafId?: string;
}

/** Convert parsed records to Markdown. Throws InvalidModeError or LeafNotFoundError. */
export function convertRecords(records: SessionRecord[], options: ExportOptions): ExportResult {
  const mode = ExportModeSchema.safeParse(options.mode);
  if (!mode.success) {
    throw new InvalidModeError(options.mode);
  }

  const index = buildRecordIndex(records);

  let selected = records;
  let leafId: string | undefined;
  if (mode.data === 'branch') {
    const branch = selectBranch(index, options.leafId);
    selected = branch.records;
    leafId = branch.leafId;
  }

  const blocks = groupTurns(selected, options);
  const markdown = renderDocument({ meta: index.meta, options, leafId }, blocks);

  return { markdown, blocks, recordsRead: records.length, selectedRecords: selected.length, leafId };
}

export function generateMarkdown(records: SessionRecord[], options: ExportOptions): string {
  return convertRecords(records, options).markdown;
}

export interface ExportSessionOptions extends Omit<ExportOptions, 'sourcePath'> {
  input: string;
  /** Destination path, or `-` for stdout. */
  output: string;
}

/**
 * Read `input`, convert it, and write the result. Nothing is written unless
 * the whole document was produced.
 */
export function exportSession(opts: ExportSessionOptions): ExportResult {
  const { input, output, ...formatting } = opts;
  const records = readJsonlFile(input);
  const result = convertRecords(records, { ...formatting, sourcePath: input });

  if (output === STDOUT) {
    process.stdout.write(result.markdown);
  } else {
    fs.mkdirSync(path.dirname(path.resolve(output)), { recursive: true });
    fs.writeFileSync(output, result.markdown, 'utf8');
    logger.info('Wrote %d blocks to %s', result.blocks.length, output);
  }

  return result;
}
