import * as fs from 'fs';
import { MalformedRecordError } from '../errors.js';
import { logger } from '../logger.js';
import { type SessionRecord, SessionRecordSchema } from '../types/schemas.js';

/**
 * Parse JSONL text into records, in file order.
 *
 * Blank lines are skipped. A line that is not JSON aborts with its 1-based
 * line number; a line that is JSON but not an object is skipped.
 */
export function parseJsonlLines(text: string): SessionRecord[] {
  const records: SessionRecord[] = [];
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    if (!line.trim()) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new MalformedRecordError(i + 1, err instanceof Error ? err.message : String(err));
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      logger.debug('jsonl: skipping non-object value on line', i + 1);
      continue;
    }
    records.push(result.data);
  }

  return records;
}

/** Read a whole JSONL file into memory and parse it. */
export function readJsonlFile(filePath: string): SessionRecord[] {
  const content = fs.readFileSync(filePath, 'utf8');
  const records = parseJsonlLines(content);
  logger.debug('jsonl: read %d records from %s', records.length, filePath);
  return records;
}
