import { logger } from '../logger.js';
import type { RecordIndex, SessionMeta, SessionRecord } from '../types/index.js';
import { recordCwd, recordId, recordTimestamp, recordType } from '../types/schemas.js';
import { parseTimestamp } from '../utils/timestamps.js';

/**
 * Index records by id in one pass and collect session metadata.
 *
 * Every `type: "session"` record refreshes the metadata fields it carries;
 * fields that are missing or not strings keep their previous value. A repeated
 * id overwrites the earlier record in `byId` but appears twice in `order`.
 */
export function buildRecordIndex(records: Iterable<SessionRecord>): RecordIndex {
  const meta: SessionMeta = { sessionId: '', cwd: '' };
  const order: string[] = [];
  const byId = new Map<string, SessionRecord>();

  for (const record of records) {
    if (recordType(record) === 'session') {
      const id = record.id;
      if (typeof id === 'string') meta.sessionId = id;

      meta.startedAt = parseTimestamp(recordTimestamp(record)) ?? meta.startedAt;

      const cwd = recordCwd(record);
      if (cwd !== undefined) meta.cwd = cwd;
    }

    const id = recordId(record);
    if (!id) continue;

    if (byId.has(id)) {
      logger.debug('index: id %s appears more than once, keeping the later record', id);
    }
    order.push(id);
    byId.set(id, record);
  }

  return { meta, order, byId };
}
