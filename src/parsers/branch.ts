/**
 * Branch reconstruction: pick a leaf and follow `parentId` links back to the
 * root, giving one linear conversation out of the record tree.
 */
import { LeafNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { RecordIndex, SessionRecord } from '../types/index.js';
import { recordParentId, recordType } from '../types/schemas.js';

/**
 * Resolve the leaf to walk back from.
 *
 * An explicit id must exist in the index. Without one, the most recent
 * `message` record wins, then the last id of any kind. Returns undefined when
 * nothing qualifies.
 */
export function resolveLeafId(index: Pick<RecordIndex, 'order' | 'byId'>, leafId?: string): string | undefined {
  if (leafId) {
    return index.byId.has(leafId) ? leafId : undefined;
  }

  for (let i = index.order.length - 1; i >= 0; i--) {
    const id = index.order[i];
    const record = index.byId.get(id);
    if (record && recordType(record) === 'message') return id;
  }

  return index.order.length > 0 ? index.order[index.order.length - 1] : undefined;
}

/** Ids from root to `leafId`. Stops at a missing parent or at the first repeated id. */
export function collectBranchChain(leafId: string, byId: RecordIndex['byId']): string[] {
  const chain: string[] = [];
  const seen = new Set<string>();

  let current: string | undefined = leafId;
  while (current !== undefined) {
    if (seen.has(current)) {
      logger.debug('branch: parent cycle detected at %s', current);
      break;
    }
    seen.add(current);
    chain.push(current);

    const record = byId.get(current);
    if (!record) break;
    current = recordParentId(record);
  }

  return chain.reverse();
}

export interface BranchSelection {
  leafId: string;
  records: SessionRecord[];
}

/** Resolve the leaf and return the chain's records, oldest first. Throws LeafNotFoundError. */
export function selectBranch(index: RecordIndex, leafId?: string): BranchSelection {
  const leaf = resolveLeafId(index, leafId);
  if (leaf === undefined) {
    throw new LeafNotFoundError(leafId);
  }

  const records: SessionRecord[] = [];
  for (const id of collectBranchChain(leaf, index.byId)) {
    const record = index.byId.get(id);
    if (record) records.push(record);
  }

  logger.debug('branch: leaf %s, %d records in chain', leaf, records.length);
  return { leafId: leaf, records };
}
