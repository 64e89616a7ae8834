import { describe, expect, it } from 'vitest';
import { LeafNotFoundError } from '../errors.js';
import { collectBranchChain, resolveLeafId, selectBranch } from '../parsers/branch.js';
import { buildRecordIndex } from '../parsers/session-index.js';
import type { SessionRecord } from '../types/index.js';

function index(records: SessionRecord[]) {
  return buildRecordIndex(records);
}

describe('resolveLeafId', () => {
  const records: SessionRecord[] = [
    { type: 'session', id: 'S1' },
    { type: 'message', id: 'm1', parentId: 'S1' },
    { type: 'message', id: 'm2', parentId: 'm1' },
    { type: 'label', id: 'l1', parentId: 'm2' },
  ];

  it('should prefer the most recent message record', () => {
    expect(resolveLeafId(index(records))).toBe('m2');
  });

  it('should accept an explicit leaf that exists', () => {
    expect(resolveLeafId(index(records), 'm1')).toBe('m1');
  });

  it('should reject an explicit leaf that does not exist', () => {
    expect(resolveLeafId(index(records), 'nope')).toBeUndefined();
  });

  it('should fall back to the last id when there are no message records', () => {
    const idx = index([
      { type: 'session', id: 'S1' },
      { type: 'label', id: 'l1' },
      { type: 'label', id: 'l2' },
    ]);
    expect(resolveLeafId(idx)).toBe('l2');
  });

  it('should return undefined for an empty index', () => {
    expect(resolveLeafId(index([]))).toBeUndefined();
  });
});

describe('collectBranchChain', () => {
  it('should walk parents back to the root and return oldest first', () => {
    const idx = index([
      { type: 'message', id: 'a' },
      { type: 'message', id: 'b', parentId: 'a' },
      { type: 'message', id: 'x', parentId: 'a' },
      { type: 'message', id: 'c', parentId: 'b' },
    ]);
    expect(collectBranchChain('c', idx.byId)).toEqual(['a', 'b', 'c']);
    expect(collectBranchChain('x', idx.byId)).toEqual(['a', 'x']);
  });

  it('should stop at a parent cycle and visit each id once', () => {
    const idx = index([
      { type: 'message', id: 'A', parentId: 'B' },
      { type: 'message', id: 'B', parentId: 'A' },
    ]);
    expect(collectBranchChain('A', idx.byId)).toEqual(['B', 'A']);
  });

  it('should stop at a self-referencing record', () => {
    const idx = index([{ type: 'message', id: 'A', parentId: 'A' }]);
    expect(collectBranchChain('A', idx.byId)).toEqual(['A']);
  });

  it('should keep an unknown parent id as the chain root', () => {
    const idx = index([{ type: 'message', id: 'b', parentId: 'gone' }]);
    expect(collectBranchChain('b', idx.byId)).toEqual(['gone', 'b']);
  });
});

describe('selectBranch', () => {
  it('should return the chain records and resolved leaf', () => {
    const a = { type: 'message', id: 'a' };
    const b = { type: 'message', id: 'b', parentId: 'a' };
    const side = { type: 'message', id: 's', parentId: 'a' };
    const selection = selectBranch(index([a, b, side]), 'b');

    expect(selection.leafId).toBe('b');
    expect(selection.records).toEqual([a, b]);
  });

  it('should skip chain ids that have no record', () => {
    const b = { type: 'message', id: 'b', parentId: 'gone' };
    expect(selectBranch(index([b])).records).toEqual([b]);
  });

  it('should throw LeafNotFoundError for an unknown leaf', () => {
    expect(() => selectBranch(index([{ type: 'message', id: 'a' }]), 'zzz')).toThrow('Leaf id not found: zzz');
  });

  it('should throw LeafNotFoundError for an empty input', () => {
    expect(() => selectBranch(index([]))).toThrow(LeafNotFoundError);
  });
});
