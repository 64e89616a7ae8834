import type { ContentItem, ExtractedContent } from '../types/index.js';
import { KnownContentItemSchema } from '../types/schemas.js';

/** Classify one raw content item. Unknown kinds and malformed items become `other`. */
export function classifyContentItem(raw: unknown): ContentItem {
  const result = KnownContentItemSchema.safeParse(raw);
  if (!result.success) {
    const type = typeof raw === 'object' && raw !== null && 'type' in raw ? raw.type : undefined;
    return { kind: 'other', type: typeof type === 'string' ? type : undefined };
  }

  const item = result.data;
  switch (item.type) {
    case 'text':
      return { kind: 'text', text: typeof item.text === 'string' ? item.text : '' };
    case 'thinking':
      return { kind: 'thinking', thinking: typeof item.thinking === 'string' ? item.thinking : '' };
  }
}

/**
 * Split a message `content` payload into narration and reasoning.
 *
 * A plain string is narration. An array contributes its `text` items to
 * narration (joined by a blank line) and each `thinking` item as its own
 * reasoning segment. Tool calls, images and other kinds are skipped.
 */
export function extractContent(content: unknown): ExtractedContent {
  if (typeof content === 'string') {
    return { narration: content.trim(), reasoning: [] };
  }
  if (!Array.isArray(content)) {
    return { narration: '', reasoning: [] };
  }

  const textParts: string[] = [];
  const reasoning: string[] = [];

  for (const raw of content) {
    const item = classifyContentItem(raw);
    switch (item.kind) {
      case 'text': {
        const text = item.text.trim();
        if (text) textParts.push(text);
        break;
      }
      case 'thinking': {
        const thinking = item.thinking.trim();
        if (thinking) reasoning.push(thinking);
        break;
      }
      case 'other':
        break;
    }
  }

  return { narration: textParts.join('\n\n').trim(), reasoning };
}
