/**
 * Zod schemas for session JSONL records.
 *
 * Records are deliberately loose: only the fields this tool reads are typed,
 * and each is read only when it has the expected primitive type. Everything
 * else passes through untouched.
 */
import { z } from 'zod';

/** Any JSON object line. Non-object lines are not records. */
export const SessionRecordSchema = z.record(z.string(), z.unknown());

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

const optionalString = z.string().optional().catch(undefined);

const ConversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.unknown(),
});

const ShellExecutionMessageSchema = z.object({
  role: z.literal('bashExecution'),
  command: optionalString,
  output: optionalString,
});

export const MessagePayloadSchema = z.discriminatedUnion('role', [
  ConversationMessageSchema,
  ShellExecutionMessageSchema,
]);

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;
export type ShellExecutionMessage = z.infer<typeof ShellExecutionMessageSchema>;
export type MessagePayload = z.infer<typeof MessagePayloadSchema>;

const TextItemSchema = z.object({
  type: z.literal('text'),
  text: z.unknown(),
});

const ThinkingItemSchema = z.object({
  type: z.literal('thinking'),
  thinking: z.unknown(),
});

export const KnownContentItemSchema = z.discriminatedUnion('type', [TextItemSchema, ThinkingItemSchema]);

// ── Field accessors ─────────────────────────────────────────────────────────

function stringField(record: SessionRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function recordType(record: SessionRecord): string | undefined {
  return stringField(record, 'type');
}

/** Non-empty string id, or undefined. */
export function recordId(record: SessionRecord): string | undefined {
  return stringField(record, 'id') || undefined;
}

/** Non-empty string parent id, or undefined. */
export function recordParentId(record: SessionRecord): string | undefined {
  return stringField(record, 'parentId') || undefined;
}

export function recordTimestamp(record: SessionRecord): string | undefined {
  return stringField(record, 'timestamp');
}

export function recordCwd(record: SessionRecord): string | undefined {
  return stringField(record, 'cwd');
}

/**
 * The message payload of a `type: "message"` record, or undefined for other
 * record types, missing payloads and roles this tool does not render.
 */
export function readMessage(record: SessionRecord): MessagePayload | undefined {
  if (recordType(record) !== 'message') return undefined;
  const result = MessagePayloadSchema.safeParse(record.message);
  return result.success ? result.data : undefined;
}
