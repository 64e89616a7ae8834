import type { SessionRecord } from '../types/index.js';

let counter = 0;

/** Build a `type: "message"` record. */
export function message(
  role: string,
  content: unknown,
  extra: { id?: string; parentId?: string; timestamp?: string } = {},
): SessionRecord {
  counter++;
  return {
    type: 'message',
    id: extra.id ?? `auto-${counter}`,
    ...(extra.parentId ? { parentId: extra.parentId } : {}),
    ...(extra.timestamp ? { timestamp: extra.timestamp } : {}),
    message: { role, content },
  };
}

export function shell(command: string, output: string, extra: { id?: string; timestamp?: string } = {}): SessionRecord {
  counter++;
  return {
    type: 'message',
    id: extra.id ?? `auto-${counter}`,
    ...(extra.timestamp ? { timestamp: extra.timestamp } : {}),
    message: { role: 'bashExecution', command, output },
  };
}

export function lines(...parts: string[]): string {
  return parts.join('\n');
}
