/**
 * Turn grouping over a linear record sequence.
 *
 * Grouping is a two-state machine: `idle`, or `accumulating` a turn for one
 * role. A message of the same role extends the turn; any other role flushes
 * it and starts a new one. Shell executions flush and stand alone.
 */
import type { ConversationRole, FormatOptions, SessionRecord, ShellExecution, TranscriptBlock, Turn } from '../types/index.js';
import { readMessage, recordTimestamp } from '../types/schemas.js';
import { extractContent } from './content.js';
import { parseTimestamp } from './timestamps.js';

type GroupingState = { status: 'idle' } | { status: 'accumulating'; turn: Turn };

interface QualifiedMessage {
  role: ConversationRole;
  narration: string;
  reasoning: string[];
  timestamp?: Date;
}

/** Narration and reasoning of a user/assistant message, or undefined if it would render empty. */
function qualify(role: ConversationRole, content: unknown, timestamp?: Date): QualifiedMessage | undefined {
  const { narration, reasoning } = extractContent(content);
  if (role === 'user') {
    return narration ? { role, narration, reasoning: [], timestamp } : undefined;
  }
  return narration || reasoning.length > 0 ? { role, narration, reasoning, timestamp } : undefined;
}

function startTurn(message: QualifiedMessage): Turn {
  return {
    kind: 'turn',
    role: message.role,
    narration: message.narration,
    reasoning: [...message.reasoning],
    firstTimestamp: message.timestamp,
    lastTimestamp: message.timestamp,
  };
}

function extendTurn(turn: Turn, message: QualifiedMessage): void {
  if (message.narration) {
    turn.narration = turn.narration ? `${turn.narration}\n\n${message.narration}` : message.narration;
  }
  turn.reasoning.push(...message.reasoning);
  if (message.timestamp) {
    turn.firstTimestamp ??= message.timestamp;
    turn.lastTimestamp = message.timestamp;
  }
}

function isRenderable(turn: Turn): boolean {
  if (turn.role === 'user') return turn.narration.length > 0;
  return turn.narration.length > 0 || turn.reasoning.length > 0;
}

function toShellExecution(command: string | undefined, output: string | undefined, timestamp?: Date): ShellExecution {
  return {
    kind: 'shell',
    command: command?.trim() ? command.trimEnd() : undefined,
    output: output?.trim() ? output.replace(/\n+$/, '') : undefined,
    timestamp,
  };
}

/**
 * Turn records into renderable blocks, in input order.
 *
 * Records that are not messages, messages with roles other than user,
 * assistant and bashExecution, and messages with nothing to show are skipped
 * without affecting grouping.
 */
export function groupTurns(records: Iterable<SessionRecord>, options: Pick<FormatOptions, 'groupTurns' | 'includeBash'>): TranscriptBlock[] {
  const blocks: TranscriptBlock[] = [];
  let state: GroupingState = { status: 'idle' };

  const flush = (): void => {
    if (state.status === 'accumulating' && isRenderable(state.turn)) {
      blocks.push(state.turn);
    }
    state = { status: 'idle' };
  };

  for (const record of records) {
    const message = readMessage(record);
    if (!message) continue;

    const timestamp = parseTimestamp(recordTimestamp(record));

    if (message.role === 'bashExecution') {
      if (!options.includeBash) continue;
      flush();
      blocks.push(toShellExecution(message.command, message.output, timestamp));
      continue;
    }

    const qualified = qualify(message.role, message.content, timestamp);
    if (!qualified) continue;

    if (!options.groupTurns) {
      flush();
      blocks.push(startTurn(qualified));
      continue;
    }

    if (state.status === 'accumulating' && state.turn.role === qualified.role) {
      extendTurn(state.turn, qualified);
    } else {
      flush();
      state = { status: 'accumulating', turn: startTurn(qualified) };
    }
  }

  flush();
  return blocks;
}
