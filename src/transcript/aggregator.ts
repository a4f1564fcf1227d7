import { formatAction } from './actions.js';
import { debug } from '../utils/logger.js';
import type {
  ClassifiedEntry,
  ConversationEntry,
  MessageEntry,
} from './types.js';

export type AggregatorState =
  | { name: 'idle' }
  | { name: 'collecting'; actions: string[] };

function toConversationEntry(entry: MessageEntry): ConversationEntry {
  return { type: entry.kind, timestamp: entry.timestamp, content: entry.text };
}

/**
 * Collapses runs of tool invocations into one `tool_summary` entry.
 *
 * States:
 *  - `idle`: nothing buffered.
 *  - `collecting`: one or more formatted actions buffered.
 *
 * A user or assistant entry flushes the buffer ahead of itself, so a
 * summary always sits right after the turn that triggered its tools.
 * `finish()` flushes whatever is still buffered at end of stream.
 * Tool results and `other` entries neither buffer nor flush.
 */
export class ActionAggregator {
  private state: AggregatorState = { name: 'idle' };
  private seenMessage = false;

  get current(): AggregatorState['name'] {
    return this.state.name;
  }

  accept(entry: ClassifiedEntry): ConversationEntry[] {
    switch (entry.kind) {
      case 'tool_invocation': {
        if (!this.seenMessage) {
          debug(`Dropping ${entry.toolName} call made before any message`);
          return [];
        }
        const action = formatAction(entry.toolName, entry.input);
        if (this.state.name === 'collecting') {
          this.state.actions.push(action);
        } else {
          this.state = { name: 'collecting', actions: [action] };
        }
        return [];
      }
      case 'user':
      case 'assistant': {
        const emitted = this.flush();
        this.seenMessage = true;
        emitted.push(toConversationEntry(entry));
        return emitted;
      }
      case 'tool_result':
      case 'other':
        return [];
    }
  }

  finish(): ConversationEntry[] {
    return this.flush();
  }

  private flush(): ConversationEntry[] {
    if (this.state.name === 'idle') return [];
    const { actions } = this.state;
    this.state = { name: 'idle' };
    return [{ type: 'tool_summary', actions }];
  }
}

export function aggregateEntries(
  entries: Iterable<ClassifiedEntry>,
): ConversationEntry[] {
  const aggregator = new ActionAggregator();
  const conversation: ConversationEntry[] = [];
  for (const entry of entries) {
    conversation.push(...aggregator.accept(entry));
  }
  conversation.push(...aggregator.finish());
  return conversation;
}
