/**
 * MessageBus: in-memory mailboxes for agent-to-agent notifications.
 *
 * One queue per recipient, created on first use. Messages are never
 * removed; acknowledgement is tracked beside them and only goes
 * false → true. There is no global instance: construct one per
 * orchestrator (or per test) and inject it.
 *
 * `processMessages` runs registered handlers over pending messages.
 * Calls for the same agent are serialised with a KeyedMutex so two
 * concurrent drains never handle a message twice.
 */

import type {
  AgentName,
  HandlerResult,
  ILogger,
  IMessageBus,
  Message,
  MessageFilter,
  MessageHandler,
  MessageMap,
  MessageType,
  ProcessedMessage,
  ReceiveOptions,
} from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import { createNoopLogger } from '@itinera/agent-sdk';
import { KeyedMutex } from './keyed-mutex.js';

export { createMessage } from '@itinera/agent-sdk';

type Envelope = { message: Message; acknowledged: boolean };

/** Handler bound to one message type; other types pass through untouched */
type BoundHandler = (message: Message) => HandlerResult | Promise<HandlerResult>;

type HandlerTable = Map<MessageType, BoundHandler>;

export type BusListener = (message: Message) => void;

export interface MessageBusOptions {
  logger?: ILogger;
}

export class MessageBus implements IMessageBus {
  private readonly queues = new Map<AgentName, Envelope[]>();
  private readonly handlers = new Map<AgentName, HandlerTable>();
  private readonly listeners = new Set<BusListener>();
  private readonly mutex = new KeyedMutex();
  private readonly logger: ILogger;

  constructor(options: MessageBusOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
  }

  send(message: Message): void {
    this.queueFor(message.to).push({ message, acknowledged: false });
    this.logger.debug(`[bus] ${message.from} → ${message.to}: ${message.type}`, {
      id: message.id,
      priority: message.priority,
    });

    for (const listener of this.listeners) {
      try {
        listener(message);
      } catch (error) {
        this.logger.error(`[bus] Listener error: ${errorMessage(error)}`);
      }
    }
  }

  receive(agent: AgentName, options: ReceiveOptions = {}): Message[] {
    const matches = this.pending(agent, options.filter);
    if (options.acknowledge) {
      for (const envelope of matches) {
        envelope.acknowledged = true;
      }
    }
    return matches.map((envelope) => this.view(envelope));
  }

  acknowledge(agent: AgentName, messageId: string): boolean {
    const envelope = this.queues.get(agent)?.find((e) => e.message.id === messageId);
    if (!envelope || envelope.acknowledged) {
      return false;
    }
    envelope.acknowledged = true;
    return true;
  }

  registerHandler<K extends MessageType>(agent: AgentName, type: K, handler: MessageHandler<K>): () => void {
    const table = this.tableFor(agent);
    if (table.has(type)) {
      this.logger.debug(`[bus] Replacing ${type} handler on ${agent}`);
    }
    const bound: BoundHandler = (message) => (isMessageOf(message, type) ? handler(message) : undefined);
    table.set(type, bound);

    return () => {
      if (table.get(type) === bound) {
        table.delete(type);
      }
    };
  }

  /**
   * Run handlers for every pending message matching `filter`.
   * Handled messages (success or error) are acknowledged; messages of a
   * type with no handler stay pending.
   */
  async processMessages(agent: AgentName, filter?: MessageFilter): Promise<ProcessedMessage[]> {
    return this.mutex.runExclusive(agent, async () => {
      const table = this.tableFor(agent);
      const results: ProcessedMessage[] = [];

      for (const envelope of this.pending(agent, filter)) {
        const message = envelope.message;
        const handler = table.get(message.type);
        if (!handler) {
          continue;
        }

        envelope.acknowledged = true;
        try {
          const result = await handler(message);
          results.push({ messageId: message.id, type: message.type, status: 'processed', result });
        } catch (error) {
          const reason = errorMessage(error);
          this.logger.warn(`[bus] Handler for ${message.type} on ${agent} failed: ${reason}`, { id: message.id });
          results.push({ messageId: message.id, type: message.type, status: 'error', error: reason });
        }
      }

      return results;
    });
  }

  /** Every message ever delivered to `agent`, acknowledged or not */
  history(agent: AgentName): Message[] {
    return (this.queues.get(agent) ?? []).map((envelope) => this.view(envelope));
  }

  pendingCount(agent: AgentName): number {
    return this.pending(agent).length;
  }

  /** Observe every sent message */
  subscribe(listener: BusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private queueFor(agent: AgentName): Envelope[] {
    let queue = this.queues.get(agent);
    if (!queue) {
      queue = [];
      this.queues.set(agent, queue);
    }
    return queue;
  }

  private tableFor(agent: AgentName): HandlerTable {
    let table = this.handlers.get(agent);
    if (!table) {
      table = new Map();
      this.handlers.set(agent, table);
    }
    return table;
  }

  private pending(agent: AgentName, filter?: MessageFilter): Envelope[] {
    return (this.queues.get(agent) ?? []).filter(
      (envelope) => !envelope.acknowledged && (!filter || filter(envelope.message)),
    );
  }

  /** Frozen copy carrying the current acknowledgement flag */
  private view(envelope: Envelope): Message {
    if (envelope.message.acknowledged === envelope.acknowledged) {
      return envelope.message;
    }
    return Object.freeze({ ...envelope.message, acknowledged: envelope.acknowledged });
  }
}

function isMessageOf<K extends MessageType>(message: Message, type: K): message is MessageMap[K] {
  return message.type === type;
}
