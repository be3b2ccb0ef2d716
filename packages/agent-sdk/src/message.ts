/**
 * Message factory. Every message on a bus is built here.
 */

import { randomUUID } from 'node:crypto';
import type { Message, MessageDraft } from '@itinera/agent-contracts';
import { MessageError } from '@itinera/agent-contracts';

/**
 * Assigns id and timestamp, checks `from !== to`, freezes.
 *
 * @throws MessageError when sender and recipient are the same agent
 */
export function createMessage(draft: MessageDraft): Message {
  if (draft.from === draft.to) {
    throw new MessageError(`Agent "${draft.from}" cannot message itself`, { from: draft.from, type: draft.type });
  }
  if (!draft.from || !draft.to) {
    throw new MessageError('Message needs both a sender and a recipient', { from: draft.from, to: draft.to });
  }

  const copy = structuredClone(draft);
  Object.freeze(copy.payload);

  return Object.freeze({
    ...copy,
    id: randomUUID(),
    priority: copy.priority ?? 'normal',
    createdAt: new Date().toISOString(),
    acknowledged: false,
  });
}
