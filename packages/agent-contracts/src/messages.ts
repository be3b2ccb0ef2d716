/**
 * @module @itinera/agent-contracts/messages
 * Agent-to-agent message types.
 *
 * Messages are immutable once created. Only the bus tracks acknowledgement,
 * and it only ever flips from `false` to `true`.
 */

/**
 * Agent name used as a mailbox address.
 */
export type AgentName = string;

export type MessageType =
  | 'SecurityAlert'
  | 'WeatherAdvisory'
  | 'BudgetUpdate'
  | 'TravelBlocked'
  | 'Custom';

export type MessagePriority = 'low' | 'normal' | 'high' | 'critical';

/**
 * Free-form fields a sender may attach without changing the payload shape.
 */
export type PayloadExtensions = Record<string, unknown>;

export interface SecurityAlertPayload {
  riskLevel: 'low' | 'medium' | 'high' | 'critical';
  findings: string[];
  extensions?: PayloadExtensions;
}

export interface WeatherAdvisoryPayload {
  location: string;
  severity: 'info' | 'warning' | 'severe';
  warnings: string[];
  extensions?: PayloadExtensions;
}

export interface BudgetUpdatePayload {
  budget: number;
  currency: string;
  /** Spending money per traveler per day, in the destination currency */
  dailyAllowance?: number;
  note?: string;
  extensions?: PayloadExtensions;
}

export interface TravelBlockedPayload {
  destination: string;
  advisoryLevel: number;
  reason: string;
  extensions?: PayloadExtensions;
}

export interface CustomPayload {
  kind: string;
  data: Record<string, unknown>;
  extensions?: PayloadExtensions;
}

/**
 * Payload shape for every message type.
 */
export interface MessagePayloads {
  SecurityAlert: SecurityAlertPayload;
  WeatherAdvisory: WeatherAdvisoryPayload;
  BudgetUpdate: BudgetUpdatePayload;
  TravelBlocked: TravelBlockedPayload;
  Custom: CustomPayload;
}

interface MessageBase {
  readonly id: string;
  readonly from: AgentName;
  readonly to: AgentName;
  readonly priority: MessagePriority;
  /** ISO timestamp */
  readonly createdAt: string;
  readonly acknowledged: boolean;
  /** Run/session the message belongs to */
  readonly correlationId?: string;
}

/**
 * Message shape per type.
 */
export type MessageMap = {
  [K in MessageType]: MessageBase & { readonly type: K; readonly payload: Readonly<MessagePayloads[K]> };
};

/**
 * Message discriminated by `type`.
 */
export type Message = MessageMap[MessageType];

export type MessageOf<K extends MessageType> = MessageMap[K];

/**
 * Everything a sender provides; the bus factory fills in the rest.
 */
export type MessageDraft = {
  [K in MessageType]: {
    from: AgentName;
    to: AgentName;
    type: K;
    payload: MessagePayloads[K];
    priority?: MessagePriority;
    correlationId?: string;
  };
}[MessageType];

export type MessageFilter = (message: Message) => boolean;

/**
 * Outcome of a message handler.
 */
export type HandlerResult = Record<string, unknown> | void;

export type MessageHandler<K extends MessageType = MessageType> = (
  message: MessageOf<K>,
) => HandlerResult | Promise<HandlerResult>;

/**
 * Per-message record returned by `processMessages`.
 */
export type ProcessedMessage =
  | { messageId: string; type: MessageType; status: 'processed'; result: HandlerResult }
  | { messageId: string; type: MessageType; status: 'error'; error: string };

export interface ReceiveOptions {
  filter?: MessageFilter;
  /** Mark returned messages acknowledged (drain) */
  acknowledge?: boolean;
}

/**
 * Mailbox capability handed to workers.
 */
export interface IMessageBus {
  send(message: Message): void;
  receive(agent: AgentName, options?: ReceiveOptions): Message[];
  acknowledge(agent: AgentName, messageId: string): boolean;
  registerHandler<K extends MessageType>(agent: AgentName, type: K, handler: MessageHandler<K>): () => void;
  processMessages(agent: AgentName, filter?: MessageFilter): Promise<ProcessedMessage[]>;
}
