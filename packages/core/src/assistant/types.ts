import type { ExpenseRecord, QueryFilter, QueryResult } from '../types/index.js';

/**
 * Message received from a relay.
 * `entities.amount` is an amount already extracted upstream, if any.
 */
export interface InboundMessage {
    sender: string;
    text: string;
    entities?: {
        amount?: string | number;
    };
}

export interface OutboundMessage {
    recipient: string;
    text: string;
}

/**
 * Delivers outbound messages. Delivery is best effort.
 */
export interface MessageRelay {
    send(message: OutboundMessage): Promise<void>;
}

export type Intent = 'add_expense' | 'query_expense';

export interface AssistantOptions {
    today: Date;
    currency?: string;
}

/**
 * Outcome of handling one inbound message.
 */
export interface AssistantReply {
    intent: Intent;
    replies: OutboundMessage[];
    warnings: string[];
    record?: ExpenseRecord;
    filter?: QueryFilter;
    result?: QueryResult;
}
