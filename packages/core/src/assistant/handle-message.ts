/**
 * Dialogue orchestration: one inbound message in, reply messages out.
 *
 * Storage and amount failures become fixed user-facing texts; internal
 * error messages never reach the sender. Anything else propagates.
 */

import { extractAmount, resolveExpenseDate, buildQueryFilter } from '../hints/index.js';
import { formatQueryResponse, formatRecordConfirmation } from '../ledger/format.js';
import type { Ledger } from '../ledger/ledger.js';
import { StorageError, TransportError, errorMessage } from '../errors.js';
import { detectIntent } from './intent.js';
import type {
    AssistantOptions,
    AssistantReply,
    InboundMessage,
    MessageRelay,
    OutboundMessage,
} from './types.js';

export const AMOUNT_NOT_FOUND_MESSAGE =
    "❗ I couldn't detect an expense amount. Please include one in your message.";
export const RECORD_FAILED_MESSAGE = '❗ There was an error recording your expense.';
export const QUERY_FAILED_MESSAGE = '❗ There was an error retrieving your expenses.';

export async function handleMessage(
    ledger: Ledger,
    message: InboundMessage,
    options: AssistantOptions
): Promise<AssistantReply> {
    const intent = detectIntent(message.text);
    const reply = (text: string): OutboundMessage => ({ recipient: message.sender, text });

    if (intent === 'query_expense') {
        const filter = buildQueryFilter(message.text, options.today);
        try {
            const result = await ledger.query(filter);
            return {
                intent,
                replies: [reply(formatQueryResponse(filter, result, { currency: options.currency }))],
                warnings: [],
                filter,
                result,
            };
        } catch (err) {
            if (err instanceof StorageError) {
                return { intent, replies: [reply(QUERY_FAILED_MESSAGE)], warnings: [err.message], filter };
            }
            throw err;
        }
    }

    const amount = extractAmount(message.text, message.entities?.amount);
    if (!amount) {
        return {
            intent,
            replies: [reply(AMOUNT_NOT_FOUND_MESSAGE)],
            warnings: [`No amount in message from ${message.sender}`],
        };
    }

    try {
        const { record, warnings } = await ledger.record({
            description: message.text,
            amount,
            rawText: message.text,
            date: resolveExpenseDate(message.text, options.today),
        });
        return {
            intent,
            replies: [reply(formatRecordConfirmation(record, { currency: options.currency }))],
            warnings,
            record,
        };
    } catch (err) {
        if (err instanceof StorageError) {
            return { intent, replies: [reply(RECORD_FAILED_MESSAGE)], warnings: [err.message] };
        }
        throw err;
    }
}

/**
 * Send replies through a relay.
 * A failed delivery is dropped; its TransportError message is returned as a warning.
 */
export async function deliverReplies(
    relay: MessageRelay,
    replies: readonly OutboundMessage[]
): Promise<string[]> {
    const warnings: string[] = [];

    for (const outbound of replies) {
        try {
            await relay.send(outbound);
        } catch (err) {
            const failure = new TransportError(
                `Failed to deliver reply to ${outbound.recipient}: ${errorMessage(err)}`,
                { cause: err }
            );
            warnings.push(failure.message);
        }
    }

    return warnings;
}
