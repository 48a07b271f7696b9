import { createLedger, deliverReplies, handleMessage, type MessageRelay } from '@spendwise/core';
import { requireSession, classifyOptions } from '../workspace/session.js';
import { JsonFileExpenseStore } from '../store/json-file.js';
import { ConsoleRelay } from '../relay/console.js';
import { fail, warn } from '../utils/console.js';
import type { ChatOptions } from '../types.js';

/**
 * Handle one message the way a chat channel would: detect the intent,
 * record or query, and send the replies through the relay.
 */
export async function chat(
    text: string,
    options: ChatOptions,
    now: Date = new Date(),
    relay: MessageRelay = new ConsoleRelay()
): Promise<void> {
    if (!text.trim()) {
        fail('Message text is required.');
        process.exit(1);
    }

    const session = requireSession(options);
    const ledger = createLedger(new JsonFileExpenseStore(session.ledgerPath), {
        categorizer: classifyOptions(session),
    });

    const reply = await handleMessage(
        ledger,
        { sender: options.sender, text },
        { today: now, currency: session.settings.currency }
    );

    for (const w of reply.warnings) {
        warn(w);
    }
    for (const w of await deliverReplies(relay, reply.replies)) {
        warn(w);
    }
}
