import type { MessageRelay, OutboundMessage } from '@spendwise/core';
import { arrow, log } from '../utils/console.js';

/**
 * Relay that prints replies to the terminal instead of a messaging channel.
 */
export class ConsoleRelay implements MessageRelay {
    async send(message: OutboundMessage): Promise<void> {
        arrow(`To ${message.recipient}:`);
        log(message.text);
    }
}
