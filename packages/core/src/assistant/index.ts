/**
 * Assistant module: intent routing and relay plumbing around the ledger.
 */

export {
    handleMessage,
    deliverReplies,
    AMOUNT_NOT_FOUND_MESSAGE,
    RECORD_FAILED_MESSAGE,
    QUERY_FAILED_MESSAGE,
} from './handle-message.js';
export { detectIntent } from './intent.js';
export type {
    InboundMessage,
    OutboundMessage,
    MessageRelay,
    Intent,
    AssistantOptions,
    AssistantReply,
} from './types.js';
