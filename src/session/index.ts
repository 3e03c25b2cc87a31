/**
 * Session Module
 */

export { ConversationStore, DEFAULT_MAX_HISTORY, type Turn, type TurnRole } from './store.js';
