export { MailboxBoard } from './mailbox-board.js';
export type { ReadonlyBoard } from './mailbox-board.js';
