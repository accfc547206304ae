/**
 * Transport-neutral chat types. The Telegram adapter translates to and from
 * these; the interaction shell and its middleware only ever see these.
 */

export interface ActionButton {
  label: string;
  /** Encoded action token, round-tripped through the callback channel */
  token: string;
}

export interface OutgoingMessage {
  text: string;
  markdown?: boolean;
  disablePreview?: boolean;
  /** Rows of inline action buttons */
  actions?: ActionButton[][];
}

export interface ChatResponder {
  reply(message: OutgoingMessage): Promise<void>;
  /** Replace the message the callback originated from */
  edit(message: OutgoingMessage): Promise<void>;
  /** Acknowledge a callback query, optionally with a short notice */
  answer(text?: string): Promise<void>;
}

export interface CommandRequest {
  kind: 'command';
  userId: number;
  command: string;
  args: string[];
  responder: ChatResponder;
}

export interface CallbackRequest {
  kind: 'callback';
  userId: number;
  data: string;
  responder: ChatResponder;
}

export type ChatRequest = CommandRequest | CallbackRequest;

export type HandlerResult =
  | { status: 'ok' }
  | { status: 'denied' }
  | { status: 'error'; error: Error };

export type ChatHandler = (request: ChatRequest) => Promise<HandlerResult>;

export type ChatMiddleware = (request: ChatRequest, next: ChatHandler) => Promise<HandlerResult>;
