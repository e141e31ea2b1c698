export type MessageRole = "system" | "assistant" | "user";

/** Caller-supplied roles pass through unvalidated, so `role` takes any string. */
export interface ChatMessage {
  role: MessageRole | (string & {});
  content: string;
}

/** A partial or terminal unit produced by a completion stream. */
export type StreamEvent =
  | { type: "data"; content: string }
  | { type: "error"; reason: string }
  | { type: "end" };

/** One NDJSON line written to the outbound response. */
export type RelayLine =
  | { role: "assistant"; content: string }
  | { error: string };
