import type { ChatMessage } from "../../types/chat";

export interface SessionPrompts {
  persona: string;
  welcomeMessage: string;
}

export interface AssembledSession {
  persona: ChatMessage;
  welcome: ChatMessage | null;
  requestMessages: ChatMessage[];
  allMessages: ChatMessage[];
}

/**
 * Builds the prompt for one request: persona, then the welcome when the
 * session is new, then the caller's messages in their original order.
 */
export function assembleSession(
  prompts: SessionPrompts,
  requestMessages: readonly ChatMessage[],
  newSession: boolean,
): AssembledSession {
  const persona: ChatMessage = {
    role: "system",
    content: prompts.persona,
  };
  const welcome: ChatMessage | null = newSession
    ? { role: "assistant", content: prompts.welcomeMessage }
    : null;

  const copied = requestMessages.map((message) => ({
    role: message.role,
    content: message.content,
  }));

  return {
    persona,
    welcome,
    requestMessages: copied,
    allMessages: welcome ? [persona, welcome, ...copied] : [persona, ...copied],
  };
}
