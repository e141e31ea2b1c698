import { normalizeErrorMessage } from "../../errors";
import type { ChatMessage, RelayLine, StreamEvent } from "../../types/chat";
import type { CompletionClient } from "../llm/completion.client";
import type { ConversationStore } from "../conversations/store";
import { assembleSession, type SessionPrompts } from "./session.assembler";

export type RelayState =
  | "assembling"
  | "logging"
  | "requesting"
  | "streaming"
  | "draining"
  | "error_closing"
  | "closed";

export interface RelayLogger {
  debug(payload: Record<string, unknown>, message: string): void;
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface StreamingRelayOptions {
  completionClient: CompletionClient;
  store: ConversationStore;
  prompts: SessionPrompts;
  model: string;
  now?: () => Date;
}

export interface RelayRequest {
  conversationId: string;
  messages: readonly ChatMessage[];
  newSession: boolean;
  logger: RelayLogger;
  signal?: AbortSignal;
}

interface RelayContext {
  conversationId: string;
  logger: RelayLogger;
  signal?: AbortSignal;
  state: RelayState;
  sequence: number;
  nextTimestamp: () => string;
}

/** Millisecond clock that never repeats or goes backwards within one request. */
function createRequestClock(now: () => Date): () => string {
  let last = 0;
  return () => {
    const current = Math.max(now().getTime(), last + 1);
    last = current;
    return new Date(current).toISOString();
  };
}

/**
 * Per-request orchestration: assemble the prompt, log it, open the completion
 * stream, then relay every increment to the caller before logging it.
 *
 * `open` resolves once the upstream sequence is obtained. A configuration
 * failure rejects it, so nothing has been written to the response yet. After
 * that, every failure is reported in-band as a final `{ error }` line.
 */
export class StreamingRelay {
  private readonly now: () => Date;

  constructor(private readonly options: StreamingRelayOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async open(request: RelayRequest): Promise<AsyncIterable<RelayLine>> {
    const context: RelayContext = {
      conversationId: request.conversationId,
      logger: request.logger,
      signal: request.signal,
      state: "assembling",
      sequence: 0,
      nextTimestamp: createRequestClock(this.now),
    };
    this.transition(context, "assembling");

    const session = assembleSession(
      this.options.prompts,
      request.messages,
      request.newSession,
    );

    this.transition(context, "logging");
    await this.record(context, session.persona);
    if (session.welcome) {
      await this.record(context, session.welcome);
    }
    for (const message of session.requestMessages) {
      await this.record(context, message);
    }

    this.transition(context, "requesting");
    const events = this.options.completionClient.streamChat({
      model: this.options.model,
      messages: session.allMessages,
      signal: request.signal,
    });

    return this.relay(context, events);
  }

  private async *relay(
    context: RelayContext,
    events: AsyncIterable<StreamEvent>,
  ): AsyncGenerator<RelayLine> {
    this.transition(context, "streaming");
    let emitted = 0;

    try {
      for await (const event of events) {
        if (context.signal?.aborted) {
          this.logDisconnect(context, emitted);
          return;
        }

        if (event.type === "end") {
          break;
        }

        if (event.type === "error") {
          yield* this.closeWithError(context, event.reason);
          return;
        }

        yield { role: "assistant", content: event.content };
        emitted += 1;

        if (context.signal?.aborted) {
          this.logDisconnect(context, emitted);
          return;
        }

        await this.record(context, { role: "assistant", content: event.content });
      }
    } catch (error) {
      if (context.signal?.aborted) {
        this.logDisconnect(context, emitted);
        return;
      }

      yield* this.closeWithError(context, normalizeErrorMessage(error, "Completion stream failed"));
      return;
    }

    this.transition(context, "draining");
    this.transition(context, "closed");
  }

  private async *closeWithError(context: RelayContext, reason: string): AsyncGenerator<RelayLine> {
    this.transition(context, "error_closing");
    context.logger.error(
      { reason, conversationId: context.conversationId },
      "completion stream failed",
    );
    yield { error: reason };
    this.transition(context, "closed");
  }

  /** Store failures are logged and dropped; they never reach the caller. */
  private async record(context: RelayContext, message: ChatMessage): Promise<void> {
    const sequence = context.sequence;
    context.sequence += 1;

    try {
      await this.options.store.append({
        conversationId: context.conversationId,
        role: message.role,
        content: message.content,
        sequence,
        timestamp: context.nextTimestamp(),
      });
    } catch (error) {
      context.logger.warn(
        {
          conversationId: context.conversationId,
          role: message.role,
          sequence,
          error: normalizeErrorMessage(error),
        },
        "conversation log append failed",
      );
    }
  }

  private logDisconnect(context: RelayContext, emitted: number): void {
    context.logger.info(
      { conversationId: context.conversationId, emitted, state: context.state },
      "client disconnected, releasing completion stream",
    );
    this.transition(context, "closed");
  }

  private transition(context: RelayContext, state: RelayState): void {
    context.state = state;
    context.logger.debug(
      { conversationId: context.conversationId, state },
      "relay state changed",
    );
  }
}
