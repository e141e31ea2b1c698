import { randomUUID } from "node:crypto";
import { Readable } from "node:stream";
import type { FastifyInstance } from "fastify";
import type { Pool } from "pg";
import { getConfig, type AppConfig } from "../config";
import { buildPool } from "../db/pool";
import { ConfigurationError, StorageError } from "../errors";
import type { RelayLine, ChatMessage } from "../types/chat";
import { StreamingRelay } from "../services/chat/relay";
import {
  MemoryConversationStore,
  PostgresConversationStore,
  type ConversationStore,
  type LogEntry,
} from "../services/conversations/store";
import { createCompletionClient, type CompletionClient } from "../services/llm/completion.client";
import { errorResponse, okResponse } from "../utils/http-envelope";
import { toNdjson } from "../utils/ndjson";

const MAX_CONVERSATION_ID_LENGTH = 200;

export interface ChatRouteOptions {
  store?: ConversationStore;
  completionClient?: CompletionClient;
  config?: AppConfig;
  now?: () => Date;
}

interface ChatStreamPayload {
  conversationId: string | null;
  messages: ChatMessage[];
  newSession: boolean;
}

function validateConversationId(raw: unknown): { value?: string | null; error?: string } {
  if (raw === undefined || raw === null) {
    return { value: null };
  }

  const conversationId = typeof raw === "string" ? raw.trim() : "";
  if (!conversationId || conversationId.length > MAX_CONVERSATION_ID_LENGTH) {
    return {
      error: `conversation_id must be a non-empty string of at most ${MAX_CONVERSATION_ID_LENGTH} characters`,
    };
  }

  return { value: conversationId };
}

function validateChatStreamPayload(raw: unknown): {
  value?: ChatStreamPayload;
  error?: string;
} {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return { error: "Payload must be a JSON object" };
  }

  const body = raw as Record<string, unknown>;
  const rawMessages = body.messages ?? [];
  if (!Array.isArray(rawMessages)) {
    return { error: "messages must be an array" };
  }

  const messages: ChatMessage[] = [];
  for (const [index, item] of rawMessages.entries()) {
    if (!item || typeof item !== "object") {
      return { error: `messages[${index}] must be an object` };
    }

    const { role, content } = item as Record<string, unknown>;
    if (typeof role !== "string" || typeof content !== "string") {
      return { error: `messages[${index}] must have string role and content` };
    }

    messages.push({ role, content });
  }

  const newSession = body.new_session ?? false;
  if (typeof newSession !== "boolean") {
    return { error: "new_session must be a boolean" };
  }

  const conversationId = validateConversationId(body.conversation_id);
  if (conversationId.error !== undefined) {
    return { error: conversationId.error };
  }

  return {
    value: {
      conversationId: conversationId.value ?? null,
      messages,
      newSession,
    },
  };
}

function toApiLogEntry(entry: LogEntry): Record<string, unknown> {
  return {
    id: entry.id,
    conversation_id: entry.conversationId,
    role: entry.role,
    content: entry.content,
    sequence: entry.sequence,
    timestamp: entry.timestamp,
  };
}

export async function chatRoutes(app: FastifyInstance, options: ChatRouteOptions) {
  const config = options.config ?? getConfig();

  let pool: Pool | null = null;
  const createStore = (): ConversationStore => {
    if (!config.databaseUrl) {
      app.log.warn("DATABASE_URL is not set; conversation log is kept in memory");
      return new MemoryConversationStore();
    }

    pool = buildPool(config, app.log);
    return new PostgresConversationStore(pool, config.conversationLogTable);
  };
  const store = options.store ?? createStore();

  const relay = new StreamingRelay({
    completionClient: options.completionClient ?? createCompletionClient(config, app.log),
    store,
    prompts: {
      persona: config.chatPersona,
      welcomeMessage: config.chatWelcomeMessage,
    },
    model: config.azureOpenAiDeployment,
    now: options.now,
  });

  app.addHook("onClose", async () => {
    await pool?.end();
  });

  app.post("/chat/stream", async (request, reply) => {
    const validated = validateChatStreamPayload(request.body);
    if (!validated.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", validated.error ?? "Invalid payload"));
    }

    const conversationId = validated.value.conversationId ?? randomUUID();
    const disconnect = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) {
        disconnect.abort();
      }
    });

    let lines: AsyncIterable<RelayLine>;
    try {
      lines = await relay.open({
        conversationId,
        messages: validated.value.messages,
        newSession: validated.value.newSession,
        logger: request.log,
        signal: disconnect.signal,
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        request.log.error({ err: error, conversationId }, "chat stream rejected by configuration");
        return reply
          .code(500)
          .send(errorResponse(error.code, error.message));
      }
      throw error;
    }

    return reply
      .code(200)
      .header("content-type", "application/x-ndjson; charset=utf-8")
      .header("cache-control", "no-cache")
      .header("x-conversation-id", conversationId)
      .send(Readable.from(toNdjson(lines)));
  });

  app.get("/chat/history/:conversationId", async (request, reply) => {
    const conversationId = validateConversationId(
      (request.params as { conversationId?: string }).conversationId,
    );
    if (!conversationId.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", conversationId.error ?? "conversationId is required"));
    }

    const rawLimit = Number.parseInt(String((request.query as { limit?: string }).limit ?? ""), 10);
    const limit = Number.isFinite(rawLimit)
      ? Math.max(1, Math.min(rawLimit, config.chatHistoryLimit))
      : config.chatHistoryLimit;

    try {
      const entries = await store.query(conversationId.value, limit);
      return reply.code(200).send(
        okResponse({
          conversation_id: conversationId.value,
          entries: entries.map((entry) => toApiLogEntry(entry)),
        }),
      );
    } catch (error) {
      if (error instanceof StorageError) {
        request.log.warn({ err: error, conversationId: conversationId.value }, "conversation history query failed");
        return reply
          .code(503)
          .send(errorResponse("STORAGE_UNAVAILABLE", "Conversation history is temporarily unavailable"));
      }
      throw error;
    }
  });
}
