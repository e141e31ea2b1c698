import { streamText, type ModelMessage } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { AppConfig } from "../../config";
import { ConfigurationError, UpstreamError, normalizeErrorMessage } from "../../errors";
import type { ChatMessage, StreamEvent } from "../../types/chat";
import { createCredentialProvider, type CredentialProvider } from "./credentials";

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  signal?: AbortSignal;
}

/**
 * One call opens one upstream stream. The returned sequence is single-use and
 * never throws past yielded items: failures arrive as a final `error` event.
 */
export interface CompletionClient {
  streamChat(request: CompletionRequest): AsyncIterable<StreamEvent>;
}

interface CompletionLogger {
  warn(payload: Record<string, unknown>, message: string): void;
}

export interface AzureOpenAiCompletionClientOptions {
  endpoint: string;
  apiVersion: string;
  credentials: CredentialProvider;
  fetch?: typeof fetch;
  logger?: CompletionLogger;
}

function toModelMessage(message: ChatMessage): ModelMessage | null {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return null;
  }
}

function deploymentBaseUrl(endpoint: string, deployment: string): string {
  return `${endpoint.replace(/\/+$/, "")}/openai/deployments/${encodeURIComponent(deployment)}`;
}

export class AzureOpenAiCompletionClient implements CompletionClient {
  private readonly transport: typeof fetch;

  constructor(private readonly options: AzureOpenAiCompletionClientOptions) {
    const baseFetch = options.fetch ?? fetch;
    const credentials = options.credentials;

    this.transport = async (input, init) => {
      const headers = new Headers(init?.headers);
      const authorization = await credentials.getAuthorizationHeaders();
      for (const [name, value] of Object.entries(authorization)) {
        headers.set(name, value);
      }

      return baseFetch(input, { ...init, headers });
    };
  }

  streamChat(request: CompletionRequest): AsyncIterable<StreamEvent> {
    if (!this.options.endpoint.trim()) {
      throw new ConfigurationError("AZURE_OPENAI_ENDPOINT is required for Azure OpenAI");
    }
    if (!request.model.trim()) {
      throw new ConfigurationError("AZURE_OPENAI_CHAT_DEPLOYMENT is required for Azure OpenAI");
    }

    return this.openStream(request);
  }

  private async *openStream(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const messages: ModelMessage[] = [];
    for (const message of request.messages) {
      const converted = toModelMessage(message);
      if (!converted) {
        yield { type: "error", reason: `Unsupported message role: ${message.role}` };
        return;
      }
      messages.push(converted);
    }

    const provider = createOpenAICompatible({
      name: "azure-openai",
      baseURL: deploymentBaseUrl(this.options.endpoint, request.model),
      queryParams: { "api-version": this.options.apiVersion },
      fetch: this.transport,
    });

    try {
      const result = streamText({
        model: provider.chatModel(request.model),
        messages,
        abortSignal: request.signal,
        maxRetries: 0,
        onError: ({ error }) => {
          this.options.logger?.warn(
            { error: normalizeErrorMessage(error), model: request.model },
            "completion stream reported an error",
          );
        },
      });

      for await (const part of result.fullStream) {
        switch (part.type) {
          case "text-delta":
            if (part.text) {
              yield { type: "data", content: part.text };
            }
            break;
          case "error":
            yield { type: "error", reason: normalizeErrorMessage(part.error, "LLM request failed") };
            return;
          case "abort":
            return;
          default:
            break;
        }
      }
    } catch (error) {
      if (request.signal?.aborted) {
        return;
      }

      const failure = new UpstreamError(normalizeErrorMessage(error, "LLM request failed"), { cause: error });
      this.options.logger?.warn({ err: failure, model: request.model }, "completion stream threw");
      yield { type: "error", reason: failure.message };
      return;
    }

    yield { type: "end" };
  }
}

export function createCompletionClient(config: AppConfig, logger?: CompletionLogger): AzureOpenAiCompletionClient {
  return new AzureOpenAiCompletionClient({
    endpoint: config.azureOpenAiEndpoint,
    apiVersion: config.azureOpenAiApiVersion,
    credentials: createCredentialProvider(config),
    logger,
  });
}
