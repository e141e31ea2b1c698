import { ConfigurationError } from "./errors";

export interface AppConfig {
  port: number;
  databaseUrl: string;
  databaseSslRootCertPath: string;
  conversationLogTable: string;
  azureOpenAiEndpoint: string;
  azureOpenAiDeployment: string;
  azureOpenAiApiVersion: string;
  azureOpenAiApiKey: string;
  azureOpenAiAdToken: string;
  chatPersona: string;
  chatWelcomeMessage: string;
  chatHistoryLimit: number;
}

export const DEFAULT_AZURE_OPENAI_API_VERSION = "2024-02-15-preview";

const DEFAULT_CHAT_PERSONA =
  "You are Amigo, a warm and encouraging health and wellbeing coach. Speak like a trusted friend of the family: "
  + "colloquial but professional, optimistic, with a sense of humour. Suggest gradual, sustainable changes rather than "
  + "restrictive diets, adapt traditional recipes to be healthier without losing their flavour, respect the person's "
  + "budget and access to food, and motivate from self-care, never from shame.";

const DEFAULT_CHAT_WELCOME_MESSAGE =
  "Hi! I'm Amigo, your companion on the way to a healthier life. I'm not here to take away your favourite dishes or "
  + "impose impossible routines, just to help you find the balance between delicious and healthy. "
  + "What would you like to achieve? Where would you like to start?";

const SQL_IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/i;

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function textFromEnv(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

export function getConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 50505),
    databaseUrl: process.env.DATABASE_URL ?? "",
    databaseSslRootCertPath: process.env.DATABASE_SSL_ROOT_CERT_PATH ?? "",
    conversationLogTable: textFromEnv("CONVERSATION_LOG_TABLE", "conversation_log"),
    azureOpenAiEndpoint: process.env.AZURE_OPENAI_ENDPOINT ?? "",
    azureOpenAiDeployment: process.env.AZURE_OPENAI_CHAT_DEPLOYMENT ?? "",
    azureOpenAiApiVersion: textFromEnv("AZURE_OPENAI_API_VERSION", DEFAULT_AZURE_OPENAI_API_VERSION),
    azureOpenAiApiKey: process.env.AZURE_OPENAI_API_KEY ?? "",
    azureOpenAiAdToken: process.env.AZURE_OPENAI_AD_TOKEN ?? "",
    chatPersona: textFromEnv("CHAT_PERSONA", DEFAULT_CHAT_PERSONA),
    chatWelcomeMessage: textFromEnv("CHAT_WELCOME_MESSAGE", DEFAULT_CHAT_WELCOME_MESSAGE),
    chatHistoryLimit: intFromEnv("CHAT_HISTORY_LIMIT", 50),
  };
}

export function assertSqlIdentifier(name: string, envName: string): string {
  if (!SQL_IDENTIFIER.test(name)) {
    throw new ConfigurationError(`${envName} must be a plain SQL identifier (received: ${name}).`);
  }

  return name;
}

/**
 * Refuses to boot without the completion endpoint and deployment. Production
 * additionally needs a real conversation store.
 */
export function validateBootConfig(config: AppConfig): void {
  const missing: string[] = [];

  if (!config.azureOpenAiEndpoint.trim()) {
    missing.push("AZURE_OPENAI_ENDPOINT");
  }
  if (!config.azureOpenAiDeployment.trim()) {
    missing.push("AZURE_OPENAI_CHAT_DEPLOYMENT");
  }
  if (process.env.NODE_ENV === "production" && !config.databaseUrl.trim()) {
    missing.push("DATABASE_URL");
  }

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Fatal config error: missing required environment variables: ${missing.join(", ")}`,
    );
  }

  assertSqlIdentifier(config.conversationLogTable, "CONVERSATION_LOG_TABLE");
}
