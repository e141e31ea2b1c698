import type { AppConfig } from "../../config";
import { ConfigurationError } from "../../errors";

/**
 * Opaque source of request credentials for the completion endpoint. Called
 * once per outbound HTTP call; refreshing tokens is the implementation's job.
 */
export interface CredentialProvider {
  getAuthorizationHeaders(): Promise<Record<string, string>>;
}

export class ApiKeyCredentialProvider implements CredentialProvider {
  constructor(private readonly apiKey: string) {}

  async getAuthorizationHeaders(): Promise<Record<string, string>> {
    return { "api-key": this.apiKey };
  }
}

export class BearerTokenCredentialProvider implements CredentialProvider {
  constructor(private readonly getToken: () => Promise<string>) {}

  async getAuthorizationHeaders(): Promise<Record<string, string>> {
    const token = (await this.getToken()).trim();
    if (!token) {
      throw new ConfigurationError("Credential provider returned an empty bearer token");
    }

    return { Authorization: `Bearer ${token}` };
  }
}

class MissingCredentialProvider implements CredentialProvider {
  async getAuthorizationHeaders(): Promise<Record<string, string>> {
    throw new ConfigurationError(
      "AZURE_OPENAI_API_KEY or AZURE_OPENAI_AD_TOKEN is required to call Azure OpenAI",
    );
  }
}

export function createCredentialProvider(config: AppConfig): CredentialProvider {
  const apiKey = config.azureOpenAiApiKey.trim();
  if (apiKey) {
    return new ApiKeyCredentialProvider(apiKey);
  }

  const adToken = config.azureOpenAiAdToken.trim();
  if (adToken) {
    return new BearerTokenCredentialProvider(async () => adToken);
  }

  return new MissingCredentialProvider();
}
