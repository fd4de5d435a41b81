import type { Embeddings } from "@langchain/core/embeddings";
import { AzureOpenAIEmbeddings, OpenAIEmbeddings } from "@langchain/openai";
import type { EmbeddingSettings } from "../../config";
import { StoreError } from "../errors";

/**
 * Supported embedding providers.
 */
export type EmbeddingProvider = "openai" | "azure";

export class UnsupportedProviderError extends StoreError {
  constructor(public readonly provider: string) {
    super(`Unsupported embedding provider: ${provider}`);
  }
}

export class ModelConfigurationError extends StoreError {}

function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return value === "openai" || value === "azure";
}

/**
 * Splits "provider:model" into its parts. A bare model name means OpenAI.
 */
export function parseModelSpec(providerAndModel: string): {
  provider: string;
  model: string;
} {
  const separator = providerAndModel.indexOf(":");
  if (separator === -1) {
    return { provider: "openai", model: providerAndModel };
  }
  return {
    provider: providerAndModel.slice(0, separator),
    model: providerAndModel.slice(separator + 1),
  };
}

/**
 * Fails with the names of the environment variables behind every unset setting.
 */
function requireSettings(
  provider: EmbeddingProvider,
  settings: Array<[variable: string, value: string | undefined]>,
): void {
  const missing = settings.filter(([, value]) => !value).map(([variable]) => variable);
  if (missing.length > 0) {
    throw new ModelConfigurationError(
      `Missing environment variables for ${provider} embeddings: ${missing.join(", ")}`,
    );
  }
}

/**
 * Creates the embedding model named by `settings.model`, for example
 * "text-embedding-3-small" or "azure:my-embedding-deployment".
 *
 * - openai: needs an API key; the base URL is optional
 * - azure: needs key, instance name and API version; the model part is the
 *   deployment name
 *
 * @throws {UnsupportedProviderError} For an unknown provider.
 * @throws {ModelConfigurationError} When credentials are missing.
 */
export function createEmbeddingModel(settings: EmbeddingSettings): Embeddings {
  const { provider, model } = parseModelSpec(settings.model);
  if (!isEmbeddingProvider(provider)) {
    throw new UnsupportedProviderError(provider);
  }

  const baseConfig = { stripNewLines: true, batchSize: 512 };

  switch (provider) {
    case "openai": {
      const { apiKey, baseURL } = settings.openai;
      requireSettings(provider, [["OPENAI_API_KEY", apiKey]]);
      return new OpenAIEmbeddings({
        ...baseConfig,
        apiKey,
        model,
        ...(baseURL ? { configuration: { baseURL } } : {}),
      });
    }
    case "azure": {
      const { apiKey, instanceName, apiVersion } = settings.azure;
      requireSettings(provider, [
        ["AZURE_OPENAI_API_KEY", apiKey],
        ["AZURE_OPENAI_API_INSTANCE_NAME", instanceName],
        ["AZURE_OPENAI_API_VERSION", apiVersion],
      ]);
      return new AzureOpenAIEmbeddings({
        ...baseConfig,
        azureOpenAIApiKey: apiKey,
        azureOpenAIApiInstanceName: instanceName,
        azureOpenAIApiDeploymentName: model,
        azureOpenAIApiVersion: apiVersion,
      });
    }
  }
}
