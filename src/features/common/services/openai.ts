import OpenAI, { AzureOpenAI } from "openai";
import { AppConfig, ConfigurationError, getAppConfig } from "./app-config";

type AzureOpenAIAuthConfig = {
  apiKey: string;
  defaultHeaders: Record<string, string>;
};

const buildAzureOpenAIAuthConfig = (
  apiKey: string | undefined
): AzureOpenAIAuthConfig => {
  if (!apiKey) {
    throw new ConfigurationError(
      "Azure OpenAI API key is not set, check AZURE_OPENAI_API_KEY."
    );
  }

  return {
    apiKey,
    defaultHeaders: { "api-key": apiKey },
  };
};

const AzureInstance = (azure: AppConfig["azure"]) => {
  const { instanceName, deploymentName, apiVersion } = azure;

  if (!instanceName || !deploymentName || !apiVersion) {
    throw new ConfigurationError(
      "Azure OpenAI Chat endpoint config is not set, check environment variables."
    );
  }

  return new AzureOpenAI({
    ...buildAzureOpenAIAuthConfig(azure.apiKey),
    baseURL: `https://${instanceName}.openai.azure.com/openai/deployments/${deploymentName}`,
    apiVersion,
  });
};

export const OpenAIInstance = (config: AppConfig = getAppConfig()): OpenAI => {
  if (config.provider === "azure") {
    return AzureInstance(config.azure);
  }

  if (!config.openai.apiKey) {
    throw new ConfigurationError(
      "OpenAI API key is not set, check OPENAI_API_KEY."
    );
  }

  return new OpenAI({
    apiKey: config.openai.apiKey,
    ...(config.openai.baseURL ? { baseURL: config.openai.baseURL } : {}),
  });
};
