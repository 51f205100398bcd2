import { z } from "zod";

export const DEFAULT_CHAT_MODEL = "gpt-4o";
export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_IMAGE_UPLOAD_BYTES = 20 * 1024 * 1024;

export type ModelProvider = "openai" | "azure";

export interface AppConfig {
  provider: ModelProvider;
  openai: {
    apiKey?: string;
    baseURL?: string;
  };
  azure: {
    apiKey?: string;
    instanceName?: string;
    deploymentName?: string;
    apiVersion?: string;
  };
  model: string;
  maxTokens: number;
  temperature: number;
  corsAllowedOrigins: string[];
  maxImageUploadBytes: number;
}

export type Environment = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const EnvironmentSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default(DEFAULT_CHAT_MODEL),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_API_INSTANCE_NAME: z.string().optional(),
  AZURE_OPENAI_API_DEPLOYMENT_NAME: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().optional(),
  CORS_ALLOWED_ORIGINS: z.string().default("*"),
  MAX_IMAGE_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_IMAGE_UPLOAD_BYTES),
});

export const parseAllowedOrigins = (value: string | undefined): string[] => {
  const origins = (value ?? "*")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin !== "");
  return origins.length > 0 ? origins : ["*"];
};

// Blank variables count as unset
const readEnvironment = (
  env: Environment
): Record<string, string | undefined> => {
  const values: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvironmentSchema.shape)) {
    const value = env[key]?.trim();
    values[key] = value ? value : undefined;
  }
  return values;
};

export const getAppConfig = (env: Environment = process.env): AppConfig => {
  const parsed = EnvironmentSchema.safeParse(readEnvironment(env));

  if (!parsed.success) {
    const fields = parsed.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join(", ");
    throw new ConfigurationError(`Invalid environment configuration (${fields})`);
  }

  const values = parsed.data;

  return {
    provider: values.AZURE_OPENAI_API_INSTANCE_NAME ? "azure" : "openai",
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseURL: values.OPENAI_BASE_URL,
    },
    azure: {
      apiKey: values.AZURE_OPENAI_API_KEY,
      instanceName: values.AZURE_OPENAI_API_INSTANCE_NAME,
      deploymentName: values.AZURE_OPENAI_API_DEPLOYMENT_NAME,
      apiVersion: values.AZURE_OPENAI_API_VERSION,
    },
    model: values.OPENAI_MODEL,
    maxTokens: values.OPENAI_MAX_TOKENS,
    temperature: values.OPENAI_TEMPERATURE,
    corsAllowedOrigins: parseAllowedOrigins(values.CORS_ALLOWED_ORIGINS),
    maxImageUploadBytes: values.MAX_IMAGE_UPLOAD_BYTES,
  };
};
