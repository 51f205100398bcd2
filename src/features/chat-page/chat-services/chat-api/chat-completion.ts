import type {
  ChatCompletionContentPart,
  ChatCompletionContentPartText,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { AppConfig, getAppConfig } from "@/features/common/services/app-config";
import { logDebug } from "@/features/common/services/logger";
import { OpenAIInstance } from "@/features/common/services/openai";
import {
  ConversationHistory,
  ConversationMessage,
  MessageContentPart,
} from "../models";

// Only the fields the vendor accepts; other client keys stay in the history
const contentPart = (part: MessageContentPart): ChatCompletionContentPart => {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  const { url, detail } = part.image_url;
  return {
    type: "image_url",
    image_url: detail ? { url, detail } : { url },
  };
};

// System and assistant turns only take text parts
const textParts = (
  content: ConversationMessage["content"]
): string | ChatCompletionContentPartText[] => {
  if (typeof content === "string") {
    return content;
  }
  return content.flatMap((part) =>
    part.type === "text" ? [{ type: "text" as const, text: part.text }] : []
  );
};

export const toChatCompletionMessage = (
  message: ConversationMessage
): ChatCompletionMessageParam => {
  switch (message.role) {
    case "user":
      return {
        role: "user",
        content:
          typeof message.content === "string"
            ? message.content
            : message.content.map(contentPart),
      };
    case "assistant":
      return { role: "assistant", content: textParts(message.content) };
    case "system":
      return { role: "system", content: textParts(message.content) };
  }
};

export const createChatCompletion = async (
  messages: ConversationHistory,
  config: AppConfig = getAppConfig()
): Promise<string> => {
  const openAI = OpenAIInstance(config);
  const startedAt = Date.now();

  const completion = await openAI.chat.completions.create({
    model: config.model,
    messages: messages.map(toChatCompletionMessage),
    max_tokens: config.maxTokens,
    temperature: config.temperature,
  });

  logDebug("Chat completion received", {
    model: config.model,
    provider: config.provider,
    latencyMs: Date.now() - startedAt,
    finishReason: completion.choices[0]?.finish_reason,
  });

  return completion.choices[0]?.message?.content ?? "";
};
