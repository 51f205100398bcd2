import { ServerActionResponse } from "@/features/common/server-action-response";
import { logError } from "@/features/common/services/logger";
import {
  ConversationHistory,
  ConversationMessage,
  MessageContentPart,
  MultimodalChatResponse,
} from "../models";
import { createChatCompletion } from "./chat-completion";

export const ChatApiMultimodal = async (props: {
  message: string;
  imageDataUrl?: string;
  conversationHistory: ConversationHistory;
}): Promise<ServerActionResponse<MultimodalChatResponse>> => {
  const { message, imageDataUrl, conversationHistory } = props;

  const hasImage = Boolean(imageDataUrl);
  const content: MessageContentPart[] = [{ type: "text", text: message }];
  if (imageDataUrl) {
    content.push({
      type: "image_url",
      image_url: {
        url: imageDataUrl,
      },
    });
  }

  const userMessage: ConversationMessage = { role: "user", content };
  const messages: ConversationHistory = [...conversationHistory, userMessage];

  try {
    const response = await createChatCompletion(messages);

    return {
      status: "OK",
      response: {
        response,
        conversation_history: [...messages, { role: "assistant", content: response }],
        has_image: hasImage,
      },
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logError("Multimodal chat failed", {
      error: reason,
      hasImage,
      historyLength: conversationHistory.length,
    });
    return {
      status: "ERROR",
      errors: [{ message: `Error processing multimodal chat: ${reason}` }],
    };
  }
};
