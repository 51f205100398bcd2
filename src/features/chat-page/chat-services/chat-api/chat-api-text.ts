import { ServerActionResponse } from "@/features/common/server-action-response";
import { logError } from "@/features/common/services/logger";
import { ConversationHistory, TextChatResponse } from "../models";
import { createChatCompletion } from "./chat-completion";

export const ChatApiText = async (props: {
  message: string;
  conversationHistory: ConversationHistory;
}): Promise<ServerActionResponse<TextChatResponse>> => {
  const { message, conversationHistory } = props;

  const messages: ConversationHistory = [
    ...conversationHistory,
    { role: "user", content: message },
  ];

  try {
    const response = await createChatCompletion(messages);

    return {
      status: "OK",
      response: {
        response,
        conversation_history: [...messages, { role: "assistant", content: response }],
      },
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logError("Text chat failed", { error: reason, historyLength: conversationHistory.length });
    return {
      status: "ERROR",
      errors: [{ message: `Error processing chat: ${reason}` }],
    };
  }
};
