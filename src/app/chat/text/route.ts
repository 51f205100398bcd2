import {
  handleRoute,
  preflightResponse,
  readJsonBody,
} from "@/features/common/api-response";
import { validateRequest } from "@/features/common/server-action-response";
import { ChatApiText } from "@/features/chat-page/chat-services/chat-api/chat-api-text";
import { TextChatRequestSchema } from "@/features/chat-page/chat-services/models";

export async function POST(req: Request) {
  return handleRoute(req, "Error processing chat", async () => {
    const body = await readJsonBody(req);
    if (body.status !== "OK") {
      return body;
    }

    const request = validateRequest(TextChatRequestSchema, body.response);
    if (request.status !== "OK") {
      return request;
    }

    return ChatApiText({
      message: request.response.message,
      conversationHistory: request.response.conversation_history,
    });
  });
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
