import {
  formFile,
  formString,
  handleRoute,
  preflightResponse,
  readFormData,
} from "@/features/common/api-response";
import { serverActionError } from "@/features/common/server-action-response";
import { getAppConfig } from "@/features/common/services/app-config";
import { logInfo, logWarn } from "@/features/common/services/logger";
import { ChatApiMultimodal } from "@/features/chat-page/chat-services/chat-api/chat-api-multimodal";
import {
  isImageFile,
  readImageUpload,
} from "@/features/chat-page/chat-services/image-service";
import {
  ConversationHistory,
  ConversationHistorySchema,
} from "@/features/chat-page/chat-services/models";

// A history that cannot be read starts the conversation over
const parseConversationHistory = (raw: string | null): ConversationHistory => {
  if (!raw) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logWarn("Ignoring conversation history that is not valid JSON", {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  const history = ConversationHistorySchema.safeParse(parsed);
  if (!history.success) {
    logWarn("Ignoring conversation history with an unexpected shape", {
      issues: history.error.errors.length,
    });
    return [];
  }

  return history.data;
};

export async function POST(req: Request) {
  return handleRoute(req, "Error processing multimodal chat", async () => {
    const formData = await readFormData(req);
    if (formData.status !== "OK") {
      return formData;
    }

    const message = formString(formData.response, "message");
    if (message === null) {
      return serverActionError("INVALID_REQUEST", "Message is required", "message");
    }

    let imageDataUrl: string | undefined;
    const image = formFile(formData.response, "image");
    if (image && image.size > 0) {
      if (isImageFile(image)) {
        const upload = await readImageUpload(image, getAppConfig().maxImageUploadBytes);
        if (upload.status !== "OK") {
          return upload;
        }
        imageDataUrl = upload.response;
      } else {
        logInfo("Ignoring non-image attachment", { contentType: image.type });
      }
    }

    return ChatApiMultimodal({
      message,
      imageDataUrl,
      conversationHistory: parseConversationHistory(
        formString(formData.response, "conversation_history")
      ),
    });
  });
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
