import { logDebug } from "@/features/common/services/logger";
import {
  ImageAnalysisResponse,
  PresetAction,
  PresetsResponse,
  ConversationHistory,
  TextChatResponse,
} from "./models";

const API_BASE_URL = process.env.NEXT_PUBLIC_API_BASE_URL ?? "";

export class ChatRequestError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = "ChatRequestError";
  }
}

const errorDetail = async (response: Response): Promise<string> => {
  const body: unknown = await response.json().catch((error: unknown) => {
    logDebug("Error response has no JSON body", {
      status: response.status,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  });

  if (body && typeof body === "object" && "detail" in body) {
    const { detail } = body;
    if (typeof detail === "string") {
      return detail;
    }
    if (Array.isArray(detail)) {
      return detail
        .map((e: unknown) =>
          e && typeof e === "object" && "message" in e ? String(e.message) : String(e)
        )
        .join("; ");
    }
  }

  return `Request failed with status ${response.status}`;
};

const readResponse = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new ChatRequestError(await errorDetail(response), response.status);
  }
  return response.json();
};

export const fetchPresets = async (): Promise<PresetAction[]> => {
  const response = await fetch(`${API_BASE_URL}/presets`);
  const data = await readResponse<PresetsResponse>(response);
  return data.presets;
};

export const postTextChat = async (
  message: string,
  conversationHistory: ConversationHistory
): Promise<TextChatResponse> => {
  const response = await fetch(`${API_BASE_URL}/chat/text`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      message,
      conversation_history: conversationHistory,
    }),
  });
  return readResponse<TextChatResponse>(response);
};

export const postImageUpload = async (props: {
  image: File;
  presetAction?: string;
  prompt?: string;
}): Promise<ImageAnalysisResponse> => {
  const formData = new FormData();
  formData.append("image", props.image);
  if (props.presetAction) {
    formData.append("preset_action", props.presetAction);
  }
  if (props.prompt) {
    formData.append("prompt", props.prompt);
  }

  const response = await fetch(`${API_BASE_URL}/chat/image-upload`, {
    method: "POST",
    body: formData,
  });
  return readResponse<ImageAnalysisResponse>(response);
};
