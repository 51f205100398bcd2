import { ServerActionResponse } from "@/features/common/server-action-response";
import { logError } from "@/features/common/services/logger";
import { ImageAnalysisResponse } from "../models";
import { resolveImagePrompt } from "../preset-service";
import { createChatCompletion } from "./chat-completion";

/**
 * Single-shot image analysis. No conversation history is sent or returned.
 */
export const ChatApiImage = async (props: {
  imageDataUrl: string;
  presetAction?: string | null;
  prompt?: string | null;
}): Promise<ServerActionResponse<ImageAnalysisResponse>> => {
  const { imageDataUrl } = props;
  const { prompt, analysisType } = resolveImagePrompt(props);

  try {
    const response = await createChatCompletion([
      {
        role: "user",
        content: [
          { type: "text", text: prompt },
          {
            type: "image_url",
            image_url: {
              url: imageDataUrl,
            },
          },
        ],
      },
    ]);

    return {
      status: "OK",
      response: { response, analysis_type: analysisType },
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logError("Image analysis failed", { error: reason, analysisType });
    return {
      status: "ERROR",
      errors: [{ message: `Error processing image: ${reason}` }],
    };
  }
};
