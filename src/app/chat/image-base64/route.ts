import {
  handleRoute,
  preflightResponse,
  readJsonBody,
} from "@/features/common/api-response";
import { validateRequest } from "@/features/common/server-action-response";
import { ChatApiImage } from "@/features/chat-page/chat-services/chat-api/chat-api-image";
import { toImageDataUrl } from "@/features/chat-page/chat-services/image-service";
import { ImageBase64RequestSchema } from "@/features/chat-page/chat-services/models";

export async function POST(req: Request) {
  return handleRoute(req, "Error processing image", async () => {
    const body = await readJsonBody(req);
    if (body.status !== "OK") {
      return body;
    }

    const request = validateRequest(ImageBase64RequestSchema, body.response);
    if (request.status !== "OK") {
      return request;
    }

    const { image_base64, prompt, preset_action } = request.response;

    return ChatApiImage({
      imageDataUrl: toImageDataUrl(image_base64),
      presetAction: preset_action,
      prompt,
    });
  });
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
