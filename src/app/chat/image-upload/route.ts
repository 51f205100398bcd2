import {
  formFile,
  formString,
  handleRoute,
  preflightResponse,
  readFormData,
} from "@/features/common/api-response";
import { serverActionError } from "@/features/common/server-action-response";
import { getAppConfig } from "@/features/common/services/app-config";
import { ChatApiImage } from "@/features/chat-page/chat-services/chat-api/chat-api-image";
import { readImageUpload } from "@/features/chat-page/chat-services/image-service";

export async function POST(req: Request) {
  return handleRoute(req, "Error processing image", async () => {
    const formData = await readFormData(req);
    if (formData.status !== "OK") {
      return formData;
    }

    const image = formFile(formData.response, "image");
    if (!image) {
      return serverActionError("INVALID_REQUEST", "Image file is required", "image");
    }

    const imageDataUrl = await readImageUpload(
      image,
      getAppConfig().maxImageUploadBytes
    );
    if (imageDataUrl.status !== "OK") {
      return imageDataUrl;
    }

    return ChatApiImage({
      imageDataUrl: imageDataUrl.response,
      presetAction: formString(formData.response, "preset_action"),
      prompt: formString(formData.response, "prompt"),
    });
  });
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
