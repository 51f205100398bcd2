import {
  ServerActionResponse,
  serverActionError,
} from "@/features/common/server-action-response";

const BASE64_IMAGE_PATTERN = /^data:image\/([a-zA-Z0-9.+-]+);base64,/;

export const DEFAULT_IMAGE_MIME_TYPE = "image/jpeg";

/**
 * Detects if a string is already a base64 image data URL
 */
export const isBase64Image = (content: string): boolean => {
  return BASE64_IMAGE_PATTERN.test(content);
};

export const toImageDataUrl = (
  base64: string,
  mimeType: string = DEFAULT_IMAGE_MIME_TYPE
): string => {
  if (isBase64Image(base64)) {
    return base64;
  }
  return `data:${mimeType};base64,${base64}`;
};

export const isImageFile = (file: Blob): boolean => file.type.startsWith("image/");

export const encodeImageFile = async (file: Blob): Promise<string> => {
  const buffer = Buffer.from(await file.arrayBuffer());
  return buffer.toString("base64");
};

/**
 * Checks an uploaded file and turns it into a data URL carrying the file's
 * own content type.
 */
export const readImageUpload = async (
  file: File,
  maxBytes: number
): Promise<ServerActionResponse<string>> => {
  if (!isImageFile(file)) {
    return serverActionError("BAD_REQUEST", "File must be an image");
  }

  if (file.size > maxBytes) {
    return serverActionError(
      "PAYLOAD_TOO_LARGE",
      `Image exceeds the maximum upload size of ${maxBytes} bytes`
    );
  }

  try {
    const base64 = await encodeImageFile(file);
    return { status: "OK", response: toImageDataUrl(base64, file.type) };
  } catch (error) {
    return serverActionError(
      "BAD_REQUEST",
      `Error processing image: ${error instanceof Error ? error.message : String(error)}`
    );
  }
};
