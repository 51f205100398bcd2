import { z } from "zod";

export const DEFAULT_IMAGE_PROMPT = "Analyze this image";

export const ChatRoleSchema = z.enum(["system", "user", "assistant"]);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

// History belongs to the client; keys the server does not read are kept as sent
export const TextContentPartSchema = z
  .object({
    type: z.literal("text"),
    text: z.string(),
  })
  .passthrough();

export const ImageDetailSchema = z.enum(["auto", "low", "high"]);

export const ImageContentPartSchema = z
  .object({
    type: z.literal("image_url"),
    image_url: z
      .object({
        url: z.string(),
        detail: ImageDetailSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const MessageContentPartSchema = z.discriminatedUnion("type", [
  TextContentPartSchema,
  ImageContentPartSchema,
]);
export type MessageContentPart = z.infer<typeof MessageContentPartSchema>;

export const ConversationMessageSchema = z
  .object({
    role: ChatRoleSchema,
    content: z.union([z.string(), z.array(MessageContentPartSchema)]),
  })
  .passthrough();
export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

export const ConversationHistorySchema = z.array(ConversationMessageSchema);
export type ConversationHistory = z.infer<typeof ConversationHistorySchema>;

export const TextChatRequestSchema = z.object({
  message: z.string({
    required_error: "Message is required",
    invalid_type_error: "Message must be a string",
  }),
  conversation_history: ConversationHistorySchema.nullish().transform(
    (history) => history ?? []
  ),
});
export type TextChatRequest = z.infer<typeof TextChatRequestSchema>;

export const ImageBase64RequestSchema = z.object({
  image_base64: z
    .string({
      required_error: "Image data is required",
      invalid_type_error: "Image data must be a base64 string",
    })
    .min(1, "Image data cannot be empty"),
  prompt: z.string().nullish(),
  preset_action: z.string().nullish(),
});
export type ImageBase64Request = z.infer<typeof ImageBase64RequestSchema>;

export interface TextChatResponse {
  response: string;
  conversation_history: ConversationHistory;
}

export interface ImageAnalysisResponse {
  response: string;
  analysis_type: string;
}

export interface MultimodalChatResponse extends TextChatResponse {
  has_image: boolean;
}

export interface PresetAction {
  key: string;
  label: string;
  description: string;
}

export interface PresetsResponse {
  presets: PresetAction[];
}

// https://platform.openai.com/docs/guides/images?api-mode=chat#image-input-requirements
export enum SupportedFileExtensionsInputImages {
  JPEG = "JPEG",
  JPG = "JPG",
  PNG = "PNG",
  GIF = "GIF",
  WEBP = "WEBP",
}
