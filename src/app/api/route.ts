import { NextResponse } from "next/server";
import { corsHeaders, preflightResponse } from "@/features/common/api-response";
import { AI_NAME, APP_VERSION } from "@/features/theme/theme-config";

const API_ENDPOINTS = {
  "/chat/text": "Text-only chat",
  "/chat/image-upload": "Upload an image and ask about it",
  "/chat/image-base64": "Send a base64 image and ask about it",
  "/chat/multimodal": "Text chat with an optional image",
  "/presets": "Available preset actions for images",
};

export async function GET(req: Request) {
  return NextResponse.json(
    {
      message: `${AI_NAME} API`,
      version: APP_VERSION,
      endpoints: API_ENDPOINTS,
    },
    { headers: corsHeaders(req) }
  );
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
