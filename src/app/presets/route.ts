import {
  preflightResponse,
  toHttpResponse,
} from "@/features/common/api-response";
import { listPresets } from "@/features/chat-page/chat-services/preset-service";

export async function GET(req: Request) {
  return toHttpResponse(req, {
    status: "OK",
    response: { presets: listPresets() },
  });
}

export async function OPTIONS(req: Request) {
  return preflightResponse(req);
}
