import { NextResponse } from "next/server";
import { parseAllowedOrigins } from "./services/app-config";
import { logDebug, logErrorWithError } from "./services/logger";
import {
  ServerActionErrorStatus,
  ServerActionResponse,
  serverActionError,
} from "./server-action-response";

export const HTTP_STATUS: Record<ServerActionErrorStatus | "OK", number> = {
  OK: 200,
  INVALID_REQUEST: 422,
  BAD_REQUEST: 400,
  PAYLOAD_TOO_LARGE: 413,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  ERROR: 500,
};

const ALLOWED_METHODS = "GET, POST, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, Authorization";

export const corsHeaders = (req: Request): Record<string, string> => {
  const allowedOrigins = parseAllowedOrigins(process.env.CORS_ALLOWED_ORIGINS);
  const headers: Record<string, string> = {
    "Access-Control-Allow-Methods": ALLOWED_METHODS,
    "Access-Control-Allow-Headers": ALLOWED_HEADERS,
  };

  if (allowedOrigins.includes("*")) {
    headers["Access-Control-Allow-Origin"] = "*";
    return headers;
  }

  const origin = req.headers.get("origin");
  if (origin && allowedOrigins.includes(origin)) {
    headers["Access-Control-Allow-Origin"] = origin;
    headers["Vary"] = "Origin";
  }

  return headers;
};

export const preflightResponse = (req: Request) =>
  new NextResponse(null, { status: 204, headers: corsHeaders(req) });

export const toHttpResponse = <T>(
  req: Request,
  result: ServerActionResponse<T>
): NextResponse => {
  const headers = corsHeaders(req);

  if (result.status === "OK") {
    return NextResponse.json(result.response, { status: 200, headers });
  }

  // Validation failures keep every issue; the rest collapse to one message
  const detail =
    result.status === "INVALID_REQUEST"
      ? result.errors
      : result.errors.map((e) => e.message).join("; ");

  return NextResponse.json(
    { detail },
    { status: HTTP_STATUS[result.status], headers }
  );
};

export const readJsonBody = async (
  req: Request
): Promise<ServerActionResponse<unknown>> => {
  try {
    return { status: "OK", response: await req.json() };
  } catch (error) {
    logDebug("Request body is not valid JSON", {
      error: error instanceof Error ? error.message : String(error),
    });
    return serverActionError("INVALID_REQUEST", "Request body must be valid JSON");
  }
};

export const readFormData = async (
  req: Request
): Promise<ServerActionResponse<FormData>> => {
  try {
    return { status: "OK", response: await req.formData() };
  } catch (error) {
    logDebug("Request body is not form data", {
      error: error instanceof Error ? error.message : String(error),
    });
    return serverActionError(
      "INVALID_REQUEST",
      "Request body must be multipart form data"
    );
  }
};

// Blank form fields count as absent
export const formString = (formData: FormData, name: string): string | null => {
  const value = formData.get(name);
  return typeof value === "string" && value !== "" ? value : null;
};

export const formFile = (formData: FormData, name: string): File | null => {
  const value = formData.get(name);
  return value === null || typeof value === "string" ? null : value;
};

/**
 * Runs a route body and turns anything it throws into a 500 carrying
 * `"<failureMessage>: <error message>"`.
 */
export const handleRoute = async <T>(
  req: Request,
  failureMessage: string,
  body: () => Promise<ServerActionResponse<T>>
): Promise<NextResponse> => {
  try {
    return toHttpResponse(req, await body());
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logErrorWithError(failureMessage, err, { path: new URL(req.url).pathname });
    return toHttpResponse(req, {
      status: "ERROR",
      errors: [{ message: `${failureMessage}: ${err.message}` }],
    });
  }
};
