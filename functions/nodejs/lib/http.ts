// Shared request/response plumbing for the signal handlers.

export interface ApiEvent {
  body?: string | null;
  isBase64Encoded?: boolean;
  pathParameters?: Record<string, string | undefined> | null;
  queryStringParameters?: Record<string, string | undefined> | null;
}

export interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
}

export class InvalidJsonBodyError extends Error {
  constructor() {
    super("Request body must be valid JSON");
    this.name = "InvalidJsonBodyError";
  }
}

export function parseJsonBody(event: ApiEvent): unknown {
  if (!event.body) return {};
  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, "base64").toString("utf8")
    : event.body;
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonBodyError();
  }
}

export interface ApiResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
};

export function response(statusCode: number, body: unknown): ApiResponse {
  return {
    statusCode,
    headers: { "Content-Type": "application/json", ...CORS_HEADERS },
    body: JSON.stringify(body),
  };
}

// `attachmentName` turns the page into a download
export function htmlResponse(
  statusCode: number,
  html: string,
  attachmentName?: string
): ApiResponse {
  const headers: Record<string, string> = {
    "Content-Type": "text/html; charset=utf-8",
    ...CORS_HEADERS,
  };
  if (attachmentName) {
    const quoted = attachmentName.replace(/["\r\n]/g, "_");
    headers["Content-Disposition"] = `attachment; filename="${quoted}"`;
  }
  return { statusCode, headers, body: html };
}

export function isTruthyFlag(value: string | undefined): boolean {
  return (
    value !== undefined && ["1", "true", "yes"].includes(value.toLowerCase())
  );
}
