// utils/cors.ts

export const CORS_METHODS = "DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT";

/** A browser preflight: OPTIONS carrying Access-Control-Request-Method. */
export function isPreflight(req: Request): boolean {
  return req.method === "OPTIONS" && req.headers.has("access-control-request-method");
}

/**
 * Headers granting `origin` access, or null when it is not on the allow list.
 * Requested headers are echoed back, so any header is accepted.
 */
export function corsHeaders(
  origin: string | null,
  allowedOrigins: readonly string[],
  requestedHeaders: string | null = null
): Record<string, string> | null {
  if (!origin || !allowedOrigins.includes(origin)) return null;

  const headers: Record<string, string> = {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": CORS_METHODS,
    Vary: "Origin",
  };
  if (requestedHeaders) headers["Access-Control-Allow-Headers"] = requestedHeaders;
  return headers;
}
