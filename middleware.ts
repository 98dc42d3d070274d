// middleware.ts
import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { loadConfig } from "@/utils/config";
import { corsHeaders, isPreflight } from "@/utils/cors";

// The UI is served from the same origin; this is for clients hosted elsewhere.
const { allowedOrigins } = loadConfig();

export function middleware(req: NextRequest) {
  const headers = corsHeaders(
    req.headers.get("origin"),
    allowedOrigins,
    req.headers.get("access-control-request-headers")
  );

  if (isPreflight(req)) {
    if (!headers) return new NextResponse("Disallowed CORS origin", { status: 400 });
    return new NextResponse(null, { status: 200, headers });
  }

  const res = NextResponse.next();
  if (headers) {
    for (const [k, v] of Object.entries(headers)) res.headers.set(k, v);
  }
  return res;
}

export const config = {
  matcher: ["/api/:path*"],
};
