import { createHealthHandler } from "@/utils/http.server";
import { config } from "@/utils/services.server";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = createHealthHandler(config);
