import { createAnalyzeHandler } from "@/utils/http.server";
import { analyzer, logger } from "@/utils/services.server";

export const runtime = "nodejs"; // pdf-parse and mammoth need Node APIs

export const POST = createAnalyzeHandler(analyzer, logger.child("http"));
