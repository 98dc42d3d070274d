// app/route.ts
import { createInfoHandler } from "@/utils/http.server";

export const GET = createInfoHandler();
