import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // document readers load their own files at runtime; keep them out of the bundle
  serverExternalPackages: ["pdf-parse", "mammoth"],
};

export default nextConfig;
