import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Workspace packages ship TypeScript sources.
  transpilePackages: ["@trialscope/ui", "@trialscope/registry", "@trialscope/landscape"],
};

export default nextConfig;
