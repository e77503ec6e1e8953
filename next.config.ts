import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  // Required from node_modules at run time, not bundled
  serverExternalPackages: ["pino", "postgres", "prom-client"],
};

export default nextConfig;
