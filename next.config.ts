import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: 'standalone',

  // PDF parsing library stays outside the server bundle
  serverExternalPackages: ['unpdf'],
};

export default nextConfig;
