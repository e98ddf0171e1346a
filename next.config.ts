import type { NextConfig } from "next";

const nextConfig: NextConfig = {
    // API-only deployment: route handlers under app/api
    serverExternalPackages: ['compromise'],
};

export default nextConfig;
