import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  output: 'standalone',
  reactStrictMode: true,

  // Performance optimizations
  compress: true,
  poweredByHeader: false,
};

export default nextConfig;
