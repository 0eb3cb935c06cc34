import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  // Native addon, loaded from node_modules at runtime instead of bundled
  serverExternalPackages: ['better-sqlite3'],
}

export default nextConfig
