import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  async redirects() {
    return [{ source: '/renovation-journey', destination: '/journey', permanent: true }]
  },
}

export default nextConfig
