import { config } from 'dotenv';

config();

export const CONFIG = {
  server: {
    host: process.env.HOST || '0.0.0.0',
    port: parseInt(process.env.PORT || '3000', 10),
  },
  tibia: {
    communityUrl: process.env.TIBIA_COMMUNITY_URL || 'https://www.tibia.com/community/',
    userAgent:
      process.env.TIBIA_USER_AGENT ||
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:109.0) Gecko/20100101 Firefox/113.0',
    timeoutMs: parseInt(process.env.TIBIA_TIMEOUT_MS || '10000', 10),
    concurrency: parseInt(process.env.TIBIA_CONCURRENCY || '3', 10),
  },
  mongodb: {
    // cache is disabled when unset
    uri: process.env.MONGODB_URI || '',
    database: process.env.MONGODB_DATABASE || 'house_listings',
  },
  cache: {
    ttlSeconds: parseInt(process.env.CACHE_TTL_SECONDS || '300', 10),
  },
  nodeEnv: process.env.NODE_ENV || 'development',
} as const;
