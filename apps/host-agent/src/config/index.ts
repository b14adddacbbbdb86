import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

const parsedCorsOrigins = process.env.CORS_ORIGINS
  ?.split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

export const config = {
  server: {
    port: parseInt(process.env.PORT || '8082', 10),
    host: process.env.HOST || '0.0.0.0',
    env: process.env.NODE_ENV || 'development',
    publicDir: process.env.PUBLIC_DIR || './public',
  },
  registry: {
    path: process.env.REGISTRY_PATH || './data/machines.json',
  },
  network: {
    pollInterval: parseInt(process.env.POLL_INTERVAL || '3000', 10), // 3 seconds
    pollTimeout: parseInt(process.env.POLL_TIMEOUT || '500', 10), // 0.5 seconds per probe
    pollConcurrency: parseInt(process.env.POLL_CONCURRENCY || '10', 10), // 10 concurrent probes
    resolvePrimeTimeout: parseInt(process.env.RESOLVE_PRIME_TIMEOUT || '200', 10),
  },
  wakeOnLan: {
    broadcastAddress: process.env.WOL_BROADCAST_ADDRESS || '255.255.255.255',
    port: parseInt(process.env.WOL_PORT || '9', 10),
  },
  cors: {
    origins: parsedCorsOrigins && parsedCorsOrigins.length > 0 ? parsedCorsOrigins : ['*'],
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || './logs',
  },
};

export type AppConfig = typeof config;
