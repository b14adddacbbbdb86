import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { logger } from './logger';

let cachedVersion: string | null = null;

export function getHostAgentVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  // Sources live in apps/host-agent/src, compiled output in dist/apps/host-agent/src
  const candidates = [
    join(__dirname, '../../package.json'),
    join(__dirname, '../../../../../apps/host-agent/package.json'),
  ];
  const packageJsonPath = candidates.find((candidate) => existsSync(candidate));

  try {
    if (packageJsonPath) {
      const packageJson: { version?: unknown } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
        cachedVersion = packageJson.version;
        return cachedVersion;
      }
    }
  } catch (error) {
    logger.warn('Failed to resolve host-agent version from package.json', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  cachedVersion = '0.0.0';
  return cachedVersion;
}

export const HOST_AGENT_VERSION = getHostAgentVersion();
