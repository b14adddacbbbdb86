import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { HostEntry, registrySnapshotSchema } from '@lanwake/protocol';
import { logger } from '../utils/logger';

/**
 * Durable storage for the host registry. Both operations work on the whole
 * registry at once.
 */
export interface RegistryStorage {
  load(): HostEntry[];
  save(entries: readonly HostEntry[]): void;
}

export class RegistryFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistryFileError';
  }
}

/**
 * Pretty-printed UTF-8 JSON array on disk. Writes go to a sibling temp file
 * first and are renamed into place.
 */
export class JsonFileRegistryStorage implements RegistryStorage {
  constructor(private readonly filePath: string) {}

  load(): HostEntry[] {
    if (!existsSync(this.filePath)) {
      logger.info(`Registry file ${this.filePath} not found, starting with an empty registry`);
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new RegistryFileError(
        this.filePath,
        `Registry file ${this.filePath} is not valid JSON`,
        { cause: error }
      );
    }

    const parsed = registrySnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new RegistryFileError(this.filePath, `Registry file ${this.filePath} is invalid: ${details}`);
    }

    logger.info(`Loaded ${parsed.data.length} hosts from ${this.filePath}`);
    return parsed.data;
  }

  save(entries: readonly HostEntry[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });

    const tmpPath = `${this.filePath}.tmp`;
    writeFileSync(tmpPath, `${JSON.stringify(entries, null, 4)}\n`, 'utf-8');
    renameSync(tmpPath, this.filePath);

    logger.debug(`Saved ${entries.length} hosts to ${this.filePath}`);
  }
}
