import {
  DEFAULT_HOST_NAME,
  DEFAULT_HOST_USER,
  HostEntry,
  HostIdentityFields,
  HostStatus,
  isUsableMac,
} from '@lanwake/protocol';
import { logger } from '../utils/logger';
import { RegistryStorage } from './registryStorage';

export type NewHostFields = Pick<HostEntry, 'ip'> & Partial<Omit<HostIdentityFields, 'ip'>>;

export type HostUpdateFields = Partial<HostIdentityFields>;

// A MAC that fails the validity filter is stored as unknown.
function usableMacOrEmpty(mac: string | undefined): string {
  return isUsableMac(mac) ? mac.trim() : '';
}

/**
 * Registry Service
 * Owns the in-memory host list and mirrors every structural change to storage.
 */
class HostRegistry {
  private entries: HostEntry[] = [];
  private loaded = false;

  constructor(private readonly storage: RegistryStorage) {}

  async initialize(): Promise<void> {
    this.entries = this.storage.load().map((entry) => ({ ...entry }));
    this.loaded = true;
    logger.info(`Host registry initialized with ${this.entries.length} hosts`);
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  size(): number {
    return this.entries.length;
  }

  list(): HostEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get(id: number): HostEntry | undefined {
    const entry = this.find(id);
    return entry ? { ...entry } : undefined;
  }

  /**
   * One greater than the highest id in use, or 1 for an empty registry.
   * Deleting the highest entry frees its id for the next add.
   */
  nextId(): number {
    return this.entries.reduce((max, entry) => Math.max(max, entry.id), 0) + 1;
  }

  async add(fields: NewHostFields): Promise<HostEntry> {
    const entry: HostEntry = {
      id: this.nextId(),
      ip: fields.ip.trim(),
      mac: usableMacOrEmpty(fields.mac),
      name: fields.name?.trim() || DEFAULT_HOST_NAME,
      user: fields.user?.trim() || DEFAULT_HOST_USER,
      status: 'offline',
    };

    this.commit([...this.entries, entry]);

    logger.info(`Added host ${entry.id} (${entry.ip})`, { name: entry.name, mac: entry.mac });
    return { ...entry };
  }

  async update(id: number, fields: HostUpdateFields): Promise<HostEntry | undefined> {
    const current = this.find(id);
    if (!current) {
      return undefined;
    }

    const entry: HostEntry = {
      ...current,
      ip: fields.ip?.trim() ?? current.ip,
      mac: fields.mac === undefined ? current.mac : usableMacOrEmpty(fields.mac),
      name: fields.name?.trim() ?? current.name,
      user: fields.user?.trim() ?? current.user,
    };
    this.commit(this.entries.map((existing) => (existing.id === id ? entry : existing)));

    logger.info(`Updated host ${id}`, { fields: Object.keys(fields) });
    return { ...entry };
  }

  async delete(id: number): Promise<boolean> {
    if (!this.find(id)) {
      return false;
    }

    this.commit(this.entries.filter((entry) => entry.id !== id));

    logger.info(`Deleted host ${id}`);
    return true;
  }

  /**
   * Status is derived from the latest probe and is not written to storage.
   * Returns whether the stored status changed.
   */
  setStatus(id: number, status: HostStatus): boolean {
    const entry = this.find(id);
    if (!entry || entry.status === status) {
      return false;
    }

    const previous = entry.status;
    entry.status = status;
    logger.info(`Host ${id} (${entry.ip}) is now ${status}`, { previous });
    return true;
  }

  async close(): Promise<void> {
    this.loaded = false;
  }

  private find(id: number): HostEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  // The new list replaces the current one only once it is on disk.
  private commit(next: HostEntry[]): void {
    this.storage.save(next);
    this.entries = next;
  }
}

export default HostRegistry;
