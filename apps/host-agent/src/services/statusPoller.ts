import { HostEntry, HostStatus } from '@lanwake/protocol';
import { config } from '../config';
import { logger } from '../utils/logger';
import HostRegistry from './hostRegistry';
import * as networkDiscovery from './networkDiscovery';

type PollerDiscoveryDeps = Pick<typeof networkDiscovery, 'probeHost'>;

type PollerRegistry = Pick<HostRegistry, 'list' | 'setStatus'>;

export interface PollCycleResult {
  probed: number;
  online: number;
  offline: number;
  error: number;
  changed: number;
}

export interface StatusPollerOptions {
  probeTimeoutMs?: number;
  concurrency?: number;
}

/**
 * Keeps every registry entry's status current by probing it on a fixed period.
 * Runs independently from request handling; writes go through
 * `HostRegistry.setStatus` by id, never through a held entry reference.
 */
class StatusPoller {
  private timer?: NodeJS.Timeout;
  private running = false;
  private cycleInFlight = false;
  private intervalMs: number = config.network.pollInterval;
  private pollInProgress = false;
  private lastPollTime: Date | null = null;
  private readonly probeTimeoutMs: number;
  private readonly concurrency: number;

  constructor(
    private readonly registry: PollerRegistry,
    private readonly discovery: PollerDiscoveryDeps = networkDiscovery,
    options: StatusPollerOptions = {}
  ) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? config.network.pollTimeout;
    this.concurrency = Math.max(1, options.concurrency ?? config.network.pollConcurrency);
  }

  isRunning(): boolean {
    return this.running;
  }

  isPollInProgress(): boolean {
    return this.pollInProgress;
  }

  getLastPollTime(): string | null {
    return this.lastPollTime ? this.lastPollTime.toISOString() : null;
  }

  async pollOnce(): Promise<PollCycleResult> {
    this.pollInProgress = true;
    const result: PollCycleResult = { probed: 0, online: 0, offline: 0, error: 0, changed: 0 };

    try {
      const snapshot = this.registry.list();

      for (let i = 0; i < snapshot.length; i += this.concurrency) {
        const batch = snapshot.slice(i, i + this.concurrency);
        const statuses = await Promise.all(batch.map((entry) => this.probeEntry(entry)));

        batch.forEach((entry, index) => {
          const status = statuses[index];
          result.probed++;
          result[status]++;
          if (this.registry.setStatus(entry.id, status)) {
            result.changed++;
          }
        });
      }

      logger.debug(
        `Status poll complete: ${result.online} online, ${result.offline} offline, ${result.error} error`
      );
      return result;
    } finally {
      this.pollInProgress = false;
      this.lastPollTime = new Date();
    }
  }

  /**
   * Runs a cycle now, then one `intervalMs` after each cycle completes. A cycle
   * still running from before a `stop()` is not doubled: the loop resumes when
   * it finishes.
   */
  start(intervalMs: number = config.network.pollInterval): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.intervalMs = intervalMs;
    logger.info(`Starting status polling every ${intervalMs / 1000}s`);
    if (!this.cycleInFlight) {
      this.runCycle();
    }
  }

  /**
   * A cycle already in flight completes but does not schedule another.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    logger.info('Stopped status polling');
  }

  private runCycle(): void {
    this.timer = undefined;
    this.cycleInFlight = true;
    void this.pollOnce()
      .catch((error: unknown) => {
        logger.error('Status poll cycle failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.cycleInFlight = false;
        if (this.running) {
          this.timer = setTimeout(() => this.runCycle(), this.intervalMs);
        }
      });
  }

  private async probeEntry(entry: HostEntry): Promise<HostStatus> {
    try {
      const alive = await this.discovery.probeHost(entry.ip, this.probeTimeoutMs);
      return alive ? 'online' : 'offline';
    } catch (error: unknown) {
      logger.debug(`Probe error for host ${entry.id} (${entry.ip})`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return 'error';
    }
  }
}

export default StatusPoller;
