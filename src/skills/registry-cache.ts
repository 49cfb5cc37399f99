/**
 * Registry Cache - one registry snapshot per process, replaced wholesale on refresh
 */

import type { RegistryLoadOptions } from './types.js';
import { loadRegistry, type SkillRegistry } from './registry.js';
import { logger } from '../base/utils/logger.js';

/** Skill directories are refreshed weekly unless configured otherwise */
export const DEFAULT_REFRESH_INTERVAL_MS = 7 * 24 * 60 * 60 * 1000;

export type RegistryLoader = (
  sourcePath: string,
  options: RegistryLoadOptions
) => Promise<SkillRegistry>;

export interface RegistryCacheOptions extends RegistryLoadOptions {
  refreshIntervalMs?: number;
  /** Replaces loadRegistry, e.g. in tests */
  loader?: RegistryLoader;
}

export class RegistryCache {
  private snapshot: SkillRegistry | null = null;
  private inflight: Promise<SkillRegistry> | null = null;
  private readonly refreshIntervalMs: number;
  private readonly loader: RegistryLoader;

  constructor(
    readonly sourcePath: string,
    private readonly options: RegistryCacheOptions = {}
  ) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.loader = options.loader ?? loadRegistry;
  }

  /**
   * Current snapshot, loading it on first use
   */
  async get(): Promise<SkillRegistry> {
    if (this.snapshot) return this.snapshot;
    return this.refresh();
  }

  /**
   * Current snapshot without loading
   */
  peek(): SkillRegistry | null {
    return this.snapshot;
  }

  /**
   * Load a new snapshot and swap it in
   *
   * Concurrent calls share one load. If the load fails the previous snapshot
   * stays in place and the error is rethrown.
   */
  refresh(): Promise<SkillRegistry> {
    if (this.inflight) return this.inflight;

    const loadOptions: RegistryLoadOptions = {
      layout: this.options.layout,
      ignore: this.options.ignore,
    };

    this.inflight = this.loader(this.sourcePath, loadOptions)
      .then(
        (registry) => {
          this.snapshot = registry;
          return registry;
        },
        (error: unknown) => {
          if (this.snapshot) {
            logger.warn('Registry', 'Refresh failed, keeping previous snapshot', {
              dir: this.sourcePath,
              error: error instanceof Error ? error.message : String(error),
            });
          }
          throw error;
        }
      )
      .finally(() => {
        this.inflight = null;
      });

    return this.inflight;
  }

  isStale(now: Date = new Date()): boolean {
    if (!this.snapshot) return true;
    return now.getTime() - this.snapshot.loadedAt.getTime() >= this.refreshIntervalMs;
  }

  /**
   * Current snapshot, refreshed first when older than the refresh interval
   */
  async getFresh(now: Date = new Date()): Promise<SkillRegistry> {
    if (this.snapshot && !this.isStale(now)) return this.snapshot;
    return this.refresh();
  }
}
