/**
 * Settings Watcher - reapplies per-screen factors edited straight into the
 * settings file. Uses chokidar for cross-platform watching.
 */

import * as chokidar from 'chokidar';
import { EventEmitter } from 'events';
import { describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ScaleManager } from '../scale_manager.js';
import { joinScreenScaleFactors, parseScreenFactors } from '../scaling/screen_factors.js';
import { SettingsKeys, type SettingsStore } from './settings_store.js';

const logger = createLogger('SettingsWatcher');

export interface SettingsWatcherOptions {
  file: string;
  store: SettingsStore;
  manager: ScaleManager;
  onApplied?: (factors: Record<string, number>) => void;
}

export class SettingsWatcher extends EventEmitter {
  private watcher: chokidar.FSWatcher | null = null;
  private lastSeen: string | undefined;

  constructor(private options: SettingsWatcherOptions) {
    super();
    if (options.onApplied) this.on('applied', options.onApplied);
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const initial = await this.readIndividualScaling();
    this.lastSeen = initial === undefined ? undefined : joinScreenScaleFactors(parseScreenFactors(initial));
    logger.debug(`Watching ${this.options.file}`);

    this.watcher = chokidar.watch(this.options.file, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 50
      }
    });

    this.watcher
      .on('add', () => this.onFileEvent())
      .on('change', () => this.onFileEvent());
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
      logger.debug('Watcher stopped');
    }
  }

  /**
   * Applies the stored per-screen factors if they changed since last seen.
   * @returns true when a scale change was made
   */
  async handleChange(): Promise<boolean> {
    const current = await this.readIndividualScaling();
    if (current === undefined) {
      return false;
    }

    const factors = parseScreenFactors(current);
    // compared in normalized form, which is what our own write stores
    const normalized = joinScreenScaleFactors(factors);
    if (normalized === this.lastSeen) {
      return false;
    }
    this.lastSeen = normalized;
    if (Object.keys(factors).length === 0) {
      logger.warn(`Ignoring unparsable ${SettingsKeys.individualScaling}: ${current}`);
      return false;
    }

    logger.info(`Settings changed, applying ${this.lastSeen}`);
    await this.options.manager.setScreenScaleFactors(factors, true);
    this.emit('applied', factors);
    return true;
  }

  private onFileEvent(): void {
    this.handleChange().catch((e) => logger.error(`Failed to apply settings change: ${describeError(e)}`));
  }

  private async readIndividualScaling(): Promise<string | undefined> {
    try {
      return await this.options.store.getString(SettingsKeys.individualScaling);
    } catch (e) {
      logger.warn(`Cannot read settings: ${describeError(e)}`);
      return undefined;
    }
  }
}
