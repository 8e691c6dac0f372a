import { z } from 'zod';
import { ResourceError, ValidationError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { CoalescingQueue } from './scaling/coalescing_queue.js';
import {
  computeCursorSize,
  computeWindowScale,
  getSingleScaleFactor,
  joinScreenScaleFactors,
  parseScreenFactors,
  singleToMap,
  type ScreenFactors,
} from './scaling/screen_factors.js';
import { writeQtTheme } from './settings/qt_theme.js';
import { SettingsKeys, type SettingsStore } from './settings/settings_store.js';
import { cleanUpUserEnv } from './settings/user_env.js';

const logger = createLogger('ScaleManager');

const ScreenFactorsSchema = z
  .record(z.string().min(1), z.number().finite().positive({ message: 'invalid value' }))
  .refine((factors) => Object.keys(factors).length > 0, { message: 'factors is empty' });

export interface ScaleManagerOptions {
  store: SettingsStore;
  queue: CoalescingQueue;
  qtThemeFile: string;
  greeterThemeFile?: string;
  userEnvFile: string;
  cleanEnvKeys: readonly string[];
  baseCursorSize?: number;
}

/**
 * Applies a scale change everywhere it matters: the settings store, the
 * toolkit theme file, the session env, and (through the queue) the boot
 * splash. Only the splash retheme is asynchronous.
 */
export class ScaleManager {
  private readonly store: SettingsStore;
  private readonly queue: CoalescingQueue;
  private readonly options: ScaleManagerOptions;
  private readonly baseCursorSize: number;

  constructor(options: ScaleManagerOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.options = options;
    this.baseCursorSize = options.baseCursorSize ?? 24;
  }

  /**
   * Sets per-screen factors. `factors` must include the primary screen, or
   * the reserved `ALL` entry when several screens share one value.
   *
   * @throws ValidationError before any change when `factors` is empty or holds a non-positive value
   */
  async setScreenScaleFactors(factors: ScreenFactors, notify: boolean): Promise<void> {
    logger.debug('setScreenScaleFactors', factors);
    const parsed = ScreenFactorsSchema.safeParse(factors);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '));
    }

    await this.setScaleFactor(getSingleScaleFactor(parsed.data), notify);

    await this.persist('individual-scaling', () =>
      this.store.setString(SettingsKeys.individualScaling, joinScreenScaleFactors(parsed.data))
    );

    await writeQtTheme(this.options.qtThemeFile, parsed.data, this.options.greeterThemeFile);

    try {
      const removed = await cleanUpUserEnv(this.options.userEnvFile, this.options.cleanEnvKeys);
      if (removed.length > 0) {
        logger.debug(`Removed ${removed.join(', ')} from ${this.options.userEnvFile}`);
      }
    } catch (e) {
      logger.warn(`Failed to clean up session env: ${describeError(e)}`);
    }
  }

  /** Single-value variant that emits no start/done signals. */
  setScaleFactorWithoutNotify(scale: number): Promise<void> {
    return this.setScreenScaleFactors(singleToMap(scale), false);
  }

  /** Persists the single factor and its derived values, then queues the splash retheme. */
  async setScaleFactor(scale: number, notify: boolean): Promise<void> {
    logger.debug('setScaleFactor', scale);
    await this.persist('scale-factor', () => this.store.setDouble(SettingsKeys.scaleFactor, scale));

    const windowScale = computeWindowScale(scale);
    const oldWindowScale = await this.read('window-scale', () => this.store.getInt(SettingsKeys.windowScale));
    if (oldWindowScale !== windowScale) {
      await this.persist('window-scale', () => this.store.setInt(SettingsKeys.windowScale, windowScale));
    }

    const cursorSize = computeCursorSize(scale, this.baseCursorSize);
    await this.persist('gtk-cursor-theme-size', () =>
      this.store.setInt(SettingsKeys.gtkCursorThemeSize, cursorSize)
    );
    await this.persist('cursor-size', () => this.store.setInt(SettingsKeys.cursorSize, cursorSize));

    await this.queue.submit(windowScale, notify);
  }

  async getScaleFactor(): Promise<number> {
    return (await this.read('scale-factor', () => this.store.getDouble(SettingsKeys.scaleFactor))) ?? 1;
  }

  async getWindowScale(): Promise<number> {
    return (await this.read('window-scale', () => this.store.getInt(SettingsKeys.windowScale))) ?? 1;
  }

  async getScreenScaleFactors(): Promise<ScreenFactors> {
    const joined = await this.read('individual-scaling', () =>
      this.store.getString(SettingsKeys.individualScaling)
    );
    return joined ? parseScreenFactors(joined) : {};
  }

  // Store failures are logged; the rest of the change still runs.
  private async persist(key: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (e) {
      logger.warn(describeError(new ResourceError('settings', `Failed to set ${key}`, { cause: e })));
    }
  }

  private async read<T>(key: string, get: () => Promise<T | undefined>): Promise<T | undefined> {
    try {
      return await get();
    } catch (e) {
      logger.warn(describeError(new ResourceError('settings', `Failed to get ${key}`, { cause: e })));
      return undefined;
    }
  }
}
