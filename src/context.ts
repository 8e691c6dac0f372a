/**
 * Scale Context - owns every collaborator of a scale session.
 * Built once per session and passed to the entry points; nothing here is a
 * module-level singleton.
 */

import type { Config } from './config.js';
import { ScaleManager } from './scale_manager.js';
import { CoalescingQueue } from './scaling/coalescing_queue.js';
import { EventNotifier, type Notifier } from './scaling/notifier.js';
import {
  CommandRethemer,
  LoggingRethemer,
  SplashProbe,
  type AppliedFactorProbe,
  type Rethemer,
} from './scaling/splash.js';
import { JsonSettingsStore, MemorySettingsStore, type SettingsStore } from './settings/settings_store.js';

export interface ScaleContext {
  config: Config;
  store: SettingsStore;
  notifier: Notifier;
  queue: CoalescingQueue;
  manager: ScaleManager;
}

export interface ScaleContextOverrides {
  store?: SettingsStore;
  notifier?: Notifier;
  rethemer?: Rethemer;
  probe?: AppliedFactorProbe;
  /** Keep settings in memory and log splash rethemes instead of running them. */
  dryRun?: boolean;
}

export function createScaleContext(config: Config, overrides: ScaleContextOverrides = {}): ScaleContext {
  const dryRun = overrides.dryRun ?? false;
  const dryRethemer = dryRun ? new LoggingRethemer() : undefined;

  const store =
    overrides.store ?? (dryRun ? new MemorySettingsStore() : new JsonSettingsStore(config.settingsFile));
  const notifier = overrides.notifier ?? new EventNotifier();
  const rethemer =
    overrides.rethemer ?? dryRethemer ?? new CommandRethemer(config.splash.command, config.splash.themes);
  const probe = overrides.probe ?? dryRethemer ?? new SplashProbe(config.splash.configFile, config.splash.themes);

  const queue = new CoalescingQueue({
    rethemer,
    notifier,
    probe,
    minFactor: config.minFactor,
    maxFactor: config.maxFactor,
    metricsDir: config.metricsDir,
  });

  const manager = new ScaleManager({
    store,
    queue,
    qtThemeFile: config.qtThemeFile,
    greeterThemeFile: config.greeterThemeFile,
    userEnvFile: config.userEnvFile,
    cleanEnvKeys: config.cleanEnvKeys,
    baseCursorSize: config.baseCursorSize,
  });

  return { config, store, notifier, queue, manager };
}
