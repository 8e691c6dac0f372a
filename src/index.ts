export { loadConfig, resolveConfig, type Config, type SplashConfig } from './config.js';
export { createScaleContext, type ScaleContext, type ScaleContextOverrides } from './context.js';
export { ExternalOperationError, ResourceError, ValidationError, describeError } from './errors.js';
export { createLogger, logMetric, setDebug, type Logger } from './logger.js';
export { ScaleManager, type ScaleManagerOptions } from './scale_manager.js';
export {
  CoalescingQueue,
  type CoalescingQueueOptions,
  type QueueSnapshot,
  type ScaleJob,
} from './scaling/coalescing_queue.js';
export { EventNotifier, notifySafely, type Notifier, type ScaleSignal } from './scaling/notifier.js';
export * from './scaling/screen_factors.js';
export {
  CommandRethemer,
  LoggingRethemer,
  SplashProbe,
  readSplashTheme,
  themeScaleFactor,
  type AppliedFactorProbe,
  type Rethemer,
  type SplashThemes,
} from './scaling/splash.js';
export { readQtTheme, writeQtTheme } from './settings/qt_theme.js';
export {
  JsonSettingsStore,
  MemorySettingsStore,
  SettingsKeys,
  type SettingsKey,
  type SettingsStore,
} from './settings/settings_store.js';
export { cleanUpUserEnv } from './settings/user_env.js';
export { SettingsWatcher, type SettingsWatcherOptions } from './settings/watcher.js';
