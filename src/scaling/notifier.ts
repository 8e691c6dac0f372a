import { EventEmitter } from 'events';
import { ResourceError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';

export type ScaleSignal = 'SetScaleFactorStarted' | 'SetScaleFactorDone';

export interface Notifier {
  emit(signal: ScaleSignal): unknown;
}

/** In-process notifier; observers subscribe with `on(signal, listener)`. */
export class EventNotifier extends EventEmitter implements Notifier {}

/** Best-effort delivery: failures are logged, never thrown. */
export async function notifySafely(notifier: Notifier, signal: ScaleSignal, logger: Logger): Promise<void> {
  try {
    await notifier.emit(signal);
  } catch (e) {
    const err = new ResourceError('notifier', `Failed to emit ${signal}`, { cause: e });
    logger.warn(describeError(err));
  }
}
