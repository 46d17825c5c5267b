/**
 * Scoped device sessions.
 */

import { TimeFlipDevice, type TimeFlipDeviceOptions } from './device';
import type { BleLink } from './transport/link';

/**
 * Connect, run `fn`, then disconnect (stopping facet notifications first)
 * on every exit path.
 *
 * If `fn` throws and the cleanup fails too, the cleanup failure is logged as a
 * warning and the error from `fn` is rethrown.
 *
 * @example
 * ```typescript
 * const history = await withTimeFlip(link, async (device) => {
 *   await device.login();
 *   return device.history();
 * });
 * ```
 */
export async function withTimeFlip<T>(
  link: BleLink,
  fn: (device: TimeFlipDevice) => Promise<T>,
  options: TimeFlipDeviceOptions = {}
): Promise<T> {
  const device = new TimeFlipDevice(link, options);
  const logger = options.logger ?? console;

  await device.connect();

  let result: T;
  try {
    result = await fn(device);
  } catch (error) {
    if (device.isConnected) {
      try {
        await device.disconnect();
      } catch (cleanupError) {
        logger.warn('Disconnect after failure also failed', cleanupError);
      }
    }
    throw error;
  }

  if (device.isConnected) {
    await device.disconnect();
  }
  return result;
}
