/**
 * Facet change notifications.
 */

import { BLEConnectionError, TimeFlipError } from './exceptions';
import type { Logger } from './logger';
import { Characteristic } from './protocol/constants';
import { parseFacet } from './protocol/responses';
import { requireSession, type SessionState } from './session';
import type { BleLink } from './transport/link';

/**
 * Called with the facet id (0-63) each time the device reports a new face up.
 * Facet 63 means the device was paused.
 */
export type FacetHandler = (facet: number) => void | Promise<void>;

function subscriptionError(op: string, error: unknown): TimeFlipError {
  if (error instanceof TimeFlipError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BLEConnectionError(`Failed to ${op} facet notifications: ${message}`, {
    cause: error,
  });
}

/**
 * Push-driven facet stream. Runs outside the command channel, so it neither
 * waits for nor delays command exchanges.
 */
export class FacetNotificationStream {
  constructor(
    private link: BleLink,
    private session: SessionState,
    private logger: Logger = console
  ) {}

  /**
   * Subscribe to facet changes. A running subscription is replaced.
   *
   * Handler failures are not caught here: they reach the link's dispatch.
   *
   * @throws {LoginRequiredError} If not logged in
   * @throws {BLEConnectionError} If the link fails to subscribe
   */
  async start(handler: FacetHandler): Promise<void> {
    requireSession(this.session, 'authenticated');

    if (this.session.notifying) {
      await this.stop();
    }

    try {
      await this.link.subscribe(Characteristic.facet, (data) => {
        const facet = parseFacet(data);
        this.logger.debug(`Facet changed: ${facet}`);
        return handler(facet);
      });
    } catch (error) {
      throw subscriptionError('start', error);
    }

    this.session.markNotifying(true);
    this.logger.log('Facet notifications started');
  }

  /**
   * @throws {LoginRequiredError} If not logged in
   * @throws {BLEConnectionError} If the link fails to unsubscribe
   */
  async stop(): Promise<void> {
    requireSession(this.session, 'authenticated');

    try {
      await this.link.unsubscribe(Characteristic.facet);
    } catch (error) {
      throw subscriptionError('stop', error);
    }
    this.session.markNotifying(false);
    this.logger.log('Facet notifications stopped');
  }
}
