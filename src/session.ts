/**
 * Session state tracking and operation guards.
 *
 *   disconnected -> connected -> authenticated -> notifying
 *
 * Any phase returns to disconnected on reset. Flags only move up one level at
 * a time, so `authenticated` implies `connected` and `notifying` implies
 * `authenticated`.
 */

import { LoginRequiredError, NotConnectedError } from './exceptions';
import type { SessionPhase } from './models/session';

export class SessionState {
  private _connected = false;
  private _authenticated = false;
  private _notifying = false;

  get connected(): boolean {
    return this._connected;
  }

  get authenticated(): boolean {
    return this._authenticated;
  }

  get notifying(): boolean {
    return this._notifying;
  }

  get phase(): SessionPhase {
    if (this._notifying) return 'notifying';
    if (this._authenticated) return 'authenticated';
    if (this._connected) return 'connected';
    return 'disconnected';
  }

  markConnected(): void {
    this._connected = true;
  }

  /**
   * Record the outcome of a login attempt. A failed attempt also drops any
   * facet subscription flag, since notifying requires a login.
   *
   * @throws {NotConnectedError} If not connected
   */
  markAuthenticated(authenticated: boolean): void {
    requireSession(this, 'connected');
    this._authenticated = authenticated;
    if (!authenticated) {
      this._notifying = false;
    }
  }

  /**
   * @throws {LoginRequiredError} If not authenticated
   */
  markNotifying(notifying: boolean): void {
    requireSession(this, 'authenticated');
    this._notifying = notifying;
  }

  reset(): void {
    this._connected = false;
    this._authenticated = false;
    this._notifying = false;
  }
}

/**
 * Guard clause for operations that need a minimum session phase.
 *
 * @throws {NotConnectedError} If `required` is connected and there is no link
 * @throws {LoginRequiredError} If `required` is authenticated and no login succeeded
 */
export function requireSession(
  session: SessionState,
  required: 'connected' | 'authenticated'
): void {
  if (required === 'connected' && !session.connected) {
    throw new NotConnectedError();
  }
  if (required === 'authenticated' && !session.authenticated) {
    throw new LoginRequiredError();
  }
}
