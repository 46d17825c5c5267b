/**
 * Console-compatible logger accepted by the client. Defaults to `console`.
 */
export type Logger = Pick<Console, 'log' | 'debug' | 'warn'>;

/**
 * Hex dump for protocol traces, e.g. "01 02 ff".
 */
export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}
