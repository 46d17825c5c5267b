/**
 * Session phases, from least to most privileged.
 */
export type SessionPhase =
  | 'disconnected'
  | 'connected'
  | 'authenticated'
  | 'notifying';
