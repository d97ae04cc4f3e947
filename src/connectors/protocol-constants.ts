// Protocol versions offered during the initialize handshake, newest first.
// Servers built on older SDKs reject the newer ones, so the client walks
// down the list until one is accepted.

export const SUPPORTED_PROTOCOL_VERSIONS = [
  '2025-11-25',
  '2025-06-18',
  '2025-03-26',
  '2024-11-05',
  '2024-10-07'
] as const;

export const CLIENT_INFO = { name: 'ledger-chat-assistant', version: '0.1.0' } as const;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_STOP_GRACE_MS = 2000;
