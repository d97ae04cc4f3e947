import { pino, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string, name = 'ledger-chat-assistant'): Logger {
  return pino({ name, level });
}

export const silentLogger: Logger = pino({ enabled: false });
