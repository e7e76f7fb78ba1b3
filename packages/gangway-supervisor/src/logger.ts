import { Logger } from './types';

/**
 * Console logger with a bracketed component tag, e.g. `[SUPERVISOR] ...`
 */
export function consoleLogger(tag: string = '[SUPERVISOR]'): Logger {
  return {
    info: (message) => console.log(`${tag} ${message}`),
    warn: (message) => console.warn(`${tag} ⚠️  ${message}`),
    error: (message) => console.error(`${tag} ❌ ${message}`)
  };
}
