/**
 * Debug logging.
 *
 * Lines go through console.log as `[castep-bin] [Scope] message` and only
 * when the `debug` option is set.
 */

export type Logger = (scope: string, message: string) => void;

export const silentLogger: Logger = () => {};

export function createLogger(enabled: boolean): Logger {
  if (!enabled) return silentLogger;
  return (scope, message) => {
    console.log(`[castep-bin] [${scope}] ${message}`);
  };
}
