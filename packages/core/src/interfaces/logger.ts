/**
 * Structural logger accepted by every package.
 *
 * The runner's Logger implements it; tests pass a vi.fn() stub.
 */
export interface StageLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/** Logger that drops everything, for components used without a runner */
export const silentLogger: StageLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
