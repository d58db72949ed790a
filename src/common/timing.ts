import { Logger } from "./logger";

/**
 * Runs `fn` and logs its duration at debug level. Nothing is logged when debug
 * is off, but the call still runs.
 */
export async function timed<T>(
  logger: Logger,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    return await fn();
  } finally {
    if (logger.isDebugEnabled()) {
      const ms = Date.now() - start;
      logger.with().str("op", label).num("ms", ms).logger().debug(`[${label}] took ${ms} ms`);
    }
  }
}
