import type { SubsystemLogger } from '../../logging/subsystem.js';
import { errorMeta } from '../../logging/subsystem.js';

/**
 * Awaits a source read, substituting `fallback` when it rejects
 */
export async function softRead<T>(
  read: () => Promise<T>,
  fallback: T,
  logger: SubsystemLogger,
  what: string,
): Promise<T> {
  try {
    return await read();
  } catch (error) {
    logger.debug(`Transient read failure: ${what}`, errorMeta(error));
    return fallback;
  }
}
