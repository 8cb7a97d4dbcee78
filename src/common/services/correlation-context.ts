import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level AsyncLocalStorage for correlation IDs.
 * This is NOT a NestJS service - it's a standalone module with singleton storage.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs `fn` under a fresh correlation ID. Every log line and event produced
 * inside (including nested calls) shares that ID.
 *
 * @example
 * await withCorrelationId(async () => {
 *   environment.update();
 *   this.logger.log({ message: 'Tick processed', correlationId: getCorrelationId() });
 * });
 */
export function withCorrelationId<T>(fn: () => Promise<T>): Promise<T> {
  return correlationStorage.run(uuidv4(), fn);
}

/**
 * Current correlation ID, or undefined outside {@link withCorrelationId}.
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
