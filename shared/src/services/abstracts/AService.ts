/**
 * Base abstract class for all services.
 *
 * Services expose an initialization order plus `initialize()` and `dispose()`
 * lifecycle hooks. Lower `order` values are started first and stopped last.
 *
 * @example
 * ```typescript
 * export abstract class ALogger extends AService {
 *   readonly order = -100;  // Initialize first
 *
 *   abstract info(message: string): void;
 * }
 * ```
 */
export abstract class AService {
  /**
   * Initialization order. Lower numbers initialize first.
   * - -100: ALogger
   * - -90: ALogCapture
   * - -30: cache services
   * - 0: default
   */
  readonly order: number = 0;

  /**
   * Perform async setup. Default: no-op.
   */
  async initialize(): Promise<void> {
    // Default: no-op, override in subclasses that need async init
  }

  /**
   * Release resources. Default: no-op.
   */
  async dispose(): Promise<void> {
    // Default: no-op, override in subclasses that need cleanup
  }
}

/**
 * Initialize services in ascending `order`.
 */
export async function initializeServices(services: AService[]): Promise<void> {
  const ordered = [...services].sort((a, b) => a.order - b.order);
  for (const service of ordered) {
    await service.initialize();
  }
}

/**
 * Dispose services in descending `order`, so that logging goes last.
 */
export async function disposeServices(services: AService[]): Promise<void> {
  const ordered = [...services].sort((a, b) => b.order - a.order);
  for (const service of ordered) {
    await service.dispose();
  }
}
