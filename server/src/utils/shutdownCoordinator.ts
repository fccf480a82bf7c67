/**
 * Shutdown Coordinator
 *
 * Runs registered cleanup tasks (HTTP server close, store handle destroy)
 * on SIGTERM/SIGINT, each bounded by its own timeout.
 */

import logger from './logger.js';

const shutdownLogger = logger.child({ module: 'shutdown' });

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * @param timeout - Max time to wait for the handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            shutdownLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, handler, timeout });
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Run every handler in parallel. A second call while one is running is a no-op.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            shutdownLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        shutdownLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results = await Promise.all(
            Array.from(this.handlers.values()).map((h) => this.runHandler(h))
        );

        const successful = results.filter(r => r.success).length;
        shutdownLogger.info({ successful, failed: results.length - successful }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const timedOut = await Promise.race([
                Promise.resolve(handler()).then(() => false),
                new Promise<boolean>((resolve) => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);
            const duration = Date.now() - start;

            if (timedOut) {
                shutdownLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            shutdownLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
