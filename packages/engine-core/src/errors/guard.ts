import { NotFoundError } from './EngineError.js';
import type { Logger } from '../logging/Logger.js';

/**
 * Per-tick component boundary. A stale handle inside `fn` aborts only `fn`:
 * it is logged and swallowed unless `strict`, in which case it propagates.
 * Every other error propagates unchanged.
 *
 * @returns whether `fn` completed
 */
export function guardTick(logger: Logger, strict: boolean, where: string, fn: () => void): boolean {
    try {
        fn();
        return true;
    } catch (err) {
        if (!strict && err instanceof NotFoundError) {
            logger.error(`${where}: ${err.message}`);
            return false;
        }
        throw err;
    }
}
