import type { LogLevelName } from '../Common/Log.js';

/**
 * Validated configuration shape used by the registry service and logger.
 */
export interface FrameworkConfig {
    /** Context every object joins when none is given. */
    defaultContext: string;
    /** First id handed out by auto-assignment in a fresh index. */
    autoIdStart: number;
    logLevel: LogLevelName;
}
