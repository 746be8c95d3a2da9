import type { Logger } from '../bridge/console';

export interface CapturedLines {
    log: string[];
    warn: string[];
    error: string[];
}

export function captureLogger(): { logger: Logger; lines: CapturedLines } {
    const lines: CapturedLines = { log: [], warn: [], error: [] };
    const join = (args: unknown[]) => args.map(String).join(' ');
    const logger: Logger = {
        log: (...args) => { lines.log.push(join(args)); },
        warn: (...args) => { lines.warn.push(join(args)); },
        error: (...args) => { lines.error.push(join(args)); },
    };
    return { logger, lines };
}
