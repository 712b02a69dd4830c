// Root logger. Modules log through `logger.child({ module })`.
import { pino, type Logger } from 'pino';

export interface LoggerOptions {
    name?: string;
    level?: string;
    pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const name = options.name ?? 'fillwatch';
    const level = options.level ?? 'info';

    if (options.pretty) {
        return pino({
            name,
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                },
            },
        });
    }

    return pino({ name, level });
}

/**
 * Logger that drops everything (tests, dry runs)
 */
export function createSilentLogger(): Logger {
    return pino({ level: 'silent' });
}
