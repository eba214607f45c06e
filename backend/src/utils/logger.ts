import pino from 'pino';
import { config } from '../config';
import type { AppConfig } from '../config';

export type Logger = pino.Logger;

// Credentials must never reach the log stream, whatever object carries them
const REDACT_PATHS = [
    'password',
    'currentPassword',
    'newPassword',
    'passwordHash',
    'password_hash',
    'refreshToken',
    'accessToken',
    'cpf',
    'req.headers.authorization',
    'req.headers.cookie',
];

const LEVEL_BY_ENV = {
    production: 'info',
    development: 'debug',
    test: 'silent',
} as const;

export interface LoggerSettings {
    level: pino.LevelWithSilent;
    pretty: boolean;
}

/** LOG_LEVEL wins over the per-environment default. */
export function loggerSettings(cfg: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): LoggerSettings {
    return {
        level: cfg.logLevel ?? LEVEL_BY_ENV[cfg.nodeEnv],
        pretty: cfg.nodeEnv === 'development',
    };
}

function prettyTransport(): pino.TransportSingleOptions | undefined {
    try {
        require.resolve('pino-pretty');
    } catch {
        // pino-pretty is a dev dependency; production installs go without it
        return undefined;
    }
    return { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } };
}

export function createLogger(settings: LoggerSettings, destination?: pino.DestinationStream): Logger {
    const options: pino.LoggerOptions = {
        level: settings.level,
        serializers: { err: pino.stdSerializers.err },
        base: { service: 'support-auth' },
        redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    };

    if (destination) return pino(options, destination);

    if (settings.pretty) {
        options.transport = prettyTransport();
    }
    return pino(options);
}

export const logger = createLogger(loggerSettings(config));

/** One child per component, so every line says where it came from */
export function createChildLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
    return logger.child({ component, ...bindings });
}
