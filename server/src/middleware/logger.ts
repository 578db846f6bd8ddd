import { Request, Response, NextFunction } from 'express';
import { SERVER_CONFIG, LOG_LEVELS, type LogLevel } from '../config/app.config';

// ANSI color codes for terminal output
const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',

    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    cyan: '\x1b[36m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    white: '\x1b[37m',
};

// Method colors
const methodColors: Record<string, string> = {
    GET: colors.cyan,
    POST: colors.green,
    PUT: colors.yellow,
    PATCH: colors.yellow,
    DELETE: colors.red,
};

// Status color based on response code
const getStatusColor = (status: number): string => {
    if (status >= 500) return colors.red;
    if (status >= 400) return colors.yellow;
    if (status >= 300) return colors.cyan;
    if (status >= 200) return colors.green;
    return colors.white;
};

// Format duration
const formatDuration = (ms: number): string => {
    if (ms < 100) return `${colors.green}${ms.toFixed(0)}ms${colors.reset}`;
    if (ms < 500) return `${colors.yellow}${ms.toFixed(0)}ms${colors.reset}`;
    return `${colors.red}${ms.toFixed(0)}ms${colors.reset}`;
};

// Get timestamp
const getTimestamp = (): string => {
    return new Date().toLocaleTimeString('en-US', { hour12: true });
};

const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(SERVER_CONFIG.logging.level);

/** Structured fields printed after a log line: entity ids, triggers, errors */
export type LogContext = Record<string, unknown>;

const serializeValue = (value: unknown): unknown => {
    if (value instanceof Error) {
        const details: Record<string, unknown> = { name: value.name, message: value.message };
        if (value.cause !== undefined) details.cause = serializeValue(value.cause);
        return details;
    }
    return value;
};

const formatContext = (context?: LogContext): string => {
    if (!context) return '';
    const entries = Object.entries(context).map(([key, value]) => [key, serializeValue(value)]);
    return JSON.stringify(Object.fromEntries(entries), null, 2);
};

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const method = req.method;
    const path = req.originalUrl || req.url;
    const methodColor = methodColors[method] || colors.white;

    if (enabled('debug')) {
        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${methodColor}${colors.bright}${method}${colors.reset} ` +
            `${path} ${colors.dim}started...${colors.reset}`
        );
    }

    res.on('finish', () => {
        if (!enabled('info')) return;

        const duration = Date.now() - startTime;
        const statusCode = res.statusCode;
        const isSuccess = statusCode < 400;

        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${methodColor}${colors.bright}${method}${colors.reset} ` +
            `${path} ` +
            `${getStatusColor(statusCode)}${statusCode}${colors.reset} ` +
            `${isSuccess ? '✅' : '❌'} ${isSuccess ? colors.green : colors.red}${isSuccess ? 'SUCCESS' : 'ERROR'}${colors.reset} ` +
            `[${formatDuration(duration)}]`
        );
    });

    next();
};

// Console log helper for specific operations
export const logger = {
    debug: (message: string, context?: LogContext) => {
        if (!enabled('debug')) return;
        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.dim}🔍 DEBUG${colors.reset} ` +
            `${message}`,
            formatContext(context)
        );
    },

    info: (message: string, context?: LogContext) => {
        if (!enabled('info')) return;
        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.blue}ℹ️  INFO${colors.reset} ` +
            `${message}`,
            formatContext(context)
        );
    },

    success: (message: string, context?: LogContext) => {
        if (!enabled('info')) return;
        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.green}✅ SUCCESS${colors.reset} ` +
            `${message}`,
            formatContext(context)
        );
    },

    warn: (message: string, context?: LogContext) => {
        if (!enabled('warn')) return;
        console.warn(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.yellow}⚠️  WARN${colors.reset} ` +
            `${message}`,
            formatContext(context)
        );
    },

    error: (message: string, context?: LogContext) => {
        if (!enabled('error')) return;
        console.error(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.red}❌ ERROR${colors.reset} ` +
            `${message}`,
            formatContext(context)
        );
    },

    db: (operation: string, table: string, duration?: number) => {
        if (!enabled('debug')) return;
        const durationText = duration ? ` [${formatDuration(duration)}]` : '';
        console.log(
            `${colors.dim}[${getTimestamp()}]${colors.reset} ` +
            `${colors.magenta}🗄️  DB${colors.reset} ` +
            `${operation} on ${colors.cyan}${table}${colors.reset}${durationText}`
        );
    },
};
