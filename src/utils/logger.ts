import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

// Extend Winston logger type
interface ExtendedLogger extends winston.Logger {
    logError: (error: unknown, context?: string, additionalData?: Record<string, unknown>) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

// Type guard for checking if object is an Error
function isError(obj: unknown): obj is Error {
    return obj instanceof Error;
}

// Metadata cleaning: bigints become strings, byte arrays become their length, cycles are cut
const cleanMetadata = (value: unknown, visited = new WeakSet<object>()): unknown => {
    if (value === undefined || value === null) {
        return value;
    }

    if (typeof value === 'bigint') {
        return value.toString();
    }

    if (value instanceof Uint8Array) {
        return `<${value.length} bytes>`;
    }

    if (isError(value)) {
        return `${value.name}: ${value.message}`;
    }

    if (!isRecord(value)) {
        return value;
    }

    if (visited.has(value)) {
        return '[Circular Reference]';
    }
    visited.add(value);

    if (Array.isArray(value)) {
        return value.map(item => cleanMetadata(item, visited));
    }

    const cleaned: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
        const cleanedValue = cleanMetadata(entry, visited);
        if (cleanedValue !== undefined) {
            cleaned[key] = cleanedValue;
        }
    }
    return Object.keys(cleaned).length > 0 ? cleaned : undefined;
};

// Message formatting function
const formatMessage = (message: unknown): string => {
    if (message === undefined || message === null) {
        return '';
    }

    if (isError(message)) {
        return `${message.name}: ${message.message}`;
    }

    if (typeof message === 'string') {
        return message;
    }

    if (isRecord(message) && typeof message.message === 'string') {
        return `Error: ${message.message}`;
    }

    try {
        return JSON.stringify(cleanMetadata(message));
    } catch {
        return String(message);
    }
};

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'stack', 'error', 'service', 'environment']);

const enhancedPrintFormat = (info: winston.Logform.TransformableInfo): string => {
    const level = typeof info.level === 'string' ? info.level.toUpperCase().padEnd(7) : 'INFO   ';
    const timestamp = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();

    let errorStack = typeof info.stack === 'string' ? info.stack : undefined;
    let message: string;

    if (isError(info.error)) {
        message = `${info.error.name}: ${info.error.message}`;
        errorStack = errorStack ?? info.error.stack;
    } else {
        message = formatMessage(info.message);
    }

    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(info)) {
        if (!RESERVED_KEYS.has(key)) {
            metadata[key] = value;
        }
    }
    if (isRecord(info.error) && !isError(info.error)) {
        metadata.error = info.error;
    }

    let log = `${timestamp} ${level}: ${message}`;

    const cleaned = cleanMetadata(metadata);
    if (cleaned !== undefined) {
        try {
            log += ` ${JSON.stringify(cleaned)}`;
        } catch {
            log += ' [Unserializable metadata]';
        }
    }

    if (errorStack) {
        log += `\n${errorStack}`;
    }

    return log;
};

const customFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(enhancedPrintFormat)
);

// Define custom levels and colors
const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    verbose: 4,
    debug: 5,
    trace: 6
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    verbose: 'cyan',
    debug: 'blue',
    trace: 'gray'
};

winston.addColors(colors);

const logToFile = process.env.LOG_TO_FILE !== 'false';

const rotatingFile = (name: string): DailyRotateFile => new DailyRotateFile({
    filename: `logs/${name}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '20m',
    zippedArchive: true,
    format: customFormat
});

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: customFormat,
        handleExceptions: true,
        handleRejections: true
    })
];

if (logToFile) {
    transports.push(rotatingFile('combined'));
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    levels,
    defaultMeta: {
        service: 'interchain-relay-engine',
        environment: process.env.NODE_ENV || 'development'
    },
    format: customFormat,
    transports,
    exitOnError: false
}) as ExtendedLogger;

if (logToFile) {
    logger.exceptions.handle(rotatingFile('exceptions'));
    logger.rejections.handle(rotatingFile('rejections'));
}

// Enhanced error logging helper
const logError = (error: unknown, context: string = '', additionalData: Record<string, unknown> = {}): void => {
    let errorMessage: string;
    let errorStack: string | undefined;
    let errorName = 'Error';

    if (isError(error)) {
        errorName = error.name;
        errorMessage = error.message;
        errorStack = error.stack;
    } else if (isRecord(error) && 'message' in error) {
        errorName = typeof error.name === 'string' ? error.name : typeof error.kind === 'string' ? error.kind : 'Error';
        errorMessage = String(error.message);
    } else if (typeof error === 'string') {
        errorMessage = error;
    } else {
        errorMessage = formatMessage(error);
    }

    logger.error(`${context ? context + ': ' : ''}${errorName}: ${errorMessage}`, {
        error: {
            error_name: errorName,
            error_message: errorMessage,
            context,
            ...additionalData
        },
        stack: errorStack
    });
};

logger.logError = logError;

export { logger };
export type { ExtendedLogger };
