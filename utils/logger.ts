import * as path from 'path';

// Log levels
type LogLevelType = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
    SILENT: 4
} as const;

// ANSI color codes
const colors = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
} as const;

function isLogLevelType(value: string): value is LogLevelType {
    return value in LogLevel;
}

export class Logger {
    private level: number;
    private useColors: boolean;
    private workspaceRoot: string;
    private context: string | null = null;

    constructor() {
        // Get log level from environment variable, default to INFO
        const envLevel = process.env.LOG_LEVEL?.toUpperCase();
        this.level = envLevel && isLogLevelType(envLevel) ? LogLevel[envLevel] : LogLevel.INFO;

        // Option to disable colors (useful for file output or CI)
        this.useColors = process.env.LOG_NO_COLOR !== 'true';

        this.workspaceRoot = process.cwd();
    }

    /**
     * Set the current log level programmatically
     */
    setLevel(level: string): void {
        const upperLevel = level.toUpperCase();
        if (isLogLevelType(upperLevel)) {
            this.level = LogLevel[upperLevel];
        }
    }

    /**
     * Get the current log level as a string
     */
    getLevel(): string {
        const names = Object.keys(LogLevel).filter(isLogLevelType);
        return names.find(key => LogLevel[key] === this.level) || 'INFO';
    }

    /**
     * Get the calling file name from the stack trace
     */
    _getCallerFile(): string {
        if (this.context) return this.context;
        const originalPrepareStackTrace = Error.prepareStackTrace;
        let frames: NodeJS.CallSite[] = [];
        try {
            Error.prepareStackTrace = (_err, stack) => {
                frames = stack;
                return '';
            };
            void new Error().stack;

            // First frame outside this file
            for (const frame of frames) {
                const fileName = frame.getFileName();
                if (fileName && !fileName.includes('logger.js') && !fileName.includes('logger.ts')) {
                    const relativePath = path.relative(this.workspaceRoot, fileName);
                    if (relativePath.startsWith('..')) {
                        return path.basename(fileName);
                    }
                    return relativePath;
                }
            }
            return 'unknown';
        } finally {
            Error.prepareStackTrace = originalPrepareStackTrace;
        }
    }

    _getTimestamp(): string {
        const now = new Date();
        const hours = String(now.getHours()).padStart(2, '0');
        const minutes = String(now.getMinutes()).padStart(2, '0');
        const seconds = String(now.getSeconds()).padStart(2, '0');
        const ms = String(now.getMilliseconds()).padStart(3, '0');
        return `${hours}:${minutes}:${seconds}.${ms}`;
    }

    _colorize(text: string, color: string): string {
        if (!this.useColors) return text;
        return `${color}${text}${colors.reset}`;
    }

    /**
     * Core logging method
     */
    _log(level: number, levelName: string, color: string, args: unknown[]): void {
        if (this.level > level) return;

        const levelTag = this._colorize(`[${levelName}]`, color);
        const timeTag = this._colorize(`[${this._getTimestamp()}]`, colors.gray);
        const fileTag = this._colorize(`[${this._getCallerFile()}]`, colors.cyan);

        // Diagnostics go to stderr so they never mix with shell output
        console.error(`${timeTag} ${levelTag} ${fileTag}`, ...args);
    }

    debug(...args: unknown[]): void {
        this._log(LogLevel.DEBUG, 'DEBUG', colors.gray, args);
    }

    info(...args: unknown[]): void {
        this._log(LogLevel.INFO, 'INFO ', colors.green, args);
    }

    warn(...args: unknown[]): void {
        this._log(LogLevel.WARN, 'WARN ', colors.yellow, args);
    }

    error(...args: unknown[]): void {
        this._log(LogLevel.ERROR, 'ERROR', colors.red, args);
    }

    /**
     * Create a child logger with a specific context/prefix.
     * The child shares the parent's level, so `setLevel` on the root affects it.
     */
    child(context: string): Logger {
        const childLogger: Logger = Object.create(this);
        childLogger.context = context;
        return childLogger;
    }
}

// Create and export a singleton instance
const logger = new Logger();

export default logger;
