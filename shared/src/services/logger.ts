import type { ILogger } from './DependencyInjection';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
    return LEVELS.some(level => level === value);
}

export class LoggerService implements ILogger {
    private static instance: LoggerService;
    private level: LogLevel;

    private constructor() {
        const fromEnv = process.env.LOG_LEVEL;
        this.level = isLogLevel(fromEnv) ? fromEnv : 'info';
    }

    public static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService();
        }
        return LoggerService.instance;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    public info(message: string, meta?: unknown) {
        if (this.shouldLog('info')) {
            console.log(`[INFO] ${new Date().toISOString()}: ${message}`, meta ?? '');
        }
    }

    public error(message: string, error?: unknown) {
        if (this.shouldLog('error')) {
            console.error(`[ERROR] ${new Date().toISOString()}: ${message}`, error ?? '');
        }
    }

    public warn(message: string, meta?: unknown) {
        if (this.shouldLog('warn')) {
            console.warn(`[WARN] ${new Date().toISOString()}: ${message}`, meta ?? '');
        }
    }

    public debug(message: string, meta?: unknown) {
        if (this.shouldLog('debug')) {
            console.debug(`[DEBUG] ${new Date().toISOString()}: ${message}`, meta ?? '');
        }
    }

    /**
     * Line-oriented sink for morgan's `stream` option
     */
    public stream(): { write: (line: string) => void } {
        return { write: (line: string) => this.info(line.trim()) };
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
    }
}

export const logger = LoggerService.getInstance();
