import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { loadConfig, type LogLevel } from './config';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Logger that writes to a file so that engine chatter never mixes with the
 * game's own output sink.
 */
export class Logger {
    private logFile: string;
    private level: LogLevel;
    private initialized: boolean = false;

    constructor(logFile: string, level: LogLevel) {
        this.logFile = resolve(process.cwd(), logFile);
        this.level = level;
    }

    /**
     * Create the log directory if needed and truncate the log file.
     */
    private async ensureInitialized(): Promise<void> {
        if (this.initialized) return;

        const logsDir = dirname(this.logFile);
        if (!existsSync(logsDir)) {
            await mkdir(logsDir, { recursive: true });
        }

        const timestamp = new Date().toISOString();
        await writeFile(this.logFile, `[${timestamp}] Logger initialized\n`, { flag: 'w' });
        this.initialized = true;
    }

    private format(level: string, message: string, args: unknown[]): string {
        const timestamp = new Date().toISOString();
        const formattedArgs = args.length > 0
            ? ' ' + args.map(arg => typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)).join(' ')
            : '';
        return `[${timestamp}] [${level}] ${message}${formattedArgs}`;
    }

    /**
     * Write a log entry to the file.
     * Fire-and-forget - doesn't block execution.
     */
    private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

        const logLine = this.format(level.toUpperCase(), message, args);
        this.ensureInitialized().then(() => {
            appendFile(this.logFile, logLine + '\n', 'utf8').catch((error: unknown) => {
                // Fallback to console if file write fails
                console.error('Failed to write to log file:', error);
                console.log(logLine);
            });
        }).catch(() => {
            console.log(logLine);
        });
    }

    log(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    /**
     * Point the logger at a new level and file. A new file is truncated on its first write.
     */
    configure(level: LogLevel, logFile: string): void {
        this.level = level;
        const resolved = resolve(process.cwd(), logFile);
        if (resolved !== this.logFile) {
            this.logFile = resolved;
            this.initialized = false;
        }
    }

    getLevel(): LogLevel {
        return this.level;
    }

    /**
     * Get the path to the current log file.
     */
    getLogFile(): string {
        return this.logFile;
    }
}

const config = loadConfig();

// Export singleton instance
export const logger = new Logger(config.logFile, config.logLevel);
