import fs from 'fs';
import path from 'path';
import { config, LogLevel } from '../config';

type EntryLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export type LogMeta = Record<string, unknown>;

function serialize(value: unknown): unknown {
    if (value instanceof Error) {
        return {
            name: value.name,
            message: value.message,
            stack: value.stack,
        };
    }
    return value;
}

export class Logger {
    private logStream?: fs.WriteStream;

    constructor(
        private readonly minLevel: LogLevel = config.logLevel,
        logDir?: string
    ) {
        if (!logDir) return;

        const dir = path.resolve(logDir);
        try {
            fs.mkdirSync(dir, { recursive: true });
            this.logStream = fs.createWriteStream(path.join(dir, 'app.log'), { flags: 'a' });
            this.logStream.on('error', (err) => {
                console.error('Failed to write to log file stream:', err);
            });
        } catch (e) {
            console.error(`Failed to create log directory at ${dir}:`, e);
        }
    }

    private log(level: EntryLevel, message: string, meta?: LogMeta) {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

        const entry: LogMeta = {
            timestamp: new Date().toISOString(),
            level,
            message,
        };
        if (meta) {
            for (const [key, value] of Object.entries(meta)) {
                entry[key] = serialize(value);
            }
        }

        const line = JSON.stringify(entry);

        if (level === 'error') {
            console.error(line);
        } else {
            console.log(line);
        }

        if (this.logStream?.writable) {
            this.logStream.write(line + '\n');
        }
    }

    public debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    public info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    public warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    public error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    public close() {
        this.logStream?.end();
    }
}

export const logger = new Logger(
    config.logLevel,
    config.nodeEnv === 'production' ? config.paths.logs : undefined
);
