export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LEVEL_RANK = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
} satisfies Record<LogLevel, number>;

const isLogLevel = (value: string): value is LogLevel =>
    Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

export const resolveLogLevel = (level?: string): LogLevel => {
    const normalized = level?.trim().toLowerCase();
    if (typeof normalized === "string" && isLogLevel(normalized)) {
        return normalized;
    }
    return DEFAULT_LOG_LEVEL;
};

type Sink = Pick<Console, "debug" | "info" | "warn" | "error">;

export function createConsoleLogger(
    level: LogLevel = resolveLogLevel(process.env.ARKIV_LOG_LEVEL),
    sink: Sink = console,
    prefix = "[arkiv]",
): Logger {
    const enabled = (target: LogLevel) => LEVEL_RANK[target] <= LEVEL_RANK[level];
    return {
        debug: (message, ...details) => {
            if (enabled("debug")) sink.debug(`${prefix} ${message}`, ...details);
        },
        info: (message, ...details) => {
            if (enabled("info")) sink.info(`${prefix} ${message}`, ...details);
        },
        warn: (message, ...details) => {
            if (enabled("warn")) sink.warn(`${prefix} ${message}`, ...details);
        },
        error: (message, ...details) => {
            if (enabled("error")) sink.error(`${prefix} ${message}`, ...details);
        },
    };
}

export const silentLogger: Logger = createConsoleLogger("silent");
