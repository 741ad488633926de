// For the terms of use see COPYRIGHT.md


export type LogMessage = Error | { toString(): string; } | string;
export type LogMessageFactory = (() => LogMessage) | LogMessage;
export type LogLevel = "critical" | "error" | "warning" | "info" | "debug";
export type LogSink = (message: Error | string) => void;

export const logLevels: LogLevel[] = ["critical", "error", "warning", "info", "debug"];

const levels: { [level in LogLevel]: number; } = {
    critical: 1,
    error: 2,
    warning: 3,
    info: 4,
    debug: 5
};

export class Logger {
    private level: number;
    private sink: LogSink;

    public constructor(level: LogLevel, sink: LogSink = (message: Error | string): void => {
        console.log(message);
    }) {
        this.level = levels[level];
        this.sink = sink;
    }

    public critical(message: LogMessageFactory): void {
        this.log(levels.critical, message);
    }

    public error(message: LogMessageFactory): void {
        this.log(levels.error, message);
    }

    public warning(message: LogMessageFactory): void {
        this.log(levels.warning, message);
    }

    public info(message: LogMessageFactory): void {
        this.log(levels.info, message);
    }

    public debug(message: LogMessageFactory): void {
        this.log(levels.debug, message);
    }

    private log(level: number, message: LogMessageFactory): void {
        if (level <= this.level) {
            let resolved = typeof message === "function" ? message() : message;

            if (typeof resolved === "string" || resolved instanceof Error) {
                this.sink(resolved);
            } else {
                this.sink(resolved.toString());
            }
        }
    }
}
