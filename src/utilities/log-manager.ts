export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: unknown;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

/** Console severity, lowest first. LogType's numeric order is not a severity order. */
const SEVERITY: Record<LogType, number> = {
    [LogType.Debug]: 0,
    [LogType.Info]: 1,
    [LogType.Warn]: 2,
    [LogType.Error]: 3,
};

/**
 * Node-internal frames that only add noise below the first async hop.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /node:internal\/process\/task_queues/,
    /node:internal\/timers/,
    /listOnTimeout/,
];

/**
 * Truncate a stack trace at the first Node async boundary.
 * @param stack The stack trace string
 * @returns Cleaned stack trace
 */
function cleanStackTrace(stack: string): string {
    const result: string[] = [];

    for (const line of stack.split('\n')) {
        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(line))) {
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }
        result.push(line);
    }

    return result.join('\n');
}

/** Console method per message type */
const CONSOLE_WRITERS: Record<LogType, (line: string) => void> = {
    [LogType.Error]: line => console.error(line),
    [LogType.Warn]: line => console.warn(line),
    [LogType.Info]: line => console.info(line),
    [LogType.Debug]: line => console.log(line),
};

interface ThrottleEntry {
    lastTime: number;
    suppressedCount: number;
}

function formatMessage(msg: ILogMessage, text: string, suppressedNote: string): string {
    let formatted = `${msg.source}\t${text}${suppressedNote}`;
    if (msg.exception) {
        formatted += '\n' + msg.exception.message;
        if (msg.exception.stack) {
            formatted += '\n' + cleanStackTrace(msg.exception.stack);
        }
    }
    return formatted;
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private consoleLevel: LogType = LogType.Debug;

    /** source+type+msg -> time last written and how many were held back since */
    private throttleState = new Map<string, ThrottleEntry>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /**
     * Messages below this level are kept and published to the listener
     * but not written to the console.
     */
    public setConsoleLevel(level: LogType): void {
        this.consoleLevel = level;
    }

    public getConsoleLevel(): LogType {
        return this.consoleLevel;
    }

    /** Drop history and throttle state. Does not detach the listener. */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        this.listener?.(msg);

        if (SEVERITY[msg.type] >= SEVERITY[this.consoleLevel]) {
            this.writeToConsole(msg);
        }
    }

    private writeToConsole(msg: ILogMessage): void {
        const text = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const suppressedNote = this.throttle(`${msg.source}:${msg.type}:${text}`);
        if (suppressedNote === null) {
            return;
        }

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }
        CONSOLE_WRITERS[msg.type](formatMessage(msg, msg.msg, suppressedNote));
    }

    /**
     * null while an identical message was written less than LOG_THROTTLE_MS ago,
     * otherwise the note to append ('' when nothing was held back).
     */
    private throttle(key: string): string | null {
        const now = performance.now();
        const entry = this.throttleState.get(key);

        if (entry && now - entry.lastTime < LOG_THROTTLE_MS) {
            entry.suppressedCount++;
            return null;
        }

        this.throttleState.set(key, { lastTime: now, suppressedCount: 0 });
        return entry && entry.suppressedCount > 0 ? ` (${entry.suppressedCount} similar suppressed)` : '';
    }
}
