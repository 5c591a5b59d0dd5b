import { LogManager, LogType } from './log-manager';

/** Per-module logger. All handlers share one process-wide LogManager. */
export class LogHandler {
    private readonly _moduleName: string;
    private static manager = new LogManager();

    constructor(moduleName: string) {
        this._moduleName = moduleName;
    }

    public get moduleName(): string {
        return this._moduleName;
    }

    /** log an error */
    public error(msg: string, exception?: Error): void {
        this.push(LogType.Error, msg, exception);
    }

    /** log a warning */
    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    /** log an info message */
    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** write a debug message. Non-string values are dumped as objects. */
    public debug(msg: unknown): void {
        this.push(LogType.Debug, msg);
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }

    private push(type: LogType, msg: unknown, exception?: Error): void {
        LogHandler.manager.push({ type, source: this._moduleName, msg, exception });
    }
}
