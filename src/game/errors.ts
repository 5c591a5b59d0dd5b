/**
 * Configuration errors raised while building the action catalog or loading a
 * behavior tree. Everything derives from ConfigError so callers can catch one
 * type at the load boundary.
 */

export class ConfigError extends Error {
    /** File path or document label the problem was found in */
    public source?: string;

    constructor(msg: string, source?: string) {
        super(source ? `${msg} (in ${source})` : msg);
        this.name = 'ConfigError';
        this.source = source;
    }
}

/** A Condition node names a predicate that was never registered. */
export class UnknownConditionError extends ConfigError {
    public readonly conditionName: string;

    constructor(conditionName: string, source?: string) {
        super(`Condition "${conditionName}" is not registered`, source);
        this.name = 'UnknownConditionError';
        this.conditionName = conditionName;
    }
}

/** An action name is absent from the action catalog. */
export class UnresolvedActionError extends ConfigError {
    public readonly actionName: string;

    constructor(actionName: string, source?: string) {
        super(`Action "${actionName}" is not in the action catalog`, source);
        this.name = 'UnresolvedActionError';
        this.actionName = actionName;
    }
}

/** A combo or lookup references a button missing from the registry. */
export class UnknownButtonError extends ConfigError {
    public readonly button: string;

    constructor(button: string, source?: string) {
        super(`Unknown button "${button}"`, source);
        this.name = 'UnknownButtonError';
        this.button = button;
    }
}
