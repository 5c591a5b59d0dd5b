export * from './game/actions';
export * from './game/ai';
export {
    DEFAULT_AI_SETTINGS,
    loadAiSettingsFile,
    parseAiSettings,
    resolveAiSettings,
    type AiSettings,
    type DuplicateComboPolicy,
    type UnresolvedActionPolicy,
} from './game/ai-settings';
export {
    ConfigError,
    UnknownButtonError,
    UnknownConditionError,
    UnresolvedActionError,
} from './game/errors';
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType, type ILogMessage, type LogMessageCallback } from './utilities/log-manager';
