import { ConfigError } from './errors';
import { isRecord, loadYamlFile, parseYamlDocument } from './util/config-document';

/** What the catalog builder does with a combo whose vector is already taken */
export type DuplicateComboPolicy = 'drop' | 'fail';

/** What the tree loader does with an action name missing from the catalog */
export type UnresolvedActionPolicy = 'fallback' | 'fail';

/**
 * AI settings schema. Defaults are merged with whatever a host or a settings
 * document overrides.
 */
export interface AiSettings {
    // Range bands (horizontal distance in game units)
    closeRange: number;
    longRange: number;
    sideMargin: number;

    // Action emitted when the tree chooses none
    fallbackActionId: number;

    // Load-time policies
    duplicateCombos: DuplicateComboPolicy;
    unresolvedActions: UnresolvedActionPolicy;
}

/** Default values for all settings */
export const DEFAULT_AI_SETTINGS: Readonly<AiSettings> = {
    closeRange: 50,
    longRange: 150,
    sideMargin: 50,

    fallbackActionId: 0,

    duplicateCombos: 'drop',
    unresolvedActions: 'fallback',
};

const NUMERIC_KEYS = ['closeRange', 'longRange', 'sideMargin', 'fallbackActionId'] as const;
const KNOWN_KEYS = new Set<string>(Object.keys(DEFAULT_AI_SETTINGS));

function readNonNegative(raw: Record<string, unknown>, key: string, fallback: number, source?: string): number {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(`Setting "${key}" must be a non-negative number, got ${JSON.stringify(value)}`, source);
    }
    return value;
}

function readDuplicatePolicy(value: unknown, source?: string): DuplicateComboPolicy {
    if (value === 'drop' || value === 'fail') return value;
    throw new ConfigError(`Setting "duplicateCombos" must be "drop" or "fail", got ${JSON.stringify(value)}`, source);
}

function readUnresolvedPolicy(value: unknown, source?: string): UnresolvedActionPolicy {
    if (value === 'fallback' || value === 'fail') return value;
    throw new ConfigError(`Setting "unresolvedActions" must be "fallback" or "fail", got ${JSON.stringify(value)}`, source);
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Accepts an untyped record so settings documents go through the same checks.
 */
export function resolveAiSettings(overrides: Partial<AiSettings> | Record<string, unknown> = {}, source?: string): AiSettings {
    for (const key of Object.keys(overrides)) {
        if (!KNOWN_KEYS.has(key)) {
            throw new ConfigError(`Unknown setting "${key}". Valid settings: ${[...KNOWN_KEYS].join(', ')}`, source);
        }
    }

    const raw: Record<string, unknown> = { ...overrides };
    const [closeRange, longRange, sideMargin, fallbackActionId] = NUMERIC_KEYS.map(
        key => readNonNegative(raw, key, DEFAULT_AI_SETTINGS[key], source),
    );

    if (!Number.isInteger(fallbackActionId)) {
        throw new ConfigError(`Setting "fallbackActionId" must be an integer, got ${fallbackActionId}`, source);
    }
    if (longRange < closeRange) {
        throw new ConfigError(`Setting "longRange" (${longRange}) must not be below "closeRange" (${closeRange})`, source);
    }

    return {
        closeRange,
        longRange,
        sideMargin,
        fallbackActionId,
        duplicateCombos: raw.duplicateCombos === undefined
            ? DEFAULT_AI_SETTINGS.duplicateCombos
            : readDuplicatePolicy(raw.duplicateCombos, source),
        unresolvedActions: raw.unresolvedActions === undefined
            ? DEFAULT_AI_SETTINGS.unresolvedActions
            : readUnresolvedPolicy(raw.unresolvedActions, source),
    };
}

/** Parse a YAML settings document. An empty document yields the defaults. */
export function parseAiSettings(text: string, source?: string): AiSettings {
    return settingsFromDocument(parseYamlDocument(text, source), source);
}

/** Read a YAML settings file */
export function loadAiSettingsFile(path: string): AiSettings {
    return settingsFromDocument(loadYamlFile(path), path);
}

function settingsFromDocument(doc: unknown, source?: string): AiSettings {
    if (doc === null || doc === undefined) return resolveAiSettings({}, source);
    if (!isRecord(doc)) {
        throw new ConfigError('Settings document must be a mapping', source);
    }
    return resolveAiSettings(doc, source);
}
