import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
    DEFAULT_AI_SETTINGS,
    loadAiSettingsFile,
    parseAiSettings,
    resolveAiSettings,
} from '@/game/ai-settings';
import { ConfigError } from '@/game/errors';

describe('resolveAiSettings', () => {
    it('returns the defaults when nothing is overridden', () => {
        expect(resolveAiSettings()).toEqual({
            closeRange: 50,
            longRange: 150,
            sideMargin: 50,
            fallbackActionId: 0,
            duplicateCombos: 'drop',
            unresolvedActions: 'fallback',
        });
        expect(resolveAiSettings()).toEqual(DEFAULT_AI_SETTINGS);
    });

    it('merges overrides onto the defaults', () => {
        const settings = resolveAiSettings({ closeRange: 30, unresolvedActions: 'fail' });

        expect(settings.closeRange).toBe(30);
        expect(settings.longRange).toBe(150);
        expect(settings.unresolvedActions).toBe('fail');
    });

    it('rejects unknown settings', () => {
        expect(() => resolveAiSettings({ aggression: 3 })).toThrow(
            'Unknown setting "aggression". Valid settings: closeRange, longRange, sideMargin, fallbackActionId, duplicateCombos, unresolvedActions',
        );
    });

    it('rejects negative and non-numeric ranges', () => {
        expect(() => resolveAiSettings({ closeRange: -1 })).toThrow('Setting "closeRange" must be a non-negative number, got -1');
        expect(() => resolveAiSettings({ sideMargin: 'wide' })).toThrow('Setting "sideMargin" must be a non-negative number, got "wide"');
    });

    it('requires an integer fallback action id', () => {
        expect(() => resolveAiSettings({ fallbackActionId: 1.5 })).toThrow('Setting "fallbackActionId" must be an integer, got 1.5');
    });

    it('rejects a long range below the close range', () => {
        expect(() => resolveAiSettings({ closeRange: 200 }))
            .toThrow('Setting "longRange" (150) must not be below "closeRange" (200)');
    });

    it('rejects unknown policies', () => {
        expect(() => resolveAiSettings({ duplicateCombos: 'keep' }))
            .toThrow('Setting "duplicateCombos" must be "drop" or "fail", got "keep"');
        expect(() => resolveAiSettings({ unresolvedActions: 'ignore' })).toThrow(ConfigError);
    });
});

describe('parseAiSettings', () => {
    it('reads an empty document as the defaults', () => {
        expect(parseAiSettings('')).toEqual(DEFAULT_AI_SETTINGS);
    });

    it('reads overrides from YAML', () => {
        const settings = parseAiSettings('closeRange: 40\nunresolvedActions: fail');

        expect(settings.closeRange).toBe(40);
        expect(settings.unresolvedActions).toBe('fail');
    });

    it('names the document in errors', () => {
        expect(() => parseAiSettings('closeRange: -5', 'ai.yaml'))
            .toThrow('Setting "closeRange" must be a non-negative number, got -5 (in ai.yaml)');
        expect(() => parseAiSettings('- closeRange')).toThrow('Settings document must be a mapping');
    });
});

describe('loadAiSettingsFile', () => {
    it('reads a settings file', () => {
        const path = fileURLToPath(new URL('./fixtures/ai-settings.yaml', import.meta.url));

        expect(loadAiSettingsFile(path)).toEqual({
            closeRange: 40,
            longRange: 120,
            sideMargin: 50,
            fallbackActionId: 0,
            duplicateCombos: 'fail',
            unresolvedActions: 'fallback',
        });
    });
});
