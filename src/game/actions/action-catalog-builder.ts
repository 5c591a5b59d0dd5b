/**
 * Builds the action catalog from a button list and an ordered list of combos.
 *
 * Ids follow combo order. A combo whose press vector repeats an earlier one
 * is dropped (or rejected, depending on the duplicate policy); the first
 * occurrence keeps its id and name. No neutral action is inserted: callers
 * list the empty combo first to keep id 0 as "do nothing".
 */

import { LogHandler } from '@/utilities/log-handler';
import type { DuplicateComboPolicy } from '../ai-settings';
import { ConfigError, UnknownButtonError } from '../errors';
import { isRecord, isStringArray } from '../util/config-document';
import {
    ActionCatalog,
    NEUTRAL_ACTION_NAME,
    type ActionDefinition,
    type ActionId,
    type DroppedCombo,
} from './action-catalog';
import { ButtonRegistry, type Button } from './button-registry';

const log = new LogHandler('ActionCatalog');

/** A combo with an explicit name */
export interface NamedCombo {
    readonly name?: string;
    readonly buttons: readonly Button[];
}

/** A bare button list, or a named combo */
export type ComboInput = readonly Button[] | NamedCombo;

export interface BuildCatalogOptions {
    duplicateCombos?: DuplicateComboPolicy;
    /** Document label used in error messages */
    source?: string;
}

function normalizeCombo(input: ComboInput): NamedCombo {
    return isNamedCombo(input) ? input : { buttons: input };
}

function isNamedCombo(input: ComboInput): input is NamedCombo {
    return !Array.isArray(input);
}

/** NEUTRAL for the empty combo, otherwise the button labels joined by '_' */
export function comboName(buttons: readonly Button[]): string {
    return buttons.length === 0 ? NEUTRAL_ACTION_NAME : buttons.join('_');
}

/**
 * Validate an untyped combo from a config document.
 * Accepts a list of labels or a { name, buttons } mapping.
 */
export function parseCombo(value: unknown, position: number, source?: string): NamedCombo {
    if (isStringArray(value)) return { buttons: value };
    if (value === null) return { buttons: [] };

    if (isRecord(value)) {
        const name = value.name;
        if (name !== undefined && typeof name !== 'string') {
            throw new ConfigError(`Action #${position}: "name" must be a string`, source);
        }
        const buttons = value.buttons ?? [];
        if (!isStringArray(buttons)) {
            throw new ConfigError(`Action #${position}: "buttons" must be a list of button names`, source);
        }
        return { name, buttons };
    }

    throw new ConfigError(`Action #${position} must be a list of button names, got ${JSON.stringify(value)}`, source);
}

export function buildActionCatalog(
    buttons: readonly Button[] | ButtonRegistry,
    combos: readonly ComboInput[],
    options: BuildCatalogOptions = {},
): ActionCatalog {
    const { duplicateCombos = 'drop', source } = options;
    const registry = buttons instanceof ButtonRegistry ? buttons : new ButtonRegistry(buttons);

    const definitions: ActionDefinition[] = [];
    const aliases = new Map<string, ActionId>();
    const dropped: DroppedCombo[] = [];
    const idByVector = new Map<string, ActionId>();
    const idByName = new Map<string, ActionId>();

    const addAlias = (alias: string, id: ActionId): void => {
        if (!aliases.has(alias)) aliases.set(alias, id);
    };

    combos.map(normalizeCombo).forEach((combo, position) => {
        for (const button of combo.buttons) {
            if (!registry.has(button)) throw new UnknownButtonError(button, source);
        }

        const ordered = registry.sortByRegistry(combo.buttons);
        const name = combo.name ?? comboName(ordered);
        const vector = registry.toVector(ordered);
        const key = vector.join('');
        const writtenName = comboName(combo.buttons);

        const keptId = idByVector.get(key);
        if (keptId !== undefined) {
            const keptName = definitions[keptId].name;
            if (duplicateCombos === 'fail') {
                throw new ConfigError(`Action #${position} "${name}" presses the same buttons as "${keptName}"`, source);
            }
            log.warn(`Dropping action #${position} "${name}": same buttons as "${keptName}" (id ${keptId})`);
            dropped.push({ name, buttons: ordered, keptId, keptName });
            addAlias(name, keptId);
            addAlias(writtenName, keptId);
            return;
        }

        if (idByName.has(name)) {
            throw new ConfigError(`Action #${position}: name "${name}" is already used by a different combo`, source);
        }

        const id = definitions.length;
        definitions.push({
            id,
            name,
            buttons: Object.freeze(ordered),
            vector: Object.freeze(vector),
        });
        idByVector.set(key, id);
        idByName.set(name, id);
        if (writtenName !== name) addAlias(writtenName, id);
    });

    const catalog = new ActionCatalog(registry, definitions, aliases, dropped);
    log.info(`Built ${catalog.size} actions over ${registry.size} buttons` +
        (dropped.length > 0 ? `, ${dropped.length} duplicate(s) dropped` : ''));
    return catalog;
}

/**
 * Incremental catalog builder: collect combos one by one, then build.
 */
export class ActionCatalogBuilder {
    private readonly registry: ButtonRegistry;
    private readonly combos: NamedCombo[] = [];

    constructor(buttons: readonly Button[] | ButtonRegistry, combos: readonly ComboInput[] = []) {
        this.registry = buttons instanceof ButtonRegistry ? buttons : new ButtonRegistry(buttons);
        this.combos.push(...combos.map(normalizeCombo));
    }

    get buttons(): readonly Button[] {
        return this.registry.labels;
    }

    get actions(): readonly NamedCombo[] {
        return this.combos;
    }

    /** Add one combo; anything but a button list or named combo is rejected */
    addAction(action: unknown): this {
        this.combos.push(parseCombo(action, this.combos.length));
        return this;
    }

    /** Add several combos. Nothing is added if any of them is invalid. */
    addActions(actions: unknown): this {
        if (!Array.isArray(actions)) {
            throw new ConfigError('Actions must be a list of combos');
        }
        const parsed = actions.map((a: unknown, i) => parseCombo(a, this.combos.length + i));
        this.combos.push(...parsed);
        return this;
    }

    build(options: BuildCatalogOptions = {}): ActionCatalog {
        return buildActionCatalog(this.registry, this.combos, options);
    }
}
