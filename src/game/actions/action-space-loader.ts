/**
 * Loads the action-space document (buttons + combos) from YAML.
 */

import { ConfigError } from '../errors';
import {
    isRecord,
    isStringArray,
    loadYamlFile,
    parseYamlDocument,
    resolveDataFile,
} from '../util/config-document';
import type { ActionCatalog } from './action-catalog';
import { buildActionCatalog, parseCombo, type BuildCatalogOptions, type NamedCombo } from './action-catalog-builder';
import type { Button } from './button-registry';

/** Bundled Genesis action space, neutral combo first */
export const DEFAULT_ACTION_SPACE_PATH = resolveDataFile(import.meta.url, './data/action-space.yaml');

export interface ActionSpaceDocument {
    buttons: Button[];
    actions: NamedCombo[];
}

/** Validate a parsed action-space document */
export function actionSpaceFromDocument(doc: unknown, source?: string): ActionSpaceDocument {
    if (!isRecord(doc) || !('buttons' in doc) || !('actions' in doc)) {
        throw new ConfigError('Action space must have "buttons" and "actions" keys', source);
    }
    if (!isStringArray(doc.buttons)) {
        throw new ConfigError('"buttons" must be a list of button names', source);
    }
    if (!Array.isArray(doc.actions)) {
        throw new ConfigError('"actions" must be a list of combos', source);
    }

    return {
        buttons: doc.buttons,
        actions: doc.actions.map((raw: unknown, i) => parseCombo(raw, i, source)),
    };
}

export function parseActionSpace(text: string, source?: string): ActionSpaceDocument {
    return actionSpaceFromDocument(parseYamlDocument(text, source), source);
}

export function loadActionSpaceFile(path: string): ActionSpaceDocument {
    return actionSpaceFromDocument(loadYamlFile(path), path);
}

/** Build the catalog straight from an action-space file */
export function loadActionCatalog(
    path: string = DEFAULT_ACTION_SPACE_PATH,
    options: BuildCatalogOptions = {},
): ActionCatalog {
    const space = loadActionSpaceFile(path);
    return buildActionCatalog(space.buttons, space.actions, { source: path, ...options });
}
