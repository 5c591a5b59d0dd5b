/**
 * Actions Module
 *
 * Discrete action space: button registry, action catalog and the
 * action-space document loader.
 *
 * @module actions
 */

export {
    ButtonRegistry,
    GENESIS_BUTTONS,
    type Button,
    type PressVector,
} from './button-registry';

export {
    ActionCatalog,
    NEUTRAL_ACTION_ID,
    NEUTRAL_ACTION_NAME,
    type ActionDefinition,
    type ActionId,
    type DroppedCombo,
} from './action-catalog';

export {
    ActionCatalogBuilder,
    buildActionCatalog,
    comboName,
    parseCombo,
    type BuildCatalogOptions,
    type ComboInput,
    type NamedCombo,
} from './action-catalog-builder';

export {
    DEFAULT_ACTION_SPACE_PATH,
    actionSpaceFromDocument,
    loadActionCatalog,
    loadActionSpaceFile,
    parseActionSpace,
    type ActionSpaceDocument,
} from './action-space-loader';
