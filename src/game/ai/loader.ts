/**
 * Loads behavior trees from YAML documents.
 *
 * Document shape:
 *   node:
 *     type: Selector | Sequence | Condition | Action
 *     name: "free text"
 *     properties:            # Condition / Action only
 *       condition: is_close_to_enemy
 *       action_id: RIGHT_DOWN_A
 *       frames_needed: 3
 *     children: [ ... ]      # Selector / Sequence only
 *
 * Names are resolved here, once: conditions against the ConditionProvider
 * (unregistered is fatal), actions against the ActionCatalog (unknown names
 * fall back to the neutral action unless the policy says 'fail').
 */

import { LogHandler } from '@/utilities/log-handler';
import { NEUTRAL_ACTION_ID, type ActionCatalog, type ActionId } from '../actions/action-catalog';
import type { UnresolvedActionPolicy } from '../ai-settings';
import { ConfigError, UnknownConditionError, UnresolvedActionError } from '../errors';
import { isRecord, loadYamlFile, parseYamlDocument, resolveDataFile, type ConfigRecord } from '../util/config-document';
import { Action, Condition, NodeKind, Selector, Sequence, countNodes, type Node } from './behavior-tree';
import type { ConditionProvider } from './conditions';

const log = new LogHandler('TreeLoader');

/** Bundled aggressive-fighter tree */
export const DEFAULT_TREE_PATH = resolveDataFile(import.meta.url, './data/default-bt.yaml');

/** Node types a tree document may declare */
export const LOADABLE_NODE_TYPES = [NodeKind.Selector, NodeKind.Sequence, NodeKind.Condition, NodeKind.Action] as const;

type LoadableNodeType = typeof LOADABLE_NODE_TYPES[number];

export interface TreeLoaderOptions {
    unresolvedActions?: UnresolvedActionPolicy;
    /** Id bound to Action nodes whose name is not in the catalog */
    fallbackActionId?: ActionId;
}

function isLoadableNodeType(value: unknown): value is LoadableNodeType {
    return LOADABLE_NODE_TYPES.some(t => t === value);
}

export class BehaviorTreeLoader<S> {
    private readonly unresolvedActions: UnresolvedActionPolicy;
    private readonly fallbackActionId: ActionId;

    constructor(
        private readonly catalog: ActionCatalog,
        private readonly conditions: ConditionProvider<S>,
        options: TreeLoaderOptions = {},
    ) {
        this.unresolvedActions = options.unresolvedActions ?? 'fallback';
        this.fallbackActionId = options.fallbackActionId ?? catalog.neutralId ?? NEUTRAL_ACTION_ID;
    }

    /** Build a tree from a parsed document ({ node: <root> }) */
    load(document: unknown, source?: string): Node<S> {
        if (!isRecord(document) || document.node === undefined || document.node === null) {
            throw new ConfigError('Behavior tree document has no root "node"', source);
        }

        const root = this.buildNode(document.node, 'node', source);
        log.info(`Loaded tree "${root.name}" (${countNodes(root)} nodes)` + (source ? ` from ${source}` : ''));
        return root;
    }

    loadYaml(text: string, source?: string): Node<S> {
        return this.load(parseYamlDocument(text, source), source);
    }

    loadFile(path: string = DEFAULT_TREE_PATH): Node<S> {
        return this.load(loadYamlFile(path), path);
    }

    private buildNode(spec: unknown, path: string, source?: string): Node<S> {
        if (!isRecord(spec)) {
            throw new ConfigError(`${path}: node must be a mapping`, source);
        }

        const type = spec.type;
        if (!isLoadableNodeType(type)) {
            throw new ConfigError(`${path}: Unknown node type: ${JSON.stringify(type)}`, source);
        }

        const name = spec.name ?? type;
        if (typeof name !== 'string') {
            throw new ConfigError(`${path}: "name" must be a string`, source);
        }

        const properties = spec.properties ?? {};
        if (!isRecord(properties)) {
            throw new ConfigError(`${path}: "properties" must be a mapping`, source);
        }

        const childSpecs = spec.children ?? [];
        if (!Array.isArray(childSpecs)) {
            throw new ConfigError(`${path}: "children" must be a list`, source);
        }

        switch (type) {
        case NodeKind.Selector:
        case NodeKind.Sequence: {
            const children = childSpecs.map((child: unknown, i) => this.buildNode(child, `${path}.children[${i}]`, source));
            return type === NodeKind.Selector ? new Selector(name, children) : new Sequence(name, children);
        }
        case NodeKind.Condition:
            this.warnIgnoredChildren(name, path, childSpecs.length);
            return this.buildCondition(name, properties, path, source);
        case NodeKind.Action:
            this.warnIgnoredChildren(name, path, childSpecs.length);
            return this.buildAction(name, properties, path, source);
        }
    }

    private buildCondition(name: string, properties: ConfigRecord, path: string, source?: string): Condition<S> {
        const conditionName = properties.condition;
        if (typeof conditionName !== 'string') {
            throw new ConfigError(`${path}: Condition node "${name}" needs a "condition" name`, source);
        }
        if (!this.conditions.has(conditionName)) {
            throw new UnknownConditionError(conditionName, source);
        }
        return new Condition(name, this.conditions.resolve(conditionName), conditionName);
    }

    private buildAction(name: string, properties: ConfigRecord, path: string, source?: string): Action<S> {
        const framesNeeded = properties.frames_needed ?? 1;
        if (typeof framesNeeded !== 'number' || !Number.isInteger(framesNeeded) || framesNeeded < 1) {
            throw new ConfigError(
                `${path}: Action node "${name}" has an invalid 'frames_needed' value: ${JSON.stringify(framesNeeded)}`,
                source,
            );
        }

        const actionName = properties.action_id;
        if (actionName !== undefined && typeof actionName !== 'string') {
            throw new ConfigError(`${path}: Action node "${name}" has a non-string "action_id"`, source);
        }

        const actionId = actionName === undefined ? undefined : this.catalog.idOf(actionName);
        if (actionId !== undefined) {
            return new Action(name, actionId, framesNeeded, actionName);
        }

        const missing = actionName ?? '';
        if (this.unresolvedActions === 'fail') {
            throw new UnresolvedActionError(missing, source);
        }
        log.warn(`${path}: Action node "${name}" names unknown action "${missing}", using fallback id ${this.fallbackActionId}`);
        return new Action(name, this.fallbackActionId, framesNeeded, missing);
    }

    private warnIgnoredChildren(name: string, path: string, count: number): void {
        if (count > 0) {
            log.warn(`${path}: leaf node "${name}" has ${count} children, ignoring them`);
        }
    }
}

/** Build a tree from a parsed document */
export function loadBehaviorTree<S>(
    document: unknown,
    catalog: ActionCatalog,
    conditions: ConditionProvider<S>,
    options: TreeLoaderOptions = {},
): Node<S> {
    return new BehaviorTreeLoader(catalog, conditions, options).load(document);
}
