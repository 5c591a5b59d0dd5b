import { LogHandler } from '@/utilities/log-handler';
import { NEUTRAL_ACTION_ID, type ActionCatalog, type ActionId } from '../actions/action-catalog';
import { DEFAULT_ACTION_SPACE_PATH, loadActionCatalog } from '../actions/action-space-loader';
import type { PressVector } from '../actions/button-registry';
import { resolveAiSettings, type AiSettings } from '../ai-settings';
import { ConfigError } from '../errors';
import { NodeStatus, describeTree, type Node } from './behavior-tree';
import { createFightConditions } from './fight-conditions';
import { EMPTY_SNAPSHOT, snapshotFromInfo, type FightSnapshot } from './game-state';
import { BehaviorTreeLoader, DEFAULT_TREE_PATH } from './loader';
import { BehaviorTreeRunner, type TickResult } from './tick';
import type { TreeState } from './tree-state';

const log = new LogHandler('BehaviorTreeAgent');

export interface BehaviorTreeAgentOptions {
    treePath?: string;
    actionSpacePath?: string;
    settings?: Partial<AiSettings>;
}

/**
 * Scripted opponent: reads the fight from the emulator's RAM info each frame
 * and answers with one action id chosen by its behavior tree.
 *
 * The tree definition and catalog may be shared with other agents; the
 * runtime state is this agent's own.
 */
export class BehaviorTreeAgent {
    private readonly runner: BehaviorTreeRunner<FightSnapshot>;
    private _context: FightSnapshot = EMPTY_SNAPSHOT;

    constructor(
        public readonly catalog: ActionCatalog,
        root: Node<FightSnapshot>,
        /** Defaults to the catalog's neutral action, like tick() and the loader */
        public readonly fallbackActionId: ActionId = catalog.neutralId ?? NEUTRAL_ACTION_ID,
    ) {
        if (!catalog.has(fallbackActionId)) {
            throw new ConfigError(`Fallback action id ${fallbackActionId} is outside the catalog (size ${catalog.size})`);
        }
        this.runner = new BehaviorTreeRunner(root, catalog, fallbackActionId);
    }

    /** Load the catalog and tree from files (bundled defaults when omitted) */
    static create(options: BehaviorTreeAgentOptions = {}): BehaviorTreeAgent {
        const settings = resolveAiSettings(options.settings);
        const treePath = options.treePath ?? DEFAULT_TREE_PATH;
        const actionSpacePath = options.actionSpacePath ?? DEFAULT_ACTION_SPACE_PATH;

        const catalog = loadActionCatalog(actionSpacePath, { duplicateCombos: settings.duplicateCombos });
        const conditions = createFightConditions(settings);

        log.info(`Loading tree from ${treePath}`);
        log.debug(`Available conditions: ${conditions.names.join(', ')}`);

        const loader = new BehaviorTreeLoader(catalog, conditions, {
            unresolvedActions: settings.unresolvedActions,
            fallbackActionId: settings.fallbackActionId,
        });
        const root = loader.loadFile(treePath);
        log.debug(describeTree(root));

        return new BehaviorTreeAgent(catalog, root, settings.fallbackActionId);
    }

    get root(): Node<FightSnapshot> {
        return this.runner.root;
    }

    get context(): FightSnapshot {
        return this._context;
    }

    get state(): TreeState {
        return this.runner.state;
    }

    get lastResult(): TickResult | null {
        return this.runner.lastResult;
    }

    /** Copy the fighters' positions out of the RAM info */
    updateContext(info: Readonly<Record<string, unknown>>): void {
        this._context = snapshotFromInfo(info);
    }

    /**
     * Tick the tree for one frame. When the root finishes (SUCCESS or
     * FAILURE) the next frame starts the tree from the top.
     */
    selectAction(info: Readonly<Record<string, unknown>>): ActionId {
        this.updateContext(info);
        const result = this.runner.tick(this._context);

        if (result.status !== NodeStatus.RUNNING) {
            this.runner.state.reset();
        }
        return result.actionId;
    }

    /** Same as selectAction, as the press vector the emulator consumes */
    selectVector(info: Readonly<Record<string, unknown>>): PressVector {
        return this.catalog.vectorOf(this.selectAction(info));
    }

    /** Episode reset */
    reset(): void {
        this.runner.reset();
        this._context = EMPTY_SNAPSHOT;
    }
}
