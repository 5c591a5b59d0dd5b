import { NEUTRAL_ACTION_ID, type ActionCatalog, type ActionId } from '../actions/action-catalog';
import { NodeStatus, type Node, type TickContext } from './behavior-tree';
import { TreeState } from './tree-state';

export interface TickResult {
    status: NodeStatus;
    /** Action to press this frame: the tree's choice or the fallback */
    actionId: ActionId;
    /** False when actionId is the fallback */
    chosen: boolean;
}

/**
 * Run one frame of a behavior tree.
 *
 * The emitted id is that of the last Action node the traversal reached. When
 * none was reached, or the root ended in FAILURE, the fallback is emitted:
 * fallbackActionId if given, else the catalog's neutral action, else id 0.
 * Never throws for dead ends such as empty composites.
 */
export function tick<S>(
    root: Node<S>,
    state: TreeState,
    snapshot: Readonly<S>,
    catalog?: ActionCatalog,
    fallbackActionId?: ActionId,
): TickResult {
    const ctx: TickContext<S> = { snapshot, state, chosenAction: null };
    const status = root.tick(ctx);

    const chosenAction = ctx.chosenAction;
    if (status !== NodeStatus.FAILURE && chosenAction !== null) {
        return { status, actionId: chosenAction, chosen: true };
    }

    const fallback = fallbackActionId ?? catalog?.neutralId ?? NEUTRAL_ACTION_ID;
    return { status, actionId: fallback, chosen: false };
}

/**
 * One running instance of a behavior tree: a shared, read-only root plus the
 * instance's own runtime state.
 */
export class BehaviorTreeRunner<S> {
    public readonly state = new TreeState();
    private _lastResult: TickResult | null = null;

    constructor(
        public readonly root: Node<S>,
        private readonly catalog?: ActionCatalog,
        private readonly fallbackActionId?: ActionId,
    ) {}

    get lastResult(): TickResult | null {
        return this._lastResult;
    }

    /** Run one frame against the given snapshot */
    tick(snapshot: Readonly<S>): TickResult {
        this._lastResult = tick(this.root, this.state, snapshot, this.catalog, this.fallbackActionId);
        return this._lastResult;
    }

    /** Forget all in-progress children and action counters */
    reset(): void {
        this.state.reset();
        this._lastResult = null;
    }
}
