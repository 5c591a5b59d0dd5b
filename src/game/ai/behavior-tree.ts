import type { ActionId } from '../actions/action-catalog';
import { ConfigError } from '../errors';
import type { TreeState } from './tree-state';

// ─── Node Status ──────────────────────────────────────────────────────────────

export enum NodeStatus {
    SUCCESS,
    FAILURE,
    RUNNING,
}

export enum NodeKind {
    Selector = 'Selector',
    Sequence = 'Sequence',
    Condition = 'Condition',
    Action = 'Action',
    Inverter = 'Inverter',
}

/** Pure boolean test over a game-state snapshot */
export type Predicate<S> = (snapshot: Readonly<S>) => boolean;

/** Per-tick traversal context. Lives for exactly one tick() call. */
export interface TickContext<S> {
    readonly snapshot: Readonly<S>;
    readonly state: TreeState;
    /** Id of the last Action node reached during this traversal */
    chosenAction: ActionId | null;
}

// ─── Abstract Base ────────────────────────────────────────────────────────────

let nextNodeId = 0;

/**
 * Immutable tree node. Everything that changes between ticks (composite
 * child index, action frame counter) lives in the TreeState passed through
 * the context, keyed by the node's id, so one tree can drive many agents.
 */
export abstract class Node<S> {
    abstract readonly kind: NodeKind;
    /** Stable id, unique within the process */
    public readonly id: number = nextNodeId++;

    constructor(public readonly name: string) {}

    abstract tick(ctx: TickContext<S>): NodeStatus;

    getChildren(): readonly Node<S>[] {
        return [];
    }

    /** One-line label used by describeTree */
    describe(): string {
        return `${this.kind} "${this.name}"`;
    }
}

// ─── Composite Nodes ──────────────────────────────────────────────────────────

/** Runs children in order, resuming at the child left RUNNING last tick.
 *  Fails on first FAILURE, succeeds when every child has succeeded. */
export class Sequence<S> extends Node<S> {
    readonly kind = NodeKind.Sequence;

    constructor(name: string, public readonly children: readonly Node<S>[]) {
        super(name);
    }

    tick(ctx: TickContext<S>): NodeStatus {
        let index = ctx.state.getChildIndex(this.id);

        while (index < this.children.length) {
            const status = this.children[index].tick(ctx);
            if (status === NodeStatus.RUNNING) {
                ctx.state.setChildIndex(this.id, index);
                return NodeStatus.RUNNING;
            }
            if (status === NodeStatus.FAILURE) {
                ctx.state.clear(this.id);
                return NodeStatus.FAILURE;
            }
            index++;
        }

        ctx.state.clear(this.id);
        return NodeStatus.SUCCESS;
    }

    getChildren(): readonly Node<S>[] {
        return this.children;
    }
}

/** Tries children in order, resuming at the child left RUNNING last tick.
 *  Succeeds on first SUCCESS, fails only when every child has failed. */
export class Selector<S> extends Node<S> {
    readonly kind = NodeKind.Selector;

    constructor(name: string, public readonly children: readonly Node<S>[]) {
        super(name);
    }

    tick(ctx: TickContext<S>): NodeStatus {
        let index = ctx.state.getChildIndex(this.id);

        while (index < this.children.length) {
            const status = this.children[index].tick(ctx);
            if (status === NodeStatus.RUNNING) {
                ctx.state.setChildIndex(this.id, index);
                return NodeStatus.RUNNING;
            }
            if (status === NodeStatus.SUCCESS) {
                ctx.state.clear(this.id);
                return NodeStatus.SUCCESS;
            }
            index++;
        }

        ctx.state.clear(this.id);
        return NodeStatus.FAILURE;
    }

    getChildren(): readonly Node<S>[] {
        return this.children;
    }
}

// ─── Leaf Nodes ───────────────────────────────────────────────────────────────

/** Predicate → SUCCESS or FAILURE. Never RUNNING, keeps no state. */
export class Condition<S> extends Node<S> {
    readonly kind = NodeKind.Condition;

    constructor(
        name: string,
        public readonly predicate: Predicate<S>,
        /** Name the predicate was registered under */
        public readonly conditionName: string = name,
    ) {
        super(name);
    }

    tick(ctx: TickContext<S>): NodeStatus {
        return this.predicate(ctx.snapshot) ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
    }

    describe(): string {
        return `${super.describe()} [${this.conditionName}]`;
    }
}

/** Holds one action across frames. The first visit is always RUNNING; later
 *  ticks count up and answer SUCCESS once the counter reaches framesNeeded - 1,
 *  so framesNeeded 3 gives R, R, S and framesNeeded 1 gives R, S. The action
 *  id is emitted on every one of those ticks. */
export class Action<S> extends Node<S> {
    readonly kind = NodeKind.Action;

    constructor(
        name: string,
        public readonly actionId: ActionId,
        public readonly framesNeeded: number = 1,
        /** Catalog name the id was resolved from */
        public readonly actionName: string = name,
    ) {
        super(name);
        if (!Number.isInteger(framesNeeded) || framesNeeded < 1) {
            throw new ConfigError(`Action node "${name}" has an invalid frames_needed value: ${framesNeeded}`);
        }
    }

    tick(ctx: TickContext<S>): NodeStatus {
        ctx.chosenAction = this.actionId;

        const elapsed = ctx.state.getElapsedFrames(this.id);
        // not active: the first visit always keeps running
        if (elapsed === undefined) {
            ctx.state.setElapsedFrames(this.id, 0);
            return NodeStatus.RUNNING;
        }

        const frame = elapsed + 1;
        if (frame >= this.framesNeeded - 1) {
            ctx.state.clear(this.id);
            return NodeStatus.SUCCESS;
        }
        ctx.state.setElapsedFrames(this.id, frame);
        return NodeStatus.RUNNING;
    }

    describe(): string {
        return `${super.describe()} [${this.actionName} → ${this.actionId}, ${this.framesNeeded}f]`;
    }
}

// ─── Decorator Nodes ──────────────────────────────────────────────────────────

/** Swaps SUCCESS and FAILURE of its child. RUNNING passes through. */
export class Inverter<S> extends Node<S> {
    readonly kind = NodeKind.Inverter;

    constructor(name: string, public readonly child: Node<S>) {
        super(name);
    }

    tick(ctx: TickContext<S>): NodeStatus {
        const status = this.child.tick(ctx);
        switch (status) {
        case NodeStatus.SUCCESS:
            return NodeStatus.FAILURE;
        case NodeStatus.FAILURE:
            return NodeStatus.SUCCESS;
        case NodeStatus.RUNNING:
            return NodeStatus.RUNNING;
        }
    }

    getChildren(): readonly Node<S>[] {
        return [this.child];
    }
}

// ─── Builder Functions (functional API) ───────────────────────────────────────

export function sequence<S>(name: string, ...children: Node<S>[]): Sequence<S> {
    return new Sequence(name, children);
}

export function selector<S>(name: string, ...children: Node<S>[]): Selector<S> {
    return new Selector(name, children);
}

export function condition<S>(name: string, predicate: Predicate<S>, conditionName?: string): Condition<S> {
    return new Condition(name, predicate, conditionName);
}

export function action<S>(name: string, actionId: ActionId, framesNeeded = 1, actionName?: string): Action<S> {
    return new Action<S>(name, actionId, framesNeeded, actionName);
}

export function inverter<S>(name: string, child: Node<S>): Inverter<S> {
    return new Inverter(name, child);
}

// ─── Traversal Helpers ────────────────────────────────────────────────────────

/** Depth-first, pre-order walk */
export function visitTree<S>(root: Node<S>, visit: (node: Node<S>, depth: number) => void, depth = 0): void {
    visit(root, depth);
    for (const child of root.getChildren()) {
        visitTree(child, visit, depth + 1);
    }
}

export function countNodes<S>(root: Node<S>): number {
    let count = 0;
    visitTree(root, () => { count++; });
    return count;
}

/** One line per node, indented by depth. For logs and debugging. */
export function describeTree<S>(root: Node<S>): string {
    const lines: string[] = [];
    visitTree(root, (node, depth) => {
        lines.push(`${'  '.repeat(depth)}${node.describe()}`);
    });
    return lines.join('\n');
}
