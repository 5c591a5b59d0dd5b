/** Node id as assigned at construction (see Node.id) */
export type NodeId = number;

/** What one node remembers between ticks */
export type NodeRuntimeState =
    | { readonly childIndex: number }
    | { readonly elapsedFrames: number };

/**
 * Mutable runtime state of one behavior-tree instance.
 *
 * A flat map keyed by node id: composites store the index of the child left
 * RUNNING, actions their elapsed-frame counter. Nodes in their initial state
 * have no entry, so an empty map is a freshly started tree. One TreeState per
 * agent; never share it between callers.
 */
export class TreeState {
    private readonly nodes = new Map<NodeId, NodeRuntimeState>();

    /** Number of nodes holding non-initial state */
    get size(): number {
        return this.nodes.size;
    }

    get isIdle(): boolean {
        return this.nodes.size === 0;
    }

    get(id: NodeId): NodeRuntimeState | undefined {
        return this.nodes.get(id);
    }

    getChildIndex(id: NodeId): number {
        const entry = this.nodes.get(id);
        return entry !== undefined && 'childIndex' in entry ? entry.childIndex : 0;
    }

    setChildIndex(id: NodeId, childIndex: number): void {
        if (childIndex === 0) {
            this.nodes.delete(id);
            return;
        }
        this.nodes.set(id, { childIndex });
    }

    /** undefined while the action is not active */
    getElapsedFrames(id: NodeId): number | undefined {
        const entry = this.nodes.get(id);
        return entry !== undefined && 'elapsedFrames' in entry ? entry.elapsedFrames : undefined;
    }

    setElapsedFrames(id: NodeId, elapsedFrames: number): void {
        this.nodes.set(id, { elapsedFrames });
    }

    /** Return one node to its initial state */
    clear(id: NodeId): void {
        this.nodes.delete(id);
    }

    /** Return every node to its initial state (e.g. on episode reset) */
    reset(): void {
        this.nodes.clear();
    }
}
