/**
 * AI Module
 *
 * Behavior tree engine, condition provider, tree loader and the scripted
 * fighter agent built on them.
 *
 * @module ai
 */

// Behavior tree primitives
export {
    // Core types
    NodeStatus,
    NodeKind,
    Node,
    type Predicate,
    type TickContext,

    // Composite nodes
    Sequence,
    Selector,

    // Leaf nodes
    Condition,
    Action,

    // Decorator nodes
    Inverter,

    // Builder functions
    sequence,
    selector,
    condition,
    action,
    inverter,

    // Traversal
    visitTree,
    countNodes,
    describeTree,
} from './behavior-tree';

// Runtime state and ticking
export { TreeState, type NodeId, type NodeRuntimeState } from './tree-state';
export { tick, BehaviorTreeRunner, type TickResult } from './tick';

// Conditions
export { ConditionProvider } from './conditions';
export { FIGHT_CONDITIONS, createFightConditions, fightPredicates } from './fight-conditions';
export {
    EMPTY_SNAPSHOT,
    RAM_KEYS,
    horizontalDistance,
    snapshotFromInfo,
    type FightSnapshot,
} from './game-state';

// Loading
export {
    BehaviorTreeLoader,
    DEFAULT_TREE_PATH,
    LOADABLE_NODE_TYPES,
    loadBehaviorTree,
    type TreeLoaderOptions,
} from './loader';

// Agent
export { BehaviorTreeAgent, type BehaviorTreeAgentOptions } from './bt-agent';
