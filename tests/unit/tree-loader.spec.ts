import { describe, it, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { loadActionCatalog } from '@/game/actions';
import { NodeKind, NodeStatus, countNodes, describeTree } from '@/game/ai/behavior-tree';
import { createFightConditions } from '@/game/ai/fight-conditions';
import type { FightSnapshot } from '@/game/ai/game-state';
import { BehaviorTreeLoader, loadBehaviorTree, type TreeLoaderOptions } from '@/game/ai/loader';
import { TreeState } from '@/game/ai/tree-state';
import { tick } from '@/game/ai/tick';
import { ConfigError, UnknownConditionError, UnresolvedActionError } from '@/game/errors';
import { LogHandler } from '@/utilities/log-handler';
import { LogType, type ILogMessage } from '@/utilities/log-manager';
import { createTestCatalog, makeSnapshot } from './helpers/test-fight';

function fixture(name: string): string {
    return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

function yaml(...lines: string[]): string {
    return lines.join('\n');
}

/** Collect log messages pushed from now on */
function captureLogs(): ILogMessage[] {
    const messages: ILogMessage[] = [];
    const manager = LogHandler.getLogManager();
    manager.clear();
    manager.onLogMessage(msg => messages.push(msg));
    return messages;
}

function loaderWarnings(messages: ILogMessage[]): unknown[] {
    return messages.filter(m => m.type === LogType.Warn && m.source === 'TreeLoader').map(m => m.msg);
}

const catalog = createTestCatalog();
const conditions = createFightConditions();

function createLoader(options: TreeLoaderOptions = {}): BehaviorTreeLoader<FightSnapshot> {
    return new BehaviorTreeLoader(catalog, conditions, options);
}

afterEach(() => {
    LogHandler.getLogManager().onLogMessage(null);
});

// ─── Valid documents ──────────────────────────────────────────────────────────

describe('BehaviorTreeLoader: valid trees', () => {
    it('builds the tree described by a YAML file', () => {
        const root = createLoader().loadFile(fixture('valid-bt.yaml'));

        expect(root.kind).toBe(NodeKind.Selector);
        expect(root.name).toBe('Root');
        expect(countNodes(root)).toBe(4);
        expect(describeTree(root).split('\n')).toEqual([
            'Selector "Root"',
            '  Sequence "Attack"',
            '    Condition "Enemy Close" [is_close_to_enemy]',
            '    Action "Low Punch" [RIGHT_DOWN_A → 6, 3f]',
            '  Action "Idle Jab" [A → 4, 1f]',
        ]);
    });

    it('produces a tree that ticks with the bound predicates and ids', () => {
        const root = createLoader().loadFile(fixture('valid-bt.yaml'));
        const state = new TreeState();
        const close = makeSnapshot({ playerX: 100, enemyX: 110 });
        const far = makeSnapshot({ playerX: 100, enemyX: 400 });

        expect(tick(root, state, close)).toEqual({ status: NodeStatus.RUNNING, actionId: 6, chosen: true });
        expect(tick(root, state, close)).toEqual({ status: NodeStatus.RUNNING, actionId: 6, chosen: true });
        expect(tick(root, state, close)).toEqual({ status: NodeStatus.SUCCESS, actionId: 6, chosen: true });
        expect(tick(root, state, far)).toEqual({ status: NodeStatus.RUNNING, actionId: 4, chosen: true });
        expect(tick(root, state, far)).toEqual({ status: NodeStatus.SUCCESS, actionId: 4, chosen: true });
    });

    it('defaults the name to the node type and frames_needed to 1', () => {
        const root = createLoader().load({
            node: {
                type: 'Sequence',
                children: [{ type: 'Action', properties: { action_id: 'B' } }],
            },
        });

        expect(describeTree(root).split('\n')).toEqual([
            'Sequence "Sequence"',
            '  Action "Action" [B → 5, 1f]',
        ]);
    });

    it('loads the bundled default tree against the bundled action space without warnings', () => {
        const logs = captureLogs();
        const root = new BehaviorTreeLoader(loadActionCatalog(), conditions).loadFile();

        expect(root.name).toBe('Aggressive Fighter');
        expect(countNodes(root)).toBe(26);
        expect(loaderWarnings(logs)).toEqual([]);

        const lines = describeTree(root).split('\n');
        expect(lines.slice(0, 8)).toEqual([
            'Selector "Aggressive Fighter"',
            '  Sequence "Close Range Attack"',
            '    Condition "Enemy is Close" [is_close_to_enemy]',
            '    Selector "Choose Close Attack"',
            '      Action "Low Punch" [RIGHT_DOWN_A → 9, 3f]',
            '      Action "Low Kick" [RIGHT_DOWN_B → 8, 3f]',
            '      Action "Leg Sweep" [DOWN_B → 7, 3f]',
            '      Action "Basic Punch" [A → 22, 2f]',
        ]);
        expect(lines).toContain('      Action "Fireball Special" [RIGHT_UP_B → 10, 7f]');
        expect(lines).toContain('        Action "Jump Forward" [RIGHT_UP → 6, 4f]');
        expect(lines).toContain('        Action "Jump Forward" [LEFT_UP → 5, 4f]');
        expect(lines[lines.length - 1]).toBe('  Action "Random Attack" [B → 18, 1f]');
    });

    it('is also available as a plain function', () => {
        const root = loadBehaviorTree({ node: { type: 'Selector', name: 'Empty' } }, catalog, conditions);
        expect(root.kind).toBe(NodeKind.Selector);
        expect(countNodes(root)).toBe(1);
    });
});

// ─── Action resolution ────────────────────────────────────────────────────────

describe('BehaviorTreeLoader: action names', () => {
    it('binds unknown action names to the neutral action and warns', () => {
        const logs = captureLogs();
        const root = createLoader().loadFile(fixture('unknown-action-bt.yaml'));

        expect(describeTree(root).split('\n')).toEqual([
            'Sequence "Root"',
            '  Action "Special" [HADOUKEN → 0, 2f]',
        ]);
        expect(loaderWarnings(logs)).toEqual([
            'node.children[0]: Action node "Special" names unknown action "HADOUKEN", using fallback id 0',
        ]);
    });

    it('binds unknown action names to the configured fallback id', () => {
        const root = createLoader({ fallbackActionId: 5 }).loadFile(fixture('unknown-action-bt.yaml'));
        expect(describeTree(root)).toContain('[HADOUKEN → 5, 2f]');
    });

    it('treats a missing action_id as unknown', () => {
        const root = createLoader().load({ node: { type: 'Action', name: 'Wait' } });
        expect(describeTree(root)).toBe('Action "Wait" [ → 0, 1f]');
    });

    it('rejects unknown action names under the fail policy', () => {
        const path = fixture('unknown-action-bt.yaml');
        const loader = createLoader({ unresolvedActions: 'fail' });

        expect(() => loader.loadFile(path)).toThrow(UnresolvedActionError);
        expect(() => loader.loadFile(path)).toThrow(`Action "HADOUKEN" is not in the action catalog (in ${path})`);
    });

    it('rejects a non-string action_id', () => {
        expect(() => createLoader().load({ node: { type: 'Action', name: 'Jab', properties: { action_id: 9 } } }))
            .toThrow('node: Action node "Jab" has a non-string "action_id"');
    });
});

// ─── Invalid documents ────────────────────────────────────────────────────────

describe('BehaviorTreeLoader: invalid trees', () => {
    it('rejects unknown node types with the node path and file', () => {
        const path = fixture('invalid-node-type-bt.yaml');
        expect(() => createLoader().loadFile(path))
            .toThrow(`node.children[0]: Unknown node type: "Parallel" (in ${path})`);
    });

    it('does not load Inverter nodes from documents', () => {
        expect(() => createLoader().load({ node: { type: 'Inverter' } })).toThrow('node: Unknown node type: "Inverter"');
    });

    it('rejects invalid frames_needed values', () => {
        const text = (frames: string): string => yaml(
            'node:',
            '  type: Action',
            '  name: Bad',
            '  properties:',
            '    action_id: A',
            `    frames_needed: ${frames}`,
        );

        expect(() => createLoader().loadYaml(text('0'))).toThrow('node: Action node "Bad" has an invalid \'frames_needed\' value: 0');
        expect(() => createLoader().loadYaml(text('two'))).toThrow('invalid \'frames_needed\' value: "two"');
        expect(() => createLoader().loadYaml(text('2.5'))).toThrow(ConfigError);
    });

    it('rejects conditions that are not registered', () => {
        const text = yaml(
            'node:',
            '  type: Condition',
            '  name: Stunned',
            '  properties:',
            '    condition: is_stunned',
        );

        expect(() => createLoader().loadYaml(text, 'inline')).toThrow(UnknownConditionError);
        expect(() => createLoader().loadYaml(text, 'inline')).toThrow('Condition "is_stunned" is not registered (in inline)');
    });

    it('rejects a Condition without a condition name', () => {
        expect(() => createLoader().load({ node: { type: 'Condition', name: 'Check' } }))
            .toThrow('node: Condition node "Check" needs a "condition" name');
    });

    it('rejects a document without a root node', () => {
        expect(() => createLoader().loadYaml('tree: {}')).toThrow('Behavior tree document has no root "node"');
        expect(() => createLoader().loadYaml('')).toThrow('Behavior tree document has no root "node"');
    });

    it('checks the shape of every node', () => {
        const loader = createLoader();

        expect(() => loader.load({ node: 'Selector' })).toThrow('node: node must be a mapping');
        expect(() => loader.load({ node: { type: 'Sequence', name: 5 } })).toThrow('node: "name" must be a string');
        expect(() => loader.load({ node: { type: 'Action', properties: [1] } })).toThrow('node: "properties" must be a mapping');
        expect(() => loader.load({ node: { type: 'Sequence', children: {} } })).toThrow('node: "children" must be a list');
        expect(() => loader.load({ node: { type: 'Selector', children: [{ type: 'Sequence', children: [3] }] } }))
            .toThrow('node.children[0].children[0]: node must be a mapping');
    });

    it('ignores children under leaf nodes with a warning', () => {
        const logs = captureLogs();
        const root = createLoader().load({
            node: {
                type: 'Action',
                name: 'Jab',
                properties: { action_id: 'A' },
                children: [{ type: 'Action', name: 'Orphan' }],
            },
        });

        expect(countNodes(root)).toBe(1);
        expect(loaderWarnings(logs)).toEqual(['node: leaf node "Jab" has 1 children, ignoring them']);
    });
});
