import { ConfigError, UnresolvedActionError } from '../errors';
import { ButtonRegistry, type Button, type PressVector } from './button-registry';

/** Index into the action catalog */
export type ActionId = number;

/** Name given to the empty combo when the config does not name it */
export const NEUTRAL_ACTION_NAME = 'NEUTRAL';

/** Id the rest of the framework treats as "do nothing" */
export const NEUTRAL_ACTION_ID: ActionId = 0;

/** One discrete action: a set of buttons pressed together */
export interface ActionDefinition {
    readonly id: ActionId;
    readonly name: string;
    /** Pressed buttons in registry order */
    readonly buttons: readonly Button[];
    readonly vector: PressVector;
}

/** A combo that collapsed onto an earlier entry with the same vector */
export interface DroppedCombo {
    readonly name: string;
    readonly buttons: readonly Button[];
    readonly keptId: ActionId;
    readonly keptName: string;
}

function vectorKey(vector: readonly number[]): string {
    return vector.join('');
}

/**
 * Immutable set of discrete actions with lookups between the three
 * representations: name, id and press vector.
 *
 * Built once by buildActionCatalog() and shared read-only by everything that
 * turns action ids into controller input.
 */
export class ActionCatalog {
    public readonly buttons: ButtonRegistry;
    public readonly actions: readonly ActionDefinition[];
    public readonly dropped: readonly DroppedCombo[];

    private readonly byName = new Map<string, ActionId>();
    private readonly byVector = new Map<string, ActionId>();

    constructor(
        buttons: ButtonRegistry,
        actions: readonly ActionDefinition[],
        aliases: ReadonlyMap<string, ActionId> = new Map(),
        dropped: readonly DroppedCombo[] = [],
    ) {
        this.buttons = buttons;
        this.actions = Object.freeze([...actions]);
        this.dropped = Object.freeze([...dropped]);

        actions.forEach((def, index) => {
            if (def.id !== index) {
                throw new ConfigError(`Action "${def.name}" has id ${def.id}, expected ${index}`);
            }
            if (def.vector.length !== buttons.size) {
                throw new ConfigError(`Action "${def.name}" has vector width ${def.vector.length}, expected ${buttons.size}`);
            }
            const key = vectorKey(def.vector);
            const existing = this.byVector.get(key);
            if (existing !== undefined) {
                throw new ConfigError(`Actions "${actions[existing].name}" and "${def.name}" press the same buttons`);
            }
            if (this.byName.has(def.name)) {
                throw new ConfigError(`Action name "${def.name}" is used twice`);
            }
            this.byVector.set(key, def.id);
            this.byName.set(def.name, def.id);
        });

        // Aliases never shadow a canonical name
        for (const [alias, id] of aliases) {
            if (!this.byName.has(alias) && id >= 0 && id < actions.length) {
                this.byName.set(alias, id);
            }
        }
    }

    get size(): number {
        return this.actions.length;
    }

    /** Every resolvable name, aliases included */
    get actionMap(): ReadonlyMap<string, ActionId> {
        return this.byName;
    }

    /** Press vectors in id order */
    get binaryMapping(): readonly PressVector[] {
        return this.actions.map(def => def.vector);
    }

    /** Id of the all-zero vector, if the catalog has one */
    get neutralId(): ActionId | undefined {
        return this.byVector.get(vectorKey(new Array<number>(this.buttons.size).fill(0)));
    }

    has(id: ActionId): boolean {
        return Number.isInteger(id) && id >= 0 && id < this.actions.length;
    }

    idOf(name: string): ActionId | undefined {
        return this.byName.get(name);
    }

    requireId(name: string): ActionId {
        const id = this.byName.get(name);
        if (id === undefined) throw new UnresolvedActionError(name);
        return id;
    }

    definition(id: ActionId): ActionDefinition {
        if (!this.has(id)) {
            throw new RangeError(`Action id ${id} is outside the catalog (0..${this.actions.length - 1})`);
        }
        return this.actions[id];
    }

    vectorOf(id: ActionId): PressVector {
        return this.definition(id).vector;
    }

    idOfVector(vector: readonly number[]): ActionId | undefined {
        if (vector.length !== this.buttons.size) return undefined;
        return this.byVector.get(vectorKey(vector));
    }

    /** Order-insensitive lookup by pressed buttons */
    idOfCombo(buttons: Iterable<Button>): ActionId | undefined {
        return this.idOfVector(this.buttons.toVector(buttons));
    }

    comboToVector(buttons: Iterable<Button>): PressVector {
        return this.buttons.toVector(buttons);
    }
}
