import { ConfigError, UnknownButtonError } from '../errors';

/** Button label, e.g. 'LEFT' or 'A' */
export type Button = string;

/** Fixed-width 0/1 flags, one per registered button */
export type PressVector = readonly (0 | 1)[];

/** Sega Genesis pad, in the order the emulator expects the press vector */
export const GENESIS_BUTTONS: readonly Button[] = [
    'B', 'A', 'MODE', 'START', 'UP', 'DOWN', 'LEFT', 'RIGHT', 'C', 'Y', 'X', 'Z',
];

/**
 * Ordered, duplicate-free list of buttons. A button's position is its index
 * in every press vector.
 */
export class ButtonRegistry {
    private readonly _labels: readonly Button[];
    private readonly indices = new Map<Button, number>();

    constructor(labels: readonly Button[]) {
        labels.forEach((label, index) => {
            if (label.length === 0) {
                throw new ConfigError(`Button label at position ${index} is empty`);
            }
            if (this.indices.has(label)) {
                throw new ConfigError(`Button "${label}" is registered twice`);
            }
            this.indices.set(label, index);
        });
        this._labels = Object.freeze([...labels]);
    }

    get size(): number {
        return this._labels.length;
    }

    get labels(): readonly Button[] {
        return this._labels;
    }

    has(label: Button): boolean {
        return this.indices.has(label);
    }

    indexOf(label: Button): number {
        const index = this.indices.get(label);
        if (index === undefined) throw new UnknownButtonError(label);
        return index;
    }

    /** Press vector with a 1 at each listed button. Repeated buttons are harmless. */
    toVector(buttons: Iterable<Button>): PressVector {
        const vector: (0 | 1)[] = new Array<0 | 1>(this.size).fill(0);
        for (const button of buttons) {
            vector[this.indexOf(button)] = 1;
        }
        return vector;
    }

    /** Registry-ordered labels pressed in a vector */
    fromVector(vector: readonly number[]): Button[] {
        this.assertVector(vector);
        return this._labels.filter((_, i) => vector[i] === 1);
    }

    /** Deduplicated copy in registry order */
    sortByRegistry(buttons: Iterable<Button>): Button[] {
        return this.fromVector(this.toVector(buttons));
    }

    private assertVector(vector: readonly number[]): void {
        if (vector.length !== this.size) {
            throw new ConfigError(`Press vector has width ${vector.length}, expected ${this.size}`);
        }
        if (vector.some(v => v !== 0 && v !== 1)) {
            throw new ConfigError(`Press vector must contain only 0 and 1: [${vector.join(', ')}]`);
        }
    }
}
