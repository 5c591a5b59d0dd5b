import { ConfigError, UnknownConditionError } from '../errors';
import type { Predicate } from './behavior-tree';

/**
 * Named boolean predicates over a game-state snapshot.
 *
 * Populated at setup time, then shared read-only. The tree loader resolves
 * each Condition node's name here once and binds the predicate itself, so
 * nothing is looked up by name while ticking.
 */
export class ConditionProvider<S> {
    private readonly predicates = new Map<string, Predicate<S>>();

    constructor(entries: Iterable<readonly [string, Predicate<S>]> = []) {
        for (const [name, predicate] of entries) {
            this.register(name, predicate);
        }
    }

    register(name: string, predicate: Predicate<S>): this {
        if (name.length === 0) {
            throw new ConfigError('Condition name must not be empty');
        }
        if (this.predicates.has(name)) {
            throw new ConfigError(`Condition "${name}" is already registered`);
        }
        this.predicates.set(name, predicate);
        return this;
    }

    has(name: string): boolean {
        return this.predicates.has(name);
    }

    get names(): string[] {
        return [...this.predicates.keys()];
    }

    resolve(name: string): Predicate<S> {
        const predicate = this.predicates.get(name);
        if (!predicate) throw new UnknownConditionError(name);
        return predicate;
    }

    evaluate(name: string, snapshot: Readonly<S>): boolean {
        return this.resolve(name)(snapshot);
    }
}
