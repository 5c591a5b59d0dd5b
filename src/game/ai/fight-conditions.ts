import { DEFAULT_AI_SETTINGS, type AiSettings } from '../ai-settings';
import type { Predicate } from './behavior-tree';
import { ConditionProvider } from './conditions';
import { horizontalDistance, type FightSnapshot } from './game-state';

type RangeSettings = Pick<AiSettings, 'closeRange' | 'longRange' | 'sideMargin'>;

/** Names the reference conditions are registered under */
export const FIGHT_CONDITIONS = {
    enemyToTheRight: 'is_enemy_to_the_right',
    enemyToTheLeft: 'is_enemy_to_the_left',
    close: 'is_close_to_enemy',
    mediumRange: 'is_medium_range_enemy',
    longRange: 'is_long_range_enemy',
} as const;

/**
 * Reference predicates over the two fighters' horizontal positions.
 * The three range bands partition the distance axis:
 * close ≤ closeRange < medium ≤ longRange < long.
 */
export function fightPredicates(settings: RangeSettings = DEFAULT_AI_SETTINGS): Array<[string, Predicate<FightSnapshot>]> {
    const { closeRange, longRange, sideMargin } = settings;

    return [
        [FIGHT_CONDITIONS.enemyToTheRight, s => s.playerX < s.enemyX - sideMargin],
        [FIGHT_CONDITIONS.enemyToTheLeft, s => s.playerX > s.enemyX + sideMargin],
        [FIGHT_CONDITIONS.close, s => horizontalDistance(s) <= closeRange],
        [FIGHT_CONDITIONS.mediumRange, s => {
            const d = horizontalDistance(s);
            return d > closeRange && d <= longRange;
        }],
        [FIGHT_CONDITIONS.longRange, s => horizontalDistance(s) > longRange],
    ];
}

export function createFightConditions(settings: RangeSettings = DEFAULT_AI_SETTINGS): ConditionProvider<FightSnapshot> {
    return new ConditionProvider(fightPredicates(settings));
}
