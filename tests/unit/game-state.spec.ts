import { describe, it, expect } from 'vitest';
import { EMPTY_SNAPSHOT, horizontalDistance, snapshotFromInfo } from '@/game/ai/game-state';

describe('snapshotFromInfo', () => {
    it('copies the fighters\' positions out of the RAM info', () => {
        const snapshot = snapshotFromInfo({
            x_position: 120,
            y_position: 30,
            enemy_x_position: 200,
            enemy_y_position: 0,
            health: 176,
        });

        expect(snapshot).toEqual({ playerX: 120, playerY: 30, enemyX: 200, enemyY: 0 });
    });

    it('reads missing and non-numeric entries as 0', () => {
        expect(snapshotFromInfo({})).toEqual(EMPTY_SNAPSHOT);
        expect(snapshotFromInfo({ x_position: '12', enemy_x_position: Number.NaN, y_position: null }))
            .toEqual({ playerX: 0, playerY: 0, enemyX: 0, enemyY: 0 });
    });
});

describe('horizontalDistance', () => {
    it('is symmetric and ignores height', () => {
        expect(horizontalDistance({ playerX: 10, playerY: 0, enemyX: 70, enemyY: 90 })).toBe(60);
        expect(horizontalDistance({ playerX: 70, playerY: 90, enemyX: 10, enemyY: 0 })).toBe(60);
    });
});
