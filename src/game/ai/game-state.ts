/**
 * Read-only view of the fight, rebuilt from the emulator's RAM info every frame.
 */
export interface FightSnapshot {
    readonly playerX: number;
    readonly playerY: number;
    readonly enemyX: number;
    readonly enemyY: number;
}

/** RAM variable names exposed by the emulator's info dictionary */
export const RAM_KEYS = {
    playerX: 'x_position',
    playerY: 'y_position',
    enemyX: 'enemy_x_position',
    enemyY: 'enemy_y_position',
} as const satisfies Record<keyof FightSnapshot, string>;

export const EMPTY_SNAPSHOT: FightSnapshot = Object.freeze({ playerX: 0, playerY: 0, enemyX: 0, enemyY: 0 });

function readNumber(info: Readonly<Record<string, unknown>>, key: string): number {
    const value = info[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Missing or non-numeric entries read as 0 */
export function snapshotFromInfo(info: Readonly<Record<string, unknown>>): FightSnapshot {
    return {
        playerX: readNumber(info, RAM_KEYS.playerX),
        playerY: readNumber(info, RAM_KEYS.playerY),
        enemyX: readNumber(info, RAM_KEYS.enemyX),
        enemyY: readNumber(info, RAM_KEYS.enemyY),
    };
}

export function horizontalDistance(snapshot: FightSnapshot): number {
    return Math.abs(snapshot.playerX - snapshot.enemyX);
}
