/**
 * GameplayScene — the hero walks right through a row of slimes.
 *
 * Touching a slime swaps it for a one-shot death animation; the corpse is
 * despawned when that animation finishes. The wave ends once no slime or
 * corpse is left.
 */

import {
    EngineEventType,
    type EngineEvent,
    type EntityId,
    type Scene,
    type SceneContext,
} from '@pixelhold/engine-core';
import type { DemoAssets } from '../game/DemoAssets.js';
import { PauseScene } from './PauseScene.js';

// ── Tuning ─────────────────────────────────────────────────────────────────
export const HERO_SPEED = 120; // px per second
export const HERO_START_X = 16;
export const GROUND_Y = 100;
export const SLIME_XS: readonly number[] = [120, 180, 240];
export const CONTACT_RANGE = 16;

const ENEMY = 'enemy';
const CORPSE = 'corpse';

export class GameplayScene implements Scene {
    readonly name = 'Gameplay';
    readonly opaque = true;

    /** Slimes touched so far. */
    defeated = 0;
    private hero: EntityId | undefined;
    private cleared = false;

    constructor(private readonly assets: DemoAssets) {}

    onEnter(ctx: SceneContext): void {
        this.hero = ctx.spawn(this.assets.template('hero_walk'), { x: HERO_START_X, y: GROUND_Y }, ['player']);
        for (const x of SLIME_XS) {
            ctx.spawn(this.assets.template('slime_idle'), { x, y: GROUND_Y + 16 }, [ENEMY]);
        }

        ctx.subscribe(EngineEventType.AnimationFinished, ({ entity }) => {
            if (ctx.entities.get(entity).tags.has(CORPSE)) ctx.entities.despawn(entity);
        });
        ctx.logger.info(`Wave of ${SLIME_XS.length} slimes`);
    }

    onPause(ctx: SceneContext): void {
        ctx.logger.info('Paused');
    }

    onResume(ctx: SceneContext): void {
        ctx.logger.info('Resumed');
    }

    onEvent(event: EngineEvent, ctx: SceneContext): void {
        if (event.kind !== EngineEventType.KeyDown) return;
        if (event.payload.key === 'Escape') ctx.push(new PauseScene());
        if (event.payload.key === 'q') ctx.quit('player quit');
    }

    onUpdate(dtMs: number, ctx: SceneContext): void {
        if (!this.hero || this.cleared) return;
        const hero = ctx.entities.getMut(this.hero);
        hero.position.x += (HERO_SPEED * dtMs) / 1000;

        for (const slime of ctx.entities.withTag(ENEMY)) {
            if (Math.abs(slime.position.x - hero.position.x) >= CONTACT_RANGE) continue;
            ctx.entities.despawn(slime.id);
            ctx.spawn(this.assets.template('slime_die'), slime.position, [CORPSE]);
            ctx.publish({ kind: EngineEventType.PlaySound, payload: { handle: this.assets.resource('hit') } });
            this.defeated++;
        }

        const remaining = [...ctx.entities.forEachAlive((e) => e.tags.has(ENEMY) || e.tags.has(CORPSE))];
        if (remaining.length === 0) {
            this.cleared = true;
            ctx.logger.info(`Wave cleared, ${this.defeated} slime(s) defeated`);
            ctx.quit('wave cleared');
        }
    }
}
