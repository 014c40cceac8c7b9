/**
 * MenuScene — title screen. Enter starts a wave, Q quits.
 */

import { EngineEventType, type EngineEvent, type Scene, type SceneContext } from '@pixelhold/engine-core';
import type { DemoAssets } from '../game/DemoAssets.js';
import { GameplayScene } from './GameplayScene.js';

export class MenuScene implements Scene {
    readonly name = 'Menu';
    readonly opaque = true;

    constructor(private readonly assets: DemoAssets) {}

    onEnter(ctx: SceneContext): void {
        ctx.spawn('title_blink', { x: 112, y: 60 });
        ctx.publish({
            kind: EngineEventType.PlayMusic,
            payload: { handle: this.assets.resource('theme'), loop: true },
        });
        ctx.logger.info('Press Enter to start');
    }

    onExit(ctx: SceneContext): void {
        ctx.publish({ kind: EngineEventType.StopMusic, payload: {} });
    }

    onEvent(event: EngineEvent, ctx: SceneContext): void {
        if (event.kind !== EngineEventType.KeyDown) return;
        switch (event.payload.key) {
            case 'Enter':
                ctx.replace(new GameplayScene(this.assets));
                break;
            case 'q':
                ctx.quit('quit from menu');
                break;
        }
    }
}
