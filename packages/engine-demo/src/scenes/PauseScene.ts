import { EngineEventType, type EngineEvent, type Scene, type SceneContext } from '@pixelhold/engine-core';

/** Translucent overlay; the gameplay below keeps rendering but stops updating. */
export class PauseScene implements Scene {
    readonly name = 'Pause';

    onEnter(ctx: SceneContext): void {
        ctx.spawn('pause_banner', { x: 128, y: 40 });
    }

    onEvent(event: EngineEvent, ctx: SceneContext): void {
        if (event.kind !== EngineEventType.KeyDown) return;
        if (event.payload.key === 'Escape') ctx.pop();
        if (event.payload.key === 'q') ctx.quit('quit while paused');
    }
}
