import type { EngineEvent } from '../events/EngineEvents.js';
import type { DrawList } from '../render/DrawList.js';
import type { SceneContext } from './SceneContext.js';

/**
 * A game state (menu, gameplay, pause). Every hook is optional.
 *
 * Lifecycle on the stack:
 * - `onEnter` when pushed (or swapped in by replace)
 * - `onPause` when another scene is pushed on top
 * - `onResume` when the scene above is popped (no second onEnter)
 * - `onExit` when popped, replaced or cleared; the scene's entities and
 *   subscriptions are dropped right after
 */
export interface Scene {
    readonly name: string;
    /** Hides every scene below this one from rendering. */
    readonly opaque?: boolean;

    onEnter?(ctx: SceneContext): void;
    onExit?(ctx: SceneContext): void;
    onPause?(ctx: SceneContext): void;
    onResume?(ctx: SceneContext): void;
    /** Input events, top scene only. */
    onEvent?(event: EngineEvent, ctx: SceneContext): void;
    /** Top scene only. */
    onUpdate?(dtMs: number, ctx: SceneContext): void;
    /** Called after the scene's own entities were queued; append overlays here. */
    onRender?(draw: DrawList, ctx: SceneContext): void;
}

export type SceneTransition =
    | { type: 'push'; scene: Scene }
    | { type: 'pop' }
    | { type: 'replace'; scene: Scene }
    | { type: 'quit'; reason: string };
