/**
 * SceneStack — push/pop/replace state machine over game states.
 *
 * Outside a tick, transitions apply immediately. Inside one (between
 * beginTick and endTick) they are queued; a later request supersedes an
 * earlier one and applyPending() applies the survivor once update has run.
 * Requests made by a lifecycle hook while a transition is being applied are
 * queued the same way and, outside a tick, applied once it has finished.
 * An empty stack means the application is shutting down.
 */

import { EmptyStackError } from '../errors/EngineError.js';
import { guardTick } from '../errors/guard.js';
import { EngineEventType, type EngineEvent, type SceneChangedEvent } from '../events/EngineEvents.js';
import type { Logger } from '../logging/Logger.js';
import type { Scene, SceneTransition } from './Scene.js';
import { SceneContext, type SceneServices } from './SceneContext.js';

export interface StackEntry {
    readonly scene: Scene;
    readonly context: SceneContext;
}

export interface SceneStackOptions {
    strict?: boolean;
}

export class SceneStack {
    private entries: StackEntry[] = [];
    private pending: SceneTransition | undefined;
    private ticking = false;
    private applying = false;
    private readonly logger: Logger;
    private readonly strict: boolean;

    constructor(
        private readonly services: SceneServices,
        options: SceneStackOptions = {},
    ) {
        this.logger = services.logger.child('SceneStack');
        this.strict = options.strict ?? false;
    }

    // ── Queries ────────────────────────────────────────────────────────────

    get top(): Scene | undefined {
        return this.entries[this.entries.length - 1]?.scene;
    }

    get size(): number {
        return this.entries.length;
    }

    get isEmpty(): boolean {
        return this.entries.length === 0;
    }

    /** Bottom to top. */
    scenes(): Scene[] {
        return this.entries.map((e) => e.scene);
    }

    /** Scenes to render, bottom to top, starting at the highest opaque one. */
    visible(): readonly StackEntry[] {
        let start = 0;
        for (let i = this.entries.length - 1; i >= 0; i--) {
            if (this.entries[i].scene.opaque) {
                start = i;
                break;
            }
        }
        return this.entries.slice(start);
    }

    get pendingTransition(): SceneTransition | undefined {
        return this.pending;
    }

    // ── Transitions ────────────────────────────────────────────────────────

    push(scene: Scene): void {
        this.submit({ type: 'push', scene });
    }

    /** @throws EmptyStackError when only one scene is left (stack unchanged) */
    pop(): void {
        this.submit({ type: 'pop' });
    }

    /** Exit the top scene and enter `scene` as one step; the scene below is not resumed. */
    replace(scene: Scene): void {
        this.submit({ type: 'replace', scene });
    }

    /** Exits every scene, top first. */
    clear(reason = 'clear'): void {
        this.submit({ type: 'quit', reason });
    }

    /** Queues a transition for applyPending(); replaces any earlier queued one. */
    request(transition: SceneTransition): void {
        if (this.pending) {
            this.logger.debug(`'${describe(this.pending)}' superseded by '${describe(transition)}'`);
        }
        this.pending = transition;
    }

    /** @returns whether a transition was applied */
    applyPending(): boolean {
        const transition = this.pending;
        if (!transition) return false;
        this.pending = undefined;
        this.applyGuarded(transition);
        return true;
    }

    beginTick(): void {
        this.ticking = true;
    }

    endTick(): void {
        this.ticking = false;
    }

    // ── Per-tick dispatch ──────────────────────────────────────────────────

    update(dtMs: number): void {
        const entry = this.topEntry();
        if (!entry?.scene.onUpdate) return;
        const { scene, context } = entry;
        guardTick(this.logger, this.strict, `${scene.name}.onUpdate`, () => scene.onUpdate?.(dtMs, context));
    }

    /** Hands an input event to the top scene. */
    dispatch(event: EngineEvent): void {
        const entry = this.topEntry();
        if (!entry?.scene.onEvent) return;
        const { scene, context } = entry;
        guardTick(this.logger, this.strict, `${scene.name}.onEvent`, () => scene.onEvent?.(event, context));
    }

    // ── Internals ──────────────────────────────────────────────────────────

    private submit(transition: SceneTransition): void {
        if (this.ticking || this.applying) {
            this.request(transition);
        } else {
            this.applyGuarded(transition);
        }
    }

    private applyGuarded(transition: SceneTransition): void {
        let next: SceneTransition | undefined = transition;
        while (next) {
            this.applying = true;
            try {
                this.apply(next);
            } finally {
                this.applying = false;
            }
            next = this.ticking ? undefined : this.takePending();
        }
    }

    private takePending(): SceneTransition | undefined {
        const transition = this.pending;
        this.pending = undefined;
        return transition;
    }

    private apply(transition: SceneTransition): void {
        switch (transition.type) {
            case 'push': {
                const below = this.topEntry();
                if (below) this.hook(below, 'onPause');
                this.enter(transition.scene);
                break;
            }
            case 'pop': {
                if (this.entries.length <= 1) throw new EmptyStackError('pop');
                this.exitTop();
                const resumed = this.topEntry();
                if (resumed) this.hook(resumed, 'onResume');
                break;
            }
            case 'replace': {
                if (this.entries.length === 0) throw new EmptyStackError('replace');
                this.exitTop();
                this.enter(transition.scene);
                break;
            }
            case 'quit': {
                this.logger.info(`Clearing ${this.entries.length} scene(s): ${transition.reason}`);
                while (this.entries.length > 0) this.exitTop();
                if (this.pending) {
                    this.logger.debug(`'${describe(this.pending)}' dropped by quit`);
                    this.pending = undefined;
                }
                break;
            }
        }
        this.announce(transition.type);
    }

    private enter(scene: Scene): void {
        const context = new SceneContext(scene, this.services, (t) => this.submit(t));
        const entry: StackEntry = { scene, context };
        this.entries.push(entry);
        this.hook(entry, 'onEnter');
    }

    private exitTop(): void {
        const entry = this.entries[this.entries.length - 1];
        if (!entry) return;
        this.hook(entry, 'onExit');
        this.entries.pop();
        entry.context.close();
        const despawned = this.services.entities.despawnOwnedBy(entry.context);
        const dropped = this.services.events.unsubscribeOwner(entry.context);
        this.logger.debug(`${entry.scene.name} exited (${despawned} entities, ${dropped} subscriptions released)`);
    }

    private hook(entry: StackEntry, name: 'onEnter' | 'onExit' | 'onPause' | 'onResume'): void {
        const { scene, context } = entry;
        guardTick(this.logger, this.strict, `${scene.name}.${name}`, () => scene[name]?.(context));
    }

    private topEntry(): StackEntry | undefined {
        return this.entries[this.entries.length - 1];
    }

    private announce(transition: SceneChangedEvent['transition']): void {
        this.services.events.publish({
            kind: EngineEventType.SceneChanged,
            payload: { transition, stack: this.entries.map((e) => e.scene.name) },
        });
    }
}

function describe(t: SceneTransition): string {
    return t.type === 'push' || t.type === 'replace' ? `${t.type} ${t.scene.name}` : t.type;
}
