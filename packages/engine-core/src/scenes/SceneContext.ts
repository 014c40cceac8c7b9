/**
 * SceneContext — what a scene sees of the engine while it is on the stack.
 * Spawns and subscriptions made through it are owned by the scene and dropped
 * when it exits; transitions made through it are queued for the end of the tick.
 * Once the scene has exited, spawns and subscriptions throw SceneExitedError
 * and transition requests are ignored.
 */

import type { EntityStore } from '../ecs/EntityStore.js';
import type { Entity, EntityId } from '../ecs/types.js';
import { SceneExitedError } from '../errors/EngineError.js';
import type { BusEvent, EventBus, EventHandler, SubscriptionId } from '../events/EventBus.js';
import type { EngineEventMap } from '../events/EngineEvents.js';
import type { Logger } from '../logging/Logger.js';
import type { ResourceCache } from '../resources/ResourceCache.js';
import type { TemplateId, TemplateRegistry } from '../resources/TemplateRegistry.js';
import type { Vec2 } from '../utils/MathUtils.js';
import type { Scene, SceneTransition } from './Scene.js';

export interface SceneServices {
    resources: ResourceCache;
    templates: TemplateRegistry;
    entities: EntityStore;
    events: EventBus<EngineEventMap>;
    logger: Logger;
}

export class SceneContext {
    readonly logger: Logger;
    private exited = false;

    constructor(
        readonly scene: Scene,
        private readonly services: SceneServices,
        private readonly requestTransition: (transition: SceneTransition) => void,
    ) {
        this.logger = services.logger.child(scene.name);
    }

    get resources(): ResourceCache {
        return this.services.resources;
    }

    get templates(): TemplateRegistry {
        return this.services.templates;
    }

    get entities(): EntityStore {
        return this.services.entities;
    }

    get events(): EventBus<EngineEventMap> {
        return this.services.events;
    }

    get isExited(): boolean {
        return this.exited;
    }

    /** Called by the stack once the scene's onExit has run. */
    close(): void {
        this.exited = true;
    }

    // ── Scene-owned state ──────────────────────────────────────────────────

    /** @throws UnknownTemplateError, SceneExitedError */
    spawn(template: string | TemplateId, position: Vec2, tags?: Iterable<string>): EntityId {
        this.assertLive('spawn');
        const id = typeof template === 'string' ? this.templates.resolve(template) : template;
        return this.entities.spawn(id, position, { owner: this, tags });
    }

    /** Live entities owned by this scene. */
    ownEntities(): IterableIterator<Entity> {
        return this.entities.forEachAlive((e) => e.owner === this);
    }

    /** Takes ownership of an entity spawned elsewhere. */
    adopt(id: EntityId): void {
        this.assertLive('adopt');
        this.entities.transfer(id, this);
    }

    subscribe<K extends keyof EngineEventMap>(kind: K, handler: EventHandler<EngineEventMap[K]>): SubscriptionId {
        this.assertLive('subscribe');
        return this.events.subscribe(kind, handler, this);
    }

    /** Subscribes on behalf of an entity; dropped when that entity is flushed. */
    subscribeFor<K extends keyof EngineEventMap>(
        entity: EntityId,
        kind: K,
        handler: EventHandler<EngineEventMap[K]>,
    ): SubscriptionId {
        this.assertLive('subscribe');
        return this.entities.subscribeFor(entity, kind, handler);
    }

    publish<K extends keyof EngineEventMap>(event: BusEvent<EngineEventMap, K>): void {
        this.events.publish(event);
    }

    // ── Transitions (applied after this tick's update) ─────────────────────

    push(scene: Scene): void {
        this.transition({ type: 'push', scene });
    }

    pop(): void {
        this.transition({ type: 'pop' });
    }

    replace(scene: Scene): void {
        this.transition({ type: 'replace', scene });
    }

    quit(reason = 'requested by scene'): void {
        this.transition({ type: 'quit', reason });
    }

    private transition(transition: SceneTransition): void {
        if (this.exited) {
            this.logger.warn(`Ignoring ${transition.type} requested after exit`);
            return;
        }
        this.requestTransition(transition);
    }

    private assertLive(operation: string): void {
        if (this.exited) throw new SceneExitedError(this.scene.name, operation);
    }
}
