/**
 * EntityStore — owns live entity instances.
 *
 * Removal is "mark, then flush": despawn() only clears the alive flag, the
 * entity stays addressable until flush() runs at the end of the tick. Indices
 * are recycled at flush with a bumped generation.
 */

import { NotFoundError } from '../errors/EngineError.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { EventBus, EventHandler, SubscriptionId, SubscriptionOwner } from '../events/EventBus.js';
import type { EngineEventMap } from '../events/EngineEvents.js';
import type { TemplateId, TemplateRegistry } from '../resources/TemplateRegistry.js';
import type { Vec2 } from '../utils/MathUtils.js';
import { entityKey, type Entity, type EntityId } from './types.js';

export interface SpawnOptions {
    owner?: SubscriptionOwner;
    tags?: Iterable<string>;
}

export class EntityStore {
    // ── Slots ──────────────────────────────────────────────────────────────
    private slots: Array<Entity | undefined> = [];
    private generations: number[] = [];
    private freeIndices: number[] = [];

    // ── Lifecycle ──────────────────────────────────────────────────────────
    /** Spawn order; iteration and draw order follow it. */
    private order = new Set<Entity>();
    private pendingRemoval: Entity[] = [];

    private readonly logger: Logger;

    constructor(
        private readonly templates: TemplateRegistry,
        private readonly events: EventBus<EngineEventMap>,
        logger?: Logger,
    ) {
        this.logger = (logger ?? new ConsoleLogger()).child('EntityStore');
    }

    // ── Spawn / despawn ────────────────────────────────────────────────────

    /** @throws UnknownTemplateError */
    spawn(template: TemplateId, position: Vec2, options: SpawnOptions = {}): EntityId {
        this.templates.get(template);

        const index = this.freeIndices.pop() ?? this.slots.length;
        const generation = this.generations[index] ?? 0;
        this.generations[index] = generation;

        const entity: Entity = {
            id: [index, generation],
            template,
            position: { x: position.x, y: position.y },
            frame: 0,
            elapsed: 0,
            finished: false,
            tags: new Set(options.tags),
            alive: true,
            owner: options.owner,
        };
        this.slots[index] = entity;
        this.order.add(entity);
        return entity.id;
    }

    /** Marks the entity dead. Physical removal waits for flush(). */
    despawn(id: EntityId): void {
        const entity = this.lookup(id);
        if (!entity.alive) return;
        entity.alive = false;
        this.pendingRemoval.push(entity);
    }

    /** @returns how many live entities were despawned */
    despawnOwnedBy(owner: SubscriptionOwner): number {
        let count = 0;
        for (const entity of this.forEachAlive((e) => e.owner === owner)) {
            this.despawn(entity.id);
            count++;
        }
        return count;
    }

    /** Hands the entity to another owner so it survives the current one's exit. */
    transfer(id: EntityId, owner: SubscriptionOwner | undefined): void {
        this.getMut(id).owner = owner;
    }

    /**
     * Subscribes on behalf of an entity; the subscription is dropped when the
     * entity is flushed.
     * @throws NotFoundError
     */
    subscribeFor<K extends keyof EngineEventMap>(
        id: EntityId,
        kind: K,
        handler: EventHandler<EngineEventMap[K]>,
    ): SubscriptionId {
        const entity = this.lookup(id);
        return this.events.subscribe(kind, handler, entityKey(entity.id));
    }

    /**
     * Removes every entity despawned since the last flush, along with the event
     * subscriptions it owned. @returns the removed ids
     */
    flush(): EntityId[] {
        if (this.pendingRemoval.length === 0) return [];
        const removed: EntityId[] = [];
        for (const entity of this.pendingRemoval) {
            const [index, generation] = entity.id;
            this.slots[index] = undefined;
            this.generations[index] = generation + 1;
            this.freeIndices.push(index);
            this.order.delete(entity);
            this.events.unsubscribeOwner(entityKey(entity.id));
            removed.push(entity.id);
        }
        this.pendingRemoval.length = 0;
        this.logger.debug(`Flushed ${removed.length} entit${removed.length === 1 ? 'y' : 'ies'}`);
        return removed;
    }

    // ── Access ─────────────────────────────────────────────────────────────

    /**
     * Despawned entities are still returned (with `alive === false`) until flush.
     * @throws NotFoundError if the id was never issued or has been flushed
     */
    get(id: EntityId): Readonly<Entity> {
        return this.lookup(id);
    }

    /** @throws NotFoundError */
    getMut(id: EntityId): Entity {
        return this.lookup(id);
    }

    isAlive(id: EntityId): boolean {
        const entity = this.slots[id[0]];
        return entity !== undefined && entity.id[1] === id[1] && entity.alive;
    }

    /**
     * Live entities in spawn order, snapshotted now. Entities spawned during
     * iteration are not visited; entities despawned during it are skipped.
     */
    forEachAlive(filter?: (entity: Readonly<Entity>) => boolean): IterableIterator<Entity> {
        const snapshot = [...this.order].filter((e) => e.alive && (!filter || filter(e)));
        return (function* () {
            for (const entity of snapshot) {
                if (entity.alive) yield entity;
            }
        })();
    }

    withTag(tag: string): IterableIterator<Entity> {
        return this.forEachAlive((e) => e.tags.has(tag));
    }

    addTag(id: EntityId, tag: string): void {
        this.getMut(id).tags.add(tag);
    }

    removeTag(id: EntityId, tag: string): boolean {
        return this.getMut(id).tags.delete(tag);
    }

    resetAnimation(id: EntityId): void {
        const entity = this.getMut(id);
        entity.frame = 0;
        entity.elapsed = 0;
        entity.finished = false;
    }

    get aliveCount(): number {
        return this.order.size - this.pendingRemoval.length;
    }

    /** Live plus despawned-but-unflushed. */
    get size(): number {
        return this.order.size;
    }

    dispose(): void {
        this.slots.length = 0;
        this.generations.length = 0;
        this.freeIndices.length = 0;
        this.order.clear();
        this.pendingRemoval.length = 0;
    }

    private lookup(id: EntityId): Entity {
        const entity = this.slots[id[0]];
        if (!entity || entity.id[1] !== id[1]) {
            throw new NotFoundError('entity', `${id[0]}:${id[1]}`);
        }
        return entity;
    }
}
