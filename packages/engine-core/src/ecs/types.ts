/**
 * Entity type definitions.
 * - Entities are `[index, generation]` handles; an index is recycled only after
 *   flush, with its generation bumped, so stale handles never alias.
 * - Systems implement ISystem and are ticked by the GameLoop.
 */

import type { TemplateId } from '../resources/TemplateRegistry.js';
import type { Vec2 } from '../utils/MathUtils.js';
import type { SubscriptionOwner } from '../events/EventBus.js';

export type EntityId = readonly [index: number, generation: number];

export interface Entity {
    readonly id: EntityId;
    readonly template: TemplateId;
    position: Vec2;
    /** Current animation frame index into the template's frames. */
    frame: number;
    /** Milliseconds spent in the current frame. */
    elapsed: number;
    /** Non-looping animation reached its end; set once, cleared by resetAnimation. */
    finished: boolean;
    readonly tags: Set<string>;
    alive: boolean;
    /** Scene (or other token) whose lifetime bounds this entity. */
    owner: SubscriptionOwner | undefined;
}

/** Stable string key for maps and subscription ownership. */
export function entityKey(id: EntityId): string {
    return `entity:${id[0]}:${id[1]}`;
}

export function sameEntity(a: EntityId, b: EntityId): boolean {
    return a[0] === b[0] && a[1] === b[1];
}

export interface ISystem {
    readonly name: string;
    /** Called once per simulation step with the step length in milliseconds. */
    update(dtMs: number): void;
    /** Optional cleanup hook. */
    dispose?(): void;
}
