/**
 * AnimationClock — advances per-entity frame state every simulation step.
 *
 * Looping templates wrap; non-looping ones clamp on the last frame and publish
 * AnimationFinished exactly once. Zero-duration frames advance instantly, capped
 * at `maxFrameAdvances` per entity per call.
 */

import { MAX_FRAME_ADVANCES } from '../data/EngineConfig.js';
import { guardTick } from '../errors/guard.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { EventBus } from '../events/EventBus.js';
import { EngineEventType, type EngineEventMap } from '../events/EngineEvents.js';
import type { EntityStore } from '../ecs/EntityStore.js';
import type { Entity, ISystem } from '../ecs/types.js';
import type { Template, TemplateRegistry } from '../resources/TemplateRegistry.js';

export interface AnimationClockOptions {
    maxFrameAdvances?: number;
    logger?: Logger;
    strict?: boolean;
}

export class AnimationClock implements ISystem {
    readonly name = 'AnimationClock';

    private readonly maxFrameAdvances: number;
    private readonly logger: Logger;
    private readonly strict: boolean;

    constructor(
        private readonly entities: EntityStore,
        private readonly templates: TemplateRegistry,
        private readonly events: EventBus<EngineEventMap>,
        options: AnimationClockOptions = {},
    ) {
        this.maxFrameAdvances = options.maxFrameAdvances ?? MAX_FRAME_ADVANCES;
        this.logger = (options.logger ?? new ConsoleLogger()).child('AnimationClock');
        this.strict = options.strict ?? false;
    }

    update(dtMs: number): void {
        this.advance(dtMs);
    }

    advance(dtMs: number): void {
        if (!Number.isFinite(dtMs) || dtMs < 0) {
            this.logger.warn(`Ignoring advance(${dtMs})`);
            return;
        }

        for (const entity of this.entities.forEachAlive()) {
            if (entity.finished) continue;
            guardTick(this.logger, this.strict, `animate ${entity.id[0]}:${entity.id[1]}`, () => {
                const template = this.templates.get(entity.template);
                if (template.frames.length > 1) this.step(entity, template, dtMs);
            });
        }
    }

    private step(entity: Entity, template: Template, dtMs: number): void {
        const last = template.frames.length - 1;
        entity.elapsed += dtMs;

        let advances = 0;
        while (entity.elapsed >= template.durations[entity.frame]) {
            if (advances >= this.maxFrameAdvances) {
                this.logger.event(`Template '${template.name}' hit the ${this.maxFrameAdvances}-frame advance cap`);
                entity.elapsed = 0;
                return;
            }
            advances++;

            if (entity.frame < last) {
                entity.elapsed -= template.durations[entity.frame];
                entity.frame++;
            } else if (template.loop) {
                entity.elapsed -= template.durations[entity.frame];
                entity.frame = 0;
            } else {
                entity.elapsed = template.durations[last];
                entity.finished = true;
                this.events.publish({
                    kind: EngineEventType.AnimationFinished,
                    payload: { entity: entity.id, template: template.id },
                });
                return;
            }
        }
    }
}
