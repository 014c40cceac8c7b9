/**
 * DrawList — the ordered draw commands handed to the render collaborator once
 * per tick. The core never touches pixels.
 */

import type { Entity } from '../ecs/types.js';
import type { ResourceHandle } from '../resources/assets.js';
import type { TemplateRegistry } from '../resources/TemplateRegistry.js';
import type { Rect, Vec2 } from '../utils/MathUtils.js';

export interface DrawCommand {
    resource: ResourceHandle;
    /** Source rectangle inside the resource. */
    frame: Readonly<Rect>;
    /** Destination top-left in world pixels. */
    position: Vec2;
    /** Scene that queued the command; `undefined` for unowned entities. */
    layer: string | undefined;
}

export class DrawList {
    private commands: DrawCommand[] = [];
    private layer: string | undefined;

    constructor(private readonly templates: TemplateRegistry) {}

    /** Commands queued from now on are tagged with `layer`. */
    beginLayer(layer: string | undefined): void {
        this.layer = layer;
    }

    sprite(resource: ResourceHandle, frame: Readonly<Rect>, position: Vec2): void {
        this.commands.push({ resource, frame, position: { x: position.x, y: position.y }, layer: this.layer });
    }

    /** Queues the entity's current animation frame. @throws UnknownTemplateError */
    entity(entity: Readonly<Entity>): void {
        const template = this.templates.get(entity.template);
        const frame = template.frames[Math.min(entity.frame, template.frames.length - 1)];
        this.sprite(template.resource, frame, entity.position);
    }

    get length(): number {
        return this.commands.length;
    }

    toArray(): readonly DrawCommand[] {
        return this.commands;
    }
}
