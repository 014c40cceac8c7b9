/**
 * TemplateRegistry — named, immutable sprite templates.
 * Write-once per name; `force` rebinds a name for hot-reload without touching
 * the template that already-spawned entities point at.
 */

import {
    DuplicateTemplateError,
    InvalidTemplateError,
    UnknownTemplateError,
} from '../errors/EngineError.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { rectWithin, type Rect } from '../utils/MathUtils.js';
import type { ResourceCache } from './ResourceCache.js';
import type { ResourceHandle } from './assets.js';

export type TemplateId = number;

export interface TemplateDefinition {
    resource: ResourceHandle;
    frames: readonly Rect[];
    /** Milliseconds per frame, one entry per frame. */
    durations: readonly number[];
    loop: boolean;
}

export interface Template {
    readonly id: TemplateId;
    readonly name: string;
    readonly resource: ResourceHandle;
    readonly frames: readonly Readonly<Rect>[];
    readonly durations: readonly number[];
    readonly loop: boolean;
}

export interface RegisterOptions {
    /** Rebind an existing name instead of failing with DuplicateTemplateError. */
    force?: boolean;
}

export class TemplateRegistry {
    private nextId: TemplateId = 1;
    private templates = new Map<TemplateId, Template>();
    private byName = new Map<string, TemplateId>();
    private readonly logger: Logger;

    constructor(
        private readonly cache: ResourceCache,
        logger?: Logger,
    ) {
        this.logger = (logger ?? new ConsoleLogger()).child('TemplateRegistry');
    }

    /**
     * @throws DuplicateTemplateError when `name` is taken and `force` is not set
     * @throws InvalidTemplateError listing every problem with the definition
     */
    register(name: string, definition: TemplateDefinition, options: RegisterOptions = {}): TemplateId {
        const previous = this.byName.get(name);
        if (previous !== undefined && !options.force) {
            throw new DuplicateTemplateError(name);
        }

        const problems = this.validate(definition);
        if (problems.length > 0) {
            throw new InvalidTemplateError(name, problems);
        }

        const template: Template = Object.freeze({
            id: this.nextId++,
            name,
            resource: definition.resource,
            frames: Object.freeze(definition.frames.map((f) => Object.freeze({ x: f.x, y: f.y, w: f.w, h: f.h }))),
            durations: Object.freeze([...definition.durations]),
            loop: definition.loop,
        });

        // Held for the template's lifetime so the asset outlives every user.
        this.cache.retain(template.resource);
        this.templates.set(template.id, template);
        this.byName.set(name, template.id);

        if (previous !== undefined) {
            this.logger.info(`Template '${name}' reloaded (#${previous} → #${template.id})`);
        } else {
            this.logger.debug(`Template '${name}' registered as #${template.id}`);
        }
        return template.id;
    }

    /** @throws UnknownTemplateError */
    resolve(name: string): TemplateId {
        const id = this.byName.get(name);
        if (id === undefined) throw new UnknownTemplateError(name);
        return id;
    }

    /** @throws UnknownTemplateError */
    get(id: TemplateId): Template {
        const template = this.templates.get(id);
        if (!template) throw new UnknownTemplateError(id);
        return template;
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    names(): string[] {
        return [...this.byName.keys()];
    }

    get size(): number {
        return this.byName.size;
    }

    private validate(def: TemplateDefinition): string[] {
        const problems: string[] = [];

        let bounds: { width: number; height: number } | undefined;
        if (!this.cache.has(def.resource)) {
            problems.push(`resource #${def.resource} is not loaded`);
        } else {
            const asset = this.cache.get(def.resource);
            if (asset.kind !== 'image') {
                problems.push(`resource '${asset.path}' is a ${asset.kind}, not an image`);
            } else {
                bounds = { width: asset.width, height: asset.height };
            }
        }

        if (def.frames.length === 0) {
            problems.push('no frames');
        }
        if (def.durations.length !== def.frames.length) {
            problems.push(`${def.durations.length} duration(s) for ${def.frames.length} frame(s)`);
        }
        def.durations.forEach((d, i) => {
            if (!Number.isFinite(d) || d < 0) problems.push(`duration ${i} is ${d}`);
        });
        if (bounds) {
            const { width, height } = bounds;
            def.frames.forEach((f, i) => {
                if (!rectWithin(f, width, height)) {
                    problems.push(`frame ${i} (${f.x},${f.y} ${f.w}x${f.h}) outside ${width}x${height}`);
                }
            });
        }
        return problems;
    }
}
