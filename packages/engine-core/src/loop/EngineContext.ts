/**
 * The one top-level context: every core component, constructed once and passed
 * by reference. Nothing in the core is a global.
 */

import { AnimationClock } from '../animation/AnimationClock.js';
import { defaultEngineConfig, type EngineConfig } from '../data/EngineConfig.js';
import { EntityStore } from '../ecs/EntityStore.js';
import { EventBus } from '../events/EventBus.js';
import type { EngineEventMap } from '../events/EngineEvents.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { createFileAssetLoader } from '../resources/fileLoader.js';
import { ResourceCache } from '../resources/ResourceCache.js';
import { TemplateRegistry } from '../resources/TemplateRegistry.js';
import type { AssetLoader } from '../resources/assets.js';
import { SceneStack } from '../scenes/SceneStack.js';

export interface EngineContext {
    readonly config: EngineConfig;
    readonly logger: Logger;
    readonly events: EventBus<EngineEventMap>;
    readonly resources: ResourceCache;
    readonly templates: TemplateRegistry;
    readonly entities: EntityStore;
    readonly animation: AnimationClock;
    readonly scenes: SceneStack;
}

export interface EngineContextOptions {
    /** Defaults to reading files under `config.resources.root`. */
    loader?: AssetLoader;
    /** Defaults to a ConsoleLogger at `config.log.level`. */
    logger?: Logger;
}

export function createEngineContext(
    config: EngineConfig = defaultEngineConfig(),
    options: EngineContextOptions = {},
): EngineContext {
    const logger =
        options.logger ??
        new ConsoleLogger({ level: config.log.level, eventThrottleMs: config.log.eventThrottleMs });
    const strict = config.strictHandles;

    const events = new EventBus<EngineEventMap>({ logger, strict });
    const resources = new ResourceCache(options.loader ?? createFileAssetLoader(config.resources.root), {
        supportedFormats: config.resources.supportedFormats,
        logger,
        events,
    });
    const templates = new TemplateRegistry(resources, logger);
    const entities = new EntityStore(templates, events, logger);
    const animation = new AnimationClock(entities, templates, events, {
        maxFrameAdvances: config.animation.maxFrameAdvances,
        logger,
        strict,
    });
    const scenes = new SceneStack({ resources, templates, entities, events, logger }, { strict });

    return { config, logger, events, resources, templates, entities, animation, scenes };
}
