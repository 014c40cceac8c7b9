/**
 * @pixelhold/engine-core — Barrel export
 * All public API surface for the engine core.
 */

// Entities
export { type Entity, type EntityId, type ISystem, entityKey, sameEntity } from './ecs/types.js';
export { EntityStore, type SpawnOptions } from './ecs/EntityStore.js';

// Resources
export {
    ASSET_KINDS,
    type AssetKind,
    type AssetLoader,
    type AudioAsset,
    type FontAsset,
    type ImageAsset,
    type RawAsset,
    type ResourceHandle,
} from './resources/assets.js';
export { ResourceCache, canonicalPath, type ResourceCacheOptions, type ResourceEntry } from './resources/ResourceCache.js';
export { createFileAssetLoader, readImageSize } from './resources/fileLoader.js';
export {
    TemplateRegistry,
    type RegisterOptions,
    type Template,
    type TemplateDefinition,
    type TemplateId,
} from './resources/TemplateRegistry.js';
export {
    ManifestSchema,
    applyManifest,
    parseManifest,
    readManifest,
    type AppliedManifest,
    type Manifest,
} from './resources/manifest.js';

// Events
export {
    EventBus,
    type BusEvent,
    type EventBusOptions,
    type EventHandler,
    type SubscriptionId,
    type SubscriptionOwner,
} from './events/EventBus.js';
export * from './events/EngineEvents.js';

// Animation
export { AnimationClock, type AnimationClockOptions } from './animation/AnimationClock.js';

// Scenes
export type { Scene, SceneTransition } from './scenes/Scene.js';
export { SceneContext, type SceneServices } from './scenes/SceneContext.js';
export { SceneStack, type SceneStackOptions, type StackEntry } from './scenes/SceneStack.js';

// Rendering
export { DrawList, type DrawCommand } from './render/DrawList.js';

// Loop
export { GameLoop, type GameLoopOptions } from './loop/GameLoop.js';
export { createEngineContext, type EngineContext, type EngineContextOptions } from './loop/EngineContext.js';

// Services
export * from './services/Collaborators.js';

// Errors / logging
export * from './errors/EngineError.js';
export { guardTick } from './errors/guard.js';
export {
    ConsoleLogger,
    createSilentLogger,
    type ConsoleLoggerOptions,
    type LogLevel,
    type LogSink,
    type Logger,
} from './logging/Logger.js';

// Data / Config
export * from './data/EngineConfig.js';

// Utils
export * from './utils/MathUtils.js';
