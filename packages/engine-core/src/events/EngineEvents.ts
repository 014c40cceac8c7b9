/**
 * Engine event kinds and their payloads.
 */

import type { AssetKind, ResourceHandle } from '../resources/assets.js';
import type { LoadFailureReason } from '../errors/EngineError.js';
import type { EntityId } from '../ecs/types.js';
import type { TemplateId } from '../resources/TemplateRegistry.js';
import type { Vec2 } from '../utils/MathUtils.js';
import type { BusEvent } from './EventBus.js';

// ─── Event type constants ───────────────────────────────────────────────────

export const EngineEventType = {
    // Input
    KeyDown: 'input:key_down',
    KeyUp: 'input:key_up',
    MouseMove: 'input:mouse_move',
    MouseButton: 'input:mouse_button',

    // Animation
    AnimationFinished: 'animation:finished',

    // Resources
    ResourceLoaded: 'resource:loaded',
    ResourceLoadFailed: 'resource:load_failed',

    // Audio (consumed by the external mixer)
    PlaySound: 'audio:play_sound',
    PlayMusic: 'audio:play_music',
    StopSound: 'audio:stop_sound',
    StopMusic: 'audio:stop_music',

    // Scenes
    SceneChanged: 'scene:changed',

    // Application
    Quit: 'app:quit',
} as const;

export type EngineEventKind = (typeof EngineEventType)[keyof typeof EngineEventType];

// ─── Payload interfaces ─────────────────────────────────────────────────────

export interface KeyEvent {
    key: string;
    repeat: boolean;
}

export interface MouseMoveEvent {
    position: Vec2;
}

export type MouseButtonName = 'left' | 'middle' | 'right' | 'wheel_up' | 'wheel_down';

export interface MouseButtonEvent {
    button: MouseButtonName;
    pressed: boolean;
    position: Vec2;
}

export interface AnimationFinishedEvent {
    entity: EntityId;
    template: TemplateId;
}

export interface ResourceLoadedEvent {
    handle: ResourceHandle;
    path: string;
    kind: AssetKind;
}

export interface ResourceLoadFailedEvent {
    path: string;
    kind: AssetKind;
    reason: LoadFailureReason;
}

export interface PlaySoundEvent {
    handle: ResourceHandle;
    volume?: number;
}

export interface PlayMusicEvent {
    handle: ResourceHandle;
    loop: boolean;
    volume?: number;
}

export interface StopSoundEvent {
    handle: ResourceHandle;
}

export type StopMusicEvent = Record<string, never>;

export interface SceneChangedEvent {
    transition: 'push' | 'pop' | 'replace' | 'quit';
    /** Scene names bottom to top after the transition. */
    stack: string[];
}

export interface QuitEvent {
    reason: string;
}

export interface EngineEventMap {
    'input:key_down': KeyEvent;
    'input:key_up': KeyEvent;
    'input:mouse_move': MouseMoveEvent;
    'input:mouse_button': MouseButtonEvent;
    'animation:finished': AnimationFinishedEvent;
    'resource:loaded': ResourceLoadedEvent;
    'resource:load_failed': ResourceLoadFailedEvent;
    'audio:play_sound': PlaySoundEvent;
    'audio:play_music': PlayMusicEvent;
    'audio:stop_sound': StopSoundEvent;
    'audio:stop_music': StopMusicEvent;
    'scene:changed': SceneChangedEvent;
    'app:quit': QuitEvent;
}

/** Any engine event as a `{ kind, payload }` pair, discriminated by kind. */
export type EngineEvent = { [K in keyof EngineEventMap]: BusEvent<EngineEventMap, K> }[keyof EngineEventMap];

export type InputEvent = Extract<
    EngineEvent,
    { kind: 'input:key_down' | 'input:key_up' | 'input:mouse_move' | 'input:mouse_button' }
>;

export type AudioEvent = Extract<
    EngineEvent,
    { kind: 'audio:play_sound' | 'audio:play_music' | 'audio:stop_sound' | 'audio:stop_music' }
>;
