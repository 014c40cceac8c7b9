/**
 * Collaborators — the narrow interfaces to everything outside the core
 * (input devices, the rasterizer, the audio mixer, wall-clock time).
 * The hosting app provides implementations; the stubs here drive headless runs.
 */

import {
    EngineEventType,
    type AudioEvent,
    type InputEvent,
    type MouseButtonName,
} from '../events/EngineEvents.js';
import type { DrawCommand } from '../render/DrawList.js';
import type { Vec2 } from '../utils/MathUtils.js';

// ─── Input ──────────────────────────────────────────────────────────────────

export type InputSample =
    | { type: 'key'; key: string; pressed: boolean; repeat?: boolean }
    | { type: 'mouse_move'; position: Vec2 }
    | { type: 'mouse_button'; button: MouseButtonName; pressed: boolean; position: Vec2 };

export interface InputSource {
    /** Raw samples gathered since the previous poll. */
    poll(): InputSample[];
}

export function toInputEvent(sample: InputSample): InputEvent {
    switch (sample.type) {
        case 'key':
            return {
                kind: sample.pressed ? EngineEventType.KeyDown : EngineEventType.KeyUp,
                payload: { key: sample.key, repeat: sample.repeat ?? false },
            };
        case 'mouse_move':
            return { kind: EngineEventType.MouseMove, payload: { position: sample.position } };
        case 'mouse_button':
            return {
                kind: EngineEventType.MouseButton,
                payload: { button: sample.button, pressed: sample.pressed, position: sample.position },
            };
    }
}

/** Replays queued samples; push() from tests or a scripted demo. */
export class QueuedInputSource implements InputSource {
    private queue: InputSample[] = [];

    push(...samples: InputSample[]): void {
        this.queue.push(...samples);
    }

    poll(): InputSample[] {
        const drained = this.queue;
        this.queue = [];
        return drained;
    }
}

// ─── Render ─────────────────────────────────────────────────────────────────

export interface RenderTarget {
    /** Called once per tick with every visible command, bottom layer first. */
    draw(commands: readonly DrawCommand[]): void;
}

export class NullRenderTarget implements RenderTarget {
    frames = 0;

    draw(_commands: readonly DrawCommand[]): void {
        this.frames++;
    }
}

// ─── Audio ──────────────────────────────────────────────────────────────────

export interface AudioSink {
    handle(command: AudioEvent): void;
}

export class NullAudioSink implements AudioSink {
    handle(_command: AudioEvent): void {}
}

// ─── Time ───────────────────────────────────────────────────────────────────

export interface Scheduler {
    /** Milliseconds on a monotonic clock. */
    now(): number;
    /** Runs `callback` once after `delayMs`. @returns a canceller */
    schedule(callback: () => void, delayMs: number): () => void;
}

/** Node timers on the performance clock. */
export class TimerScheduler implements Scheduler {
    now(): number {
        return performance.now();
    }

    schedule(callback: () => void, delayMs: number): () => void {
        const timer = setTimeout(callback, Math.max(0, delayMs));
        return () => clearTimeout(timer);
    }
}
