/**
 * GameLoop — drives ticks across the scene stack, systems and collaborators.
 *
 * One tick: poll input → publish input events → simulation step(s), each
 * scene update → systems → animation → flush → queued transition → render
 * visible scenes bottom-to-top once.
 *
 * Fixed mode runs `fixedStepMs` steps off an accumulator (capped per frame);
 * variable mode runs one step of the frame time. Either way a step's dt is
 * clamped to [0, maxFrameMs].
 */

import { defaultEngineConfig, type EngineConfig } from '../data/EngineConfig.js';
import { guardTick } from '../errors/guard.js';
import { EngineEventType, type AudioEvent } from '../events/EngineEvents.js';
import type { ISystem } from '../ecs/types.js';
import type { Logger } from '../logging/Logger.js';
import { DrawList } from '../render/DrawList.js';
import type { AssetLoader } from '../resources/assets.js';
import type { Scene } from '../scenes/Scene.js';
import {
    NullAudioSink,
    NullRenderTarget,
    QueuedInputSource,
    TimerScheduler,
    toInputEvent,
    type AudioSink,
    type InputSource,
    type RenderTarget,
    type Scheduler,
} from '../services/Collaborators.js';
import { clamp } from '../utils/MathUtils.js';
import { createEngineContext, type EngineContext } from './EngineContext.js';

export interface GameLoopOptions {
    config?: EngineConfig;
    /** Prebuilt context; `config`, `loader` and `logger` are ignored when given. */
    context?: EngineContext;
    loader?: AssetLoader;
    logger?: Logger;
    input?: InputSource;
    renderer?: RenderTarget;
    audio?: AudioSink;
    scheduler?: Scheduler;
    /** Extra per-step systems, run after the scene update and before animation. */
    systems?: ISystem[];
}

export class GameLoop {
    readonly context: EngineContext;

    private readonly input: InputSource;
    private readonly renderer: RenderTarget;
    private readonly audio: AudioSink;
    private readonly scheduler: Scheduler;
    private readonly systems: ISystem[];
    private readonly logger: Logger;

    private accumulator = 0;
    private running = false;
    private cancelFrame: (() => void) | undefined;
    private finishRun: (() => void) | undefined;

    /** Frames ticked so far. */
    public frames = 0;
    /** Simulated milliseconds so far. */
    public playTimeMs = 0;

    constructor(options: GameLoopOptions = {}) {
        this.context =
            options.context ??
            createEngineContext(options.config ?? defaultEngineConfig(), {
                loader: options.loader,
                logger: options.logger,
            });
        this.input = options.input ?? new QueuedInputSource();
        this.renderer = options.renderer ?? new NullRenderTarget();
        this.audio = options.audio ?? new NullAudioSink();
        this.scheduler = options.scheduler ?? new TimerScheduler();
        this.systems = options.systems ?? [];
        this.logger = this.context.logger.child('GameLoop');

        const { events, scenes } = this.context;
        const forward = (command: AudioEvent) => this.audio.handle(command);
        events.subscribe(EngineEventType.PlaySound, (payload) => forward({ kind: EngineEventType.PlaySound, payload }), this);
        events.subscribe(EngineEventType.PlayMusic, (payload) => forward({ kind: EngineEventType.PlayMusic, payload }), this);
        events.subscribe(EngineEventType.StopSound, (payload) => forward({ kind: EngineEventType.StopSound, payload }), this);
        events.subscribe(EngineEventType.StopMusic, (payload) => forward({ kind: EngineEventType.StopMusic, payload }), this);
        events.subscribe(EngineEventType.Quit, ({ reason }) => scenes.clear(reason), this);
    }

    get config(): EngineConfig {
        return this.context.config;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /** Pushes the bootstrap scene. */
    start(bootstrap: Scene): void {
        if (!this.context.scenes.isEmpty) {
            throw new Error(`GameLoop already started with '${this.context.scenes.top?.name}'`);
        }
        this.logger.info(`Starting with '${bootstrap.name}' (${this.config.loop.mode} step)`);
        this.context.scenes.push(bootstrap);
    }

    /**
     * Runs one frame of `frameMs` wall time.
     * @returns false once the scene stack is empty (shutdown)
     * @throws EmptyStackError if a queued pop would empty the stack
     */
    tick(frameMs: number): boolean {
        const { scenes, events } = this.context;
        if (scenes.isEmpty) return false;

        const { mode, fixedStepMs, maxFrameMs, maxStepsPerFrame } = this.config.loop;
        const dt = Number.isFinite(frameMs) ? clamp(frameMs, 0, maxFrameMs) : 0;

        scenes.beginTick();
        try {
            for (const sample of this.input.poll()) {
                const event = toInputEvent(sample);
                events.publish(event);
                scenes.dispatch(event);
            }

            if (mode === 'fixed') {
                this.accumulator += dt;
                let steps = 0;
                while (this.accumulator >= fixedStepMs && steps < maxStepsPerFrame && !scenes.isEmpty) {
                    this.step(fixedStepMs);
                    this.accumulator -= fixedStepMs;
                    steps++;
                }
                if (steps === maxStepsPerFrame && this.accumulator >= fixedStepMs) {
                    this.logger.event(`Dropping ${this.accumulator.toFixed(1)}ms of simulation backlog`);
                    this.accumulator = 0;
                }
            } else {
                this.step(dt);
            }

            // Transitions requested by input handlers on a frame without a step.
            scenes.applyPending();

            if (!scenes.isEmpty) this.render();
        } finally {
            scenes.endTick();
        }

        this.frames++;
        this.playTimeMs += dt;
        return !scenes.isEmpty;
    }

    /** Ticks on the scheduler at `targetFps` until the stack empties or stop() is called. */
    run(bootstrap: Scene): Promise<void> {
        this.start(bootstrap);
        this.running = true;
        const budget = 1000 / this.config.loop.targetFps;
        let last = this.scheduler.now();

        return new Promise<void>((resolve, reject) => {
            this.finishRun = () => {
                this.running = false;
                this.cancelFrame = undefined;
                this.finishRun = undefined;
                this.logger.info(`Total game time: ${(this.playTimeMs / 1000).toFixed(3)} seconds`);
                resolve();
            };

            const frame = (): void => {
                const now = this.scheduler.now();
                const frameMs = now - last;
                last = now;

                let alive: boolean;
                try {
                    alive = this.tick(frameMs);
                } catch (err) {
                    this.running = false;
                    this.finishRun = undefined;
                    reject(err);
                    return;
                }

                if (!alive || !this.running) {
                    this.finishRun?.();
                    return;
                }
                this.cancelFrame = this.scheduler.schedule(frame, budget - (this.scheduler.now() - now));
            };

            this.cancelFrame = this.scheduler.schedule(frame, budget);
        });
    }

    /** Ends a run() after the current frame; its promise resolves. */
    stop(): void {
        if (!this.running) return;
        this.cancelFrame?.();
        this.finishRun?.();
    }

    /** Exits every scene and drops all engine state. */
    dispose(): void {
        this.stop();
        const { scenes, events, entities, resources } = this.context;
        if (!scenes.isEmpty) scenes.clear('dispose');
        for (const system of this.systems) system.dispose?.();
        events.clear();
        entities.dispose();
        resources.dispose();
    }

    private step(dtMs: number): void {
        const { scenes, animation, entities } = this.context;
        scenes.update(dtMs);
        for (const system of this.systems) system.update(dtMs);
        animation.advance(dtMs);
        entities.flush();
        scenes.applyPending();
    }

    private render(): void {
        const { entities, templates, scenes, config } = this.context;
        const strict = config.strictHandles;
        const draw = new DrawList(templates);

        draw.beginLayer(undefined);
        for (const entity of entities.forEachAlive((e) => e.owner === undefined)) {
            draw.entity(entity);
        }

        for (const { scene, context } of scenes.visible()) {
            draw.beginLayer(scene.name);
            guardTick(this.logger, strict, `render ${scene.name}`, () => {
                for (const entity of context.ownEntities()) draw.entity(entity);
                scene.onRender?.(draw, context);
            });
        }

        this.renderer.draw(draw.toArray());
    }
}
