import { describe, expect, it } from 'vitest';
import { GameLoop } from '../src/loop/GameLoop.js';
import { EmptyStackError, NotFoundError } from '../src/errors/EngineError.js';
import { EngineEventType, type AudioEvent } from '../src/events/EngineEvents.js';
import type { DrawCommand } from '../src/render/DrawList.js';
import type { Scene } from '../src/scenes/Scene.js';
import {
    QueuedInputSource,
    type AudioSink,
    type RenderTarget,
    type Scheduler,
} from '../src/services/Collaborators.js';
import type { EngineConfigOverrides } from '../src/data/EngineConfig.js';
import { RecordingScene, registerHero, testContext } from './helpers.js';

class ManualScheduler implements Scheduler {
    time = 0;
    private queue: Array<() => void> = [];

    now(): number {
        return this.time;
    }

    schedule(callback: () => void): () => void {
        this.queue.push(callback);
        return () => {
            this.queue = this.queue.filter((cb) => cb !== callback);
        };
    }

    get pending(): number {
        return this.queue.length;
    }

    /** Advances the clock and fires the oldest scheduled callback. */
    runNext(ms: number): void {
        this.time += ms;
        this.queue.shift()?.();
    }
}

class CapturingRenderer implements RenderTarget {
    frames: DrawCommand[][] = [];

    draw(commands: readonly DrawCommand[]): void {
        this.frames.push([...commands]);
    }
}

class RecordingAudio implements AudioSink {
    commands: AudioEvent[] = [];

    handle(command: AudioEvent): void {
        this.commands.push(command);
    }
}

const TEN_MS_STEPS: EngineConfigOverrides = {
    loop: { fixedStepMs: 10, maxFrameMs: 250, maxStepsPerFrame: 5, targetFps: 100 },
};

function setup(overrides: EngineConfigOverrides = TEN_MS_STEPS) {
    const context = testContext({ 'hero.png': [64, 32] }, overrides);
    const input = new QueuedInputSource();
    const renderer = new CapturingRenderer();
    const audio = new RecordingAudio();
    const scheduler = new ManualScheduler();
    const loop = new GameLoop({ context, input, renderer, audio, scheduler });
    return { loop, context, input, renderer, audio, scheduler };
}

describe('GameLoop', () => {
    it('runs input, update, systems, animation and render in that order', () => {
        const order: string[] = [];
        const context = testContext({ 'hero.png': [64, 32] }, TEN_MS_STEPS);
        const input = new QueuedInputSource();
        const loop = new GameLoop({
            context,
            input,
            systems: [{ name: 'physics', update: (dt) => order.push(`system ${dt}`) }],
        });
        const hero = registerHero(context, [5, 5], false);
        context.events.subscribe(EngineEventType.AnimationFinished, () => order.push('animation'));

        loop.start({
            name: 'Level',
            onEnter: (ctx) => {
                ctx.spawn(hero, { x: 0, y: 0 });
            },
            onEvent: (event) => order.push(`event ${event.kind}`),
            onUpdate: (dt) => order.push(`update ${dt}`),
            onRender: () => order.push('render'),
        });
        input.push({ type: 'key', key: 'Space', pressed: true });

        expect(loop.tick(10)).toBe(true);
        expect(order).toEqual(['event input:key_down', 'update 10', 'system 10', 'animation', 'render']);
    });

    it('runs fixed steps off an accumulator', () => {
        const { loop } = setup();
        const scene = new RecordingScene('Level', []);
        loop.start(scene);

        loop.tick(25);
        expect(scene.updates).toEqual([10, 10]);
        loop.tick(4);
        expect(scene.updates).toEqual([10, 10]);
        loop.tick(1);
        expect(scene.updates).toEqual([10, 10, 10]);
    });

    it('caps steps per frame and drops the backlog', () => {
        const { loop } = setup();
        const scene = new RecordingScene('Level', []);
        loop.start(scene);

        loop.tick(200);
        expect(scene.updates).toHaveLength(5);
        loop.tick(0);
        expect(scene.updates).toHaveLength(5);
    });

    it('clamps frame time to [0, maxFrameMs]', () => {
        const { loop } = setup({ loop: { mode: 'variable', maxFrameMs: 100 } });
        const scene = new RecordingScene('Level', []);
        loop.start(scene);

        loop.tick(1000);
        loop.tick(-5);
        loop.tick(Number.POSITIVE_INFINITY);
        expect(scene.updates).toEqual([100, 0, 0]);
        expect(loop.playTimeMs).toBe(100);
        expect(loop.frames).toBe(3);
    });

    it('delivers input to the bus and to the top scene only', () => {
        const { loop, context, input } = setup();
        const log: string[] = [];
        const bottom = new RecordingScene('Bottom', log);
        const top = new RecordingScene('Top', log);
        const onBus: string[] = [];
        context.events.subscribe(EngineEventType.MouseButton, (e) => onBus.push(e.button));
        loop.start(bottom);
        context.scenes.push(top);

        input.push(
            { type: 'mouse_button', button: 'left', pressed: true, position: { x: 3, y: 4 } },
            { type: 'key', key: 'a', pressed: false },
        );
        loop.tick(0);

        expect(onBus).toEqual(['left']);
        expect(top.events).toEqual(['input:mouse_button', 'input:key_up']);
        expect(bottom.events).toEqual([]);
    });

    it('draws unowned entities first, then visible scenes bottom to top', () => {
        const { loop, context, renderer } = setup();
        const hero = registerHero(context);
        context.entities.spawn(hero, { x: 0, y: 0 });

        const world: Scene = {
            name: 'World',
            opaque: true,
            onEnter: (ctx) => {
                ctx.spawn(hero, { x: 1, y: 1 });
            },
        };
        const hud: Scene = {
            name: 'Hud',
            onRender: (draw) => draw.sprite(1, { x: 32, y: 0, w: 32, h: 32 }, { x: 2, y: 2 }),
        };
        loop.start(world);
        context.scenes.push(hud);
        loop.tick(0);

        const frame0 = { x: 0, y: 0, w: 32, h: 32 };
        expect(renderer.frames).toEqual([
            [
                { resource: 1, frame: frame0, position: { x: 0, y: 0 }, layer: undefined },
                { resource: 1, frame: frame0, position: { x: 1, y: 1 }, layer: 'World' },
                { resource: 1, frame: { x: 32, y: 0, w: 32, h: 32 }, position: { x: 2, y: 2 }, layer: 'Hud' },
            ],
        ]);
    });

    it('hides scenes below an opaque one', () => {
        const { loop, context, renderer } = setup();
        const hero = registerHero(context);
        const spawnAt = (name: string, x: number, opaque = false): Scene => ({
            name,
            opaque,
            onEnter: (ctx) => {
                ctx.spawn(hero, { x, y: 0 });
            },
        });
        loop.start(spawnAt('World', 0));
        context.scenes.push(spawnAt('Inventory', 5, true));
        loop.tick(0);

        expect(renderer.frames[0].map((c) => c.layer)).toEqual(['Inventory']);
    });

    it('forwards audio events to the audio sink', () => {
        const { loop, context, audio } = setup();
        loop.start(new RecordingScene('Level', []));

        context.events.publish({ kind: EngineEventType.PlayMusic, payload: { handle: 4, loop: true } });
        context.events.publish({ kind: EngineEventType.StopMusic, payload: {} });

        expect(audio.commands).toEqual([
            { kind: 'audio:play_music', payload: { handle: 4, loop: true } },
            { kind: 'audio:stop_music', payload: {} },
        ]);
    });

    it('shuts down when Quit is published during a tick', () => {
        const { loop, context } = setup();
        const log: string[] = [];
        loop.start(new RecordingScene('Menu', log));
        context.scenes.push({
            name: 'Game',
            onUpdate: (_dt, ctx) => ctx.publish({ kind: EngineEventType.Quit, payload: { reason: 'window closed' } }),
        });

        expect(loop.tick(10)).toBe(false);
        expect(context.scenes.isEmpty).toBe(true);
        expect(log).toEqual(['Menu.enter', 'Menu.pause', 'Menu.exit']);
        expect(loop.tick(10)).toBe(false);
    });

    it('propagates a pop that would empty the stack', () => {
        const { loop } = setup();
        const only: Scene = { name: 'Only', onUpdate: (_dt, ctx) => ctx.pop() };
        loop.start(only);

        expect(() => loop.tick(10)).toThrow(EmptyStackError);
    });

    it('logs and skips a stale handle unless strict', () => {
        const stale: Scene = {
            name: 'Stale',
            onUpdate: (_dt, ctx) => {
                ctx.entities.get([7, 3]);
            },
        };

        const lenient = setup();
        lenient.loop.start(stale);
        expect(lenient.loop.tick(10)).toBe(true);

        const strict = setup({ ...TEN_MS_STEPS, strictHandles: true });
        strict.loop.start(stale);
        expect(() => strict.loop.tick(10)).toThrow(NotFoundError);
    });

    it('refuses to start twice', () => {
        const { loop } = setup();
        loop.start(new RecordingScene('A', []));
        expect(() => loop.start(new RecordingScene('B', []))).toThrow(/already started/);
    });

    it('lets a bootstrap scene forward from onEnter without leaking its spawns', () => {
        const { loop, context, renderer } = setup();
        registerHero(context);
        const log: string[] = [];
        const menu = new RecordingScene('Menu', log);
        const boot: Scene = {
            name: 'Boot',
            onEnter: (ctx) => {
                log.push('Boot.enter:start');
                ctx.replace(menu);
                ctx.spawn('hero', { x: 0, y: 0 });
                log.push('Boot.enter:end');
            },
            onExit: () => {
                log.push('Boot.exit');
            },
        };

        loop.start(boot);
        for (let i = 0; i < 5; i++) loop.tick(10);

        expect(log).toEqual(['Boot.enter:start', 'Boot.enter:end', 'Boot.exit', 'Menu.enter']);
        expect(context.scenes.scenes()).toEqual([menu]);
        expect(context.entities.aliveCount).toBe(0);
        expect(context.entities.size).toBe(0);
        expect(renderer.frames).toEqual([[], [], [], [], []]);
    });

    it('run() ticks on the scheduler until the stack empties', async () => {
        const { loop, scheduler } = setup();
        let updates = 0;
        const done = loop.run({
            name: 'Timed',
            onUpdate: (_dt, ctx) => {
                if (++updates === 3) ctx.quit('time up');
            },
        });
        expect(loop.isRunning).toBe(true);

        while (scheduler.pending > 0) scheduler.runNext(10);
        await done;

        expect(updates).toBe(3);
        expect(loop.frames).toBe(3);
        expect(loop.playTimeMs).toBe(30);
        expect(loop.isRunning).toBe(false);
    });

    it('stop() ends a run and cancels the next frame', async () => {
        const { loop, scheduler } = setup();
        const done = loop.run(new RecordingScene('Endless', []));
        scheduler.runNext(10);
        scheduler.runNext(10);

        loop.stop();
        await done;

        expect(loop.frames).toBe(2);
        expect(scheduler.pending).toBe(0);
        expect(loop.isRunning).toBe(false);
    });

    it('run() rejects when a tick throws', async () => {
        const { loop, scheduler } = setup();
        const done = loop.run({ name: 'Only', onUpdate: (_dt, ctx) => ctx.pop() });
        scheduler.runNext(10);

        await expect(done).rejects.toBeInstanceOf(EmptyStackError);
        expect(loop.isRunning).toBe(false);
    });

    it('dispose() exits remaining scenes and drops engine state', () => {
        const { loop, context } = setup();
        const log: string[] = [];
        const hero = registerHero(context);
        loop.start(new RecordingScene('Level', log));
        context.entities.spawn(hero, { x: 0, y: 0 });

        loop.dispose();

        expect(log).toEqual(['Level.enter', 'Level.exit']);
        expect(context.entities.size).toBe(0);
        expect(context.resources.size).toBe(0);
        expect(context.events.listenerCount(EngineEventType.PlaySound)).toBe(0);
    });
});
