import type { AssetLoader } from '../src/resources/assets.js';
import { createSilentLogger } from '../src/logging/Logger.js';
import { resolveEngineConfig, type EngineConfigOverrides } from '../src/data/EngineConfig.js';
import { createEngineContext, type EngineContext } from '../src/loop/EngineContext.js';
import type { Scene } from '../src/scenes/Scene.js';
import type { SceneContext } from '../src/scenes/SceneContext.js';

export interface FakeLoader {
    loader: AssetLoader;
    calls: string[];
}

/** Images by path with their size; anything else not listed in `other` is missing. */
export function fakeLoader(images: Record<string, [number, number]>, other: string[] = []): FakeLoader {
    const calls: string[] = [];
    const loader: AssetLoader = (path, kind) => {
        calls.push(path);
        if (kind === 'image') {
            const size = images[path];
            if (!size) throw missing(path);
            return { kind, path, width: size[0], height: size[1], data: new Uint8Array(0) };
        }
        if (!other.includes(path)) throw missing(path);
        return { kind, path, data: new Uint8Array(0) };
    };
    return { loader, calls };
}

function missing(path: string): Error {
    return Object.assign(new Error(`ENOENT: no such file '${path}'`), { code: 'ENOENT' });
}

export function testContext(
    images: Record<string, [number, number]> = { 'hero.png': [64, 32] },
    overrides: EngineConfigOverrides = {},
): EngineContext {
    const config = resolveEngineConfig({ ...overrides, log: { level: 'silent' } });
    return createEngineContext(config, { loader: fakeLoader(images).loader, logger: createSilentLogger() });
}

/** Registers a two-frame 32x32 'hero' template over `hero.png`. */
export function registerHero(ctx: EngineContext, durations: number[] = [100, 100], loop = true): number {
    const handle = ctx.resources.load('hero.png', 'image');
    return ctx.templates.register('hero', {
        resource: handle,
        frames: [
            { x: 0, y: 0, w: 32, h: 32 },
            { x: 32, y: 0, w: 32, h: 32 },
        ],
        durations,
        loop,
    });
}

/** Scene that records every hook call as `name.hook` into a shared log. */
export class RecordingScene implements Scene {
    updates: number[] = [];
    events: string[] = [];
    lastContext: SceneContext | undefined;

    constructor(
        readonly name: string,
        private readonly log: string[],
        readonly opaque = false,
    ) {}

    onEnter(ctx: SceneContext): void {
        this.lastContext = ctx;
        this.log.push(`${this.name}.enter`);
    }

    onExit(): void {
        this.log.push(`${this.name}.exit`);
    }

    onPause(): void {
        this.log.push(`${this.name}.pause`);
    }

    onResume(): void {
        this.log.push(`${this.name}.resume`);
    }

    onUpdate(dtMs: number): void {
        this.updates.push(dtMs);
    }

    onEvent(event: { kind: string }): void {
        this.events.push(event.kind);
    }
}
