import { describe, expect, it } from 'vitest';
import { ResourceCache, canonicalPath } from '../src/resources/ResourceCache.js';
import { LoadError, NotFoundError } from '../src/errors/EngineError.js';
import { EventBus } from '../src/events/EventBus.js';
import { EngineEventType, type EngineEventMap } from '../src/events/EngineEvents.js';
import { createSilentLogger } from '../src/logging/Logger.js';
import { fakeLoader } from './helpers.js';

function makeCache(images: Record<string, [number, number]> = { 'hero.png': [64, 32], 'tiles.png': [16, 16] }) {
    const fake = fakeLoader(images, ['jump.wav', 'theme.ogg', 'ui.ttf']);
    const cache = new ResourceCache(fake.loader, { logger: createSilentLogger() });
    return { cache, calls: fake.calls };
}

describe('ResourceCache', () => {
    it('returns the same handle for the same path and loads it once', () => {
        const { cache, calls } = makeCache();
        const a = cache.load('hero.png', 'image');
        const b = cache.load('hero.png', 'image');
        expect(b).toBe(a);
        expect(calls).toEqual(['hero.png']);
        expect(cache.refCount(a)).toBe(2);
    });

    it('returns different handles for different paths', () => {
        const { cache } = makeCache();
        expect(cache.load('hero.png', 'image')).not.toBe(cache.load('tiles.png', 'image'));
        expect(cache.size).toBe(2);
    });

    it('deduplicates by canonical path', () => {
        const { cache } = makeCache();
        const a = cache.load('hero.png', 'image');
        expect(cache.load('./hero.png', 'image')).toBe(a);
        expect(cache.load('sprites/../hero.png', 'image')).toBe(a);
        expect(canonicalPath('assets\\ui\\font.ttf')).toBe('assets/ui/font.ttf');
    });

    it('hands back the decoded asset', () => {
        const { cache } = makeCache();
        const handle = cache.load('hero.png', 'image');
        const asset = cache.get(handle);
        expect(asset.kind).toBe('image');
        expect(asset.kind === 'image' && [asset.width, asset.height]).toEqual([64, 32]);
        expect(cache.pathOf(handle)).toBe('hero.png');
        expect(cache.kindOf(cache.load('jump.wav', 'sound'))).toBe('sound');
    });

    it('fails with LoadError not_found for a missing file and does not cache the failure', () => {
        const { cache, calls } = makeCache();
        const attempt = () => cache.load('ghost.png', 'image');
        expect(attempt).toThrow(LoadError);
        try {
            attempt();
        } catch (err) {
            expect(err).toBeInstanceOf(LoadError);
            expect(err instanceof LoadError && err.reason).toBe('not_found');
            expect(err instanceof LoadError && err.path).toBe('ghost.png');
        }
        expect(calls).toEqual(['ghost.png', 'ghost.png']);
        expect(cache.size).toBe(0);
    });

    it('rejects unsupported extensions before calling the loader', () => {
        const { cache, calls } = makeCache();
        expect(() => cache.load('hero.gif', 'image')).toThrow(/unsupported extension '.gif'/);
        expect(calls).toEqual([]);
    });

    it('rejects loading a cached path under another kind', () => {
        const { cache } = makeCache();
        cache.load('jump.wav', 'sound');
        expect(() => cache.load('jump.wav', 'music')).toThrow(/already loaded as sound/);
    });

    it('wraps decoder failures as decode_failed', () => {
        const cache = new ResourceCache(
            () => {
                throw new Error('bad header');
            },
            { logger: createSilentLogger() },
        );
        try {
            cache.load('broken.png', 'image');
            expect.unreachable();
        } catch (err) {
            expect(err instanceof LoadError && err.reason).toBe('decode_failed');
            expect(err instanceof LoadError && err.cause).toBeInstanceOf(Error);
        }
    });

    it('rejects images with no size', () => {
        const { cache } = makeCache({ 'empty.png': [0, 10] });
        expect(() => cache.load('empty.png', 'image')).toThrow(/invalid image size 0x10/);
    });

    it('throws NotFoundError for handles that were never issued', () => {
        const { cache } = makeCache();
        expect(() => cache.get(42)).toThrow(NotFoundError);
        expect(cache.has(42)).toBe(false);
    });

    describe('deferred eviction', () => {
        it('keeps a released asset until collect()', () => {
            const { cache, calls } = makeCache();
            const handle = cache.load('hero.png', 'image');
            cache.release(handle);
            expect(cache.refCount(handle)).toBe(0);
            expect(cache.has(handle)).toBe(true);

            // Revived with the same handle, no reload.
            expect(cache.load('hero.png', 'image')).toBe(handle);
            expect(calls).toEqual(['hero.png']);
            expect(cache.refCount(handle)).toBe(1);
        });

        it('collect() frees only unreferenced assets', () => {
            const { cache } = makeCache();
            const hero = cache.load('hero.png', 'image');
            const tiles = cache.load('tiles.png', 'image');
            cache.release(hero);

            expect(cache.collect()).toBe(1);
            expect(() => cache.get(hero)).toThrow(NotFoundError);
            expect(cache.get(tiles).path).toBe('tiles.png');
        });

        it('issues a fresh handle after a freed path is loaded again', () => {
            const { cache, calls } = makeCache();
            const first = cache.load('hero.png', 'image');
            cache.release(first);
            cache.collect();
            const second = cache.load('hero.png', 'image');
            expect(second).not.toBe(first);
            expect(calls).toEqual(['hero.png', 'hero.png']);
        });

        it('evict() refuses while references are live', () => {
            const { cache } = makeCache();
            const handle = cache.load('hero.png', 'image');
            cache.retain(handle);
            expect(cache.evict(handle)).toBe(false);
            cache.release(handle);
            cache.release(handle);
            expect(cache.evict(handle)).toBe(true);
            expect(cache.has(handle)).toBe(false);
        });

        it('release() below zero is a no-op and release() of a freed handle throws', () => {
            const { cache } = makeCache();
            const handle = cache.load('hero.png', 'image');
            cache.release(handle);
            cache.release(handle);
            expect(cache.refCount(handle)).toBe(0);
            cache.collect();
            expect(() => cache.release(handle)).toThrow(NotFoundError);
        });
    });

    it('loads a named batch', () => {
        const { cache } = makeCache();
        const handles = cache.loadAll({
            hero: { path: 'hero.png', kind: 'image' },
            theme: { path: 'theme.ogg', kind: 'music' },
            ui: { path: 'ui.ttf', kind: 'font' },
        });
        expect([...handles.keys()]).toEqual(['hero', 'theme', 'ui']);
        expect(cache.kindOf(handles.get('theme') ?? -1)).toBe('music');
    });

    it('announces loads and failures on the event bus', () => {
        const events = new EventBus<EngineEventMap>({ logger: createSilentLogger() });
        const seen: string[] = [];
        events.subscribe(EngineEventType.ResourceLoaded, (e) => seen.push(`loaded ${e.path} #${e.handle}`));
        events.subscribe(EngineEventType.ResourceLoadFailed, (e) => seen.push(`failed ${e.path} ${e.reason}`));

        const cache = new ResourceCache(fakeLoader({ 'hero.png': [8, 8] }).loader, {
            logger: createSilentLogger(),
            events,
        });
        cache.load('hero.png', 'image');
        cache.load('hero.png', 'image');
        expect(() => cache.load('nope.png', 'image')).toThrow(LoadError);

        expect(seen).toEqual(['loaded hero.png #1', 'failed nope.png not_found']);
    });
});
