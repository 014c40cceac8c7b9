/**
 * ResourceCache — loads and deduplicates raw assets by canonical path.
 *
 * Reference counting with deferred eviction: release() to zero keeps the asset
 * cached (a later load() of the same path revives the same handle) until
 * collect() or evict() frees it. Freed handles are never reissued.
 */

import { posix } from 'node:path';
import { LoadError, NotFoundError } from '../errors/EngineError.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { SUPPORTED_FORMATS } from '../data/EngineConfig.js';
import type { EventBus } from '../events/EventBus.js';
import { EngineEventType, type EngineEventMap } from '../events/EngineEvents.js';
import type { AssetKind, AssetLoader, RawAsset, ResourceHandle } from './assets.js';

interface CacheEntry {
    handle: ResourceHandle;
    path: string;
    kind: AssetKind;
    asset: RawAsset;
    refs: number;
}

export interface ResourceCacheOptions {
    supportedFormats?: Record<AssetKind, readonly string[]>;
    logger?: Logger;
    /** When set, successful and failed loads are announced on the bus. */
    events?: EventBus<EngineEventMap>;
}

export interface ResourceEntry {
    path: string;
    kind: AssetKind;
}

export class ResourceCache {
    private nextHandle: ResourceHandle = 1;
    private entries = new Map<ResourceHandle, CacheEntry>();
    private byPath = new Map<string, ResourceHandle>();

    private readonly supportedFormats: Record<AssetKind, readonly string[]>;
    private readonly logger: Logger;
    private readonly events?: EventBus<EngineEventMap>;

    constructor(
        private readonly loader: AssetLoader,
        options: ResourceCacheOptions = {},
    ) {
        this.supportedFormats = options.supportedFormats ?? SUPPORTED_FORMATS;
        this.logger = (options.logger ?? new ConsoleLogger()).child('ResourceCache');
        this.events = options.events;
    }

    // ── Loading ────────────────────────────────────────────────────────────

    /**
     * Returns the cached handle for `path` (taking a reference), or loads it.
     * @throws LoadError on a missing file, an unsupported extension, a decoder
     *   failure, or when `path` is already cached under another kind.
     */
    load(path: string, kind: AssetKind): ResourceHandle {
        const canonical = canonicalPath(path);
        const existing = this.byPath.get(canonical);
        if (existing !== undefined) {
            const entry = this.entry(existing);
            if (entry.kind !== kind) {
                throw this.fail(
                    new LoadError(canonical, kind, 'invalid_format', new Error(`already loaded as ${entry.kind}`)),
                );
            }
            entry.refs++;
            return existing;
        }

        const ext = posix.extname(canonical).toLowerCase();
        if (!this.supportedFormats[kind].includes(ext)) {
            throw this.fail(
                new LoadError(canonical, kind, 'invalid_format', new Error(`unsupported extension '${ext}'`)),
            );
        }

        let asset: RawAsset;
        try {
            asset = this.loader(canonical, kind);
        } catch (err) {
            if (err instanceof LoadError) throw this.fail(err);
            throw this.fail(new LoadError(canonical, kind, isMissingFile(err) ? 'not_found' : 'decode_failed', err));
        }
        const problem = checkAsset(asset, kind);
        if (problem) {
            throw this.fail(new LoadError(canonical, kind, 'decode_failed', new Error(problem)));
        }

        const handle = this.nextHandle++;
        this.entries.set(handle, { handle, path: canonical, kind, asset, refs: 1 });
        this.byPath.set(canonical, handle);
        this.logger.debug(`Loaded ${kind} '${canonical}' as #${handle}`);
        this.events?.publish({ kind: EngineEventType.ResourceLoaded, payload: { handle, path: canonical, kind } });
        return handle;
    }

    /** Loads a named batch; the first failure aborts the batch and propagates. */
    loadAll(entries: Record<string, ResourceEntry>): Map<string, ResourceHandle> {
        const handles = new Map<string, ResourceHandle>();
        for (const [name, { path, kind }] of Object.entries(entries)) {
            handles.set(name, this.load(path, kind));
        }
        return handles;
    }

    // ── Access ─────────────────────────────────────────────────────────────

    /** @throws NotFoundError if the handle was never issued or has been freed. */
    get(handle: ResourceHandle): RawAsset {
        return this.entry(handle).asset;
    }

    has(handle: ResourceHandle): boolean {
        return this.entries.has(handle);
    }

    pathOf(handle: ResourceHandle): string {
        return this.entry(handle).path;
    }

    kindOf(handle: ResourceHandle): AssetKind {
        return this.entry(handle).kind;
    }

    /** Cached handle for `path`, without loading or taking a reference. */
    lookup(path: string): ResourceHandle | undefined {
        return this.byPath.get(canonicalPath(path));
    }

    get size(): number {
        return this.entries.size;
    }

    // ── Reference counting ─────────────────────────────────────────────────

    retain(handle: ResourceHandle): void {
        this.entry(handle).refs++;
    }

    release(handle: ResourceHandle): void {
        const entry = this.entry(handle);
        if (entry.refs === 0) {
            this.logger.warn(`release() on '${entry.path}' with no references`);
            return;
        }
        entry.refs--;
    }

    refCount(handle: ResourceHandle): number {
        return this.entry(handle).refs;
    }

    /** Frees every unreferenced asset. @returns how many were freed */
    collect(): number {
        let freed = 0;
        for (const entry of [...this.entries.values()]) {
            if (entry.refs === 0) {
                this.free(entry);
                freed++;
            }
        }
        if (freed > 0) this.logger.debug(`Collected ${freed} unreferenced asset(s)`);
        return freed;
    }

    /** Frees one asset if nothing references it. @returns whether it was freed */
    evict(handle: ResourceHandle): boolean {
        const entry = this.entry(handle);
        if (entry.refs > 0) {
            this.logger.debug(`evict() skipped '${entry.path}': ${entry.refs} reference(s) live`);
            return false;
        }
        this.free(entry);
        return true;
    }

    /** Drops everything regardless of references. Engine shutdown only. */
    dispose(): void {
        this.entries.clear();
        this.byPath.clear();
    }

    // ── Internals ──────────────────────────────────────────────────────────

    private entry(handle: ResourceHandle): CacheEntry {
        const entry = this.entries.get(handle);
        if (!entry) throw new NotFoundError('resource', `#${handle}`);
        return entry;
    }

    private free(entry: CacheEntry): void {
        this.entries.delete(entry.handle);
        this.byPath.delete(entry.path);
    }

    private fail(err: LoadError): LoadError {
        this.logger.error(err.message);
        this.events?.publish({
            kind: EngineEventType.ResourceLoadFailed,
            payload: { path: err.path, kind: err.kind, reason: err.reason },
        });
        return err;
    }
}

/** Backslashes to slashes, `.`/`..` segments resolved, no leading `./`. */
export function canonicalPath(path: string): string {
    const normalized = posix.normalize(path.replace(/\\/g, '/'));
    return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function checkAsset(asset: RawAsset, kind: AssetKind): string | undefined {
    if (asset.kind !== kind) return `decoder returned ${asset.kind} for a ${kind} request`;
    if (asset.kind === 'image') {
        const { width, height } = asset;
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            return `invalid image size ${width}x${height}`;
        }
    }
    return undefined;
}
