/**
 * Resource/template manifest — the data file a game ships its sprite
 * definitions in. Validated with zod on read.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, InvalidTemplateError } from '../errors/EngineError.js';
import { formatIssues } from '../data/EngineConfig.js';
import type { ResourceCache } from './ResourceCache.js';
import type { RegisterOptions, TemplateId, TemplateRegistry } from './TemplateRegistry.js';
import { ASSET_KINDS, type ResourceHandle } from './assets.js';

const RectSchema = z.object({
    x: z.number().int().nonnegative(),
    y: z.number().int().nonnegative(),
    w: z.number().int().positive(),
    h: z.number().int().positive(),
});

export const ResourceEntrySchema = z.object({
    path: z.string().min(1),
    kind: z.enum(ASSET_KINDS),
});

export const TemplateEntrySchema = z
    .object({
        resource: z.string().min(1),
        frames: z.array(RectSchema).min(1),
        /** Per-frame milliseconds. */
        durations: z.array(z.number().nonnegative()).optional(),
        /** Shorthand: the same milliseconds for every frame. */
        frameDuration: z.number().nonnegative().optional(),
        loop: z.boolean().default(true),
    })
    .refine((t) => !(t.durations && t.frameDuration !== undefined), {
        message: 'Use either durations or frameDuration, not both',
    })
    .refine((t) => t.frames.length === 1 || t.durations !== undefined || t.frameDuration !== undefined, {
        message: 'Animated templates need durations or frameDuration',
    });

export const ManifestSchema = z.object({
    resources: z.record(z.string(), ResourceEntrySchema).default({}),
    templates: z.record(z.string(), TemplateEntrySchema).default({}),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type TemplateEntry = z.infer<typeof TemplateEntrySchema>;

export interface AppliedManifest {
    resources: Map<string, ResourceHandle>;
    templates: Map<string, TemplateId>;
}

export function parseManifest(value: unknown, source = 'manifest'): Manifest {
    const parsed = ManifestSchema.safeParse(value);
    if (!parsed.success) throw new ConfigError(source, formatIssues(parsed.error));
    return parsed.data;
}

/** @throws ConfigError if the file is missing, not JSON, or not a manifest */
export function readManifest(path: string): Manifest {
    let json: unknown;
    try {
        json = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
        throw new ConfigError(path, [err instanceof Error ? err.message : String(err)], err);
    }
    return parseManifest(json, path);
}

/**
 * Loads every resource, then registers every template against them.
 * Errors propagate at the first failure; nothing is retried.
 */
export function applyManifest(
    manifest: Manifest,
    cache: ResourceCache,
    registry: TemplateRegistry,
    options: RegisterOptions = {},
): AppliedManifest {
    const resources = cache.loadAll(manifest.resources);
    const templates = new Map<string, TemplateId>();

    for (const [name, entry] of Object.entries(manifest.templates)) {
        const handle = resources.get(entry.resource) ?? cache.lookup(entry.resource);
        if (handle === undefined) {
            throw new InvalidTemplateError(name, [`unknown resource '${entry.resource}'`]);
        }
        const id = registry.register(
            name,
            {
                resource: handle,
                frames: entry.frames,
                durations: durationsOf(entry),
                loop: entry.loop,
            },
            options,
        );
        templates.set(name, id);
    }

    return { resources, templates };
}

function durationsOf(entry: TemplateEntry): number[] {
    if (entry.durations) return entry.durations;
    const each = entry.frameDuration ?? 0;
    return entry.frames.map(() => each);
}
