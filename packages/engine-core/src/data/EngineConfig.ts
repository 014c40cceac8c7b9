/**
 * Engine tunables, plus the JSON config-file layer that overrides them per section.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../errors/EngineError.js';
import type { AssetKind } from '../resources/assets.js';

// ─── Loop ───────────────────────────────────────────────────────────────────

export const DEFAULT_TARGET_FPS = 60;
export const DEFAULT_FIXED_STEP_MS = 1000 / DEFAULT_TARGET_FPS;
/** Longest frame the loop will simulate; longer gaps (debugger, sleep) are cut. */
export const MAX_FRAME_MS = 250;
/** Fixed-step catch-up cap per frame. */
export const MAX_STEPS_PER_FRAME = 5;

// ─── Animation ──────────────────────────────────────────────────────────────

/** Upper bound on frame advances per entity per advance() call (zero-duration frames). */
export const MAX_FRAME_ADVANCES = 64;

// ─── Resources ──────────────────────────────────────────────────────────────

export const SUPPORTED_FORMATS: Record<AssetKind, readonly string[]> = {
    image: ['.png', '.bmp'],
    sound: ['.wav', '.ogg', '.mp3'],
    music: ['.mp3', '.ogg', '.wav'],
    font: ['.ttf', '.otf'],
};

// ─── Logging ────────────────────────────────────────────────────────────────

export const EVENT_LOG_THROTTLE_MS = 1000;

// ─── Schema ─────────────────────────────────────────────────────────────────

const FormatListSchema = z.array(z.string().regex(/^\.[a-z0-9]+$/i, 'Must be an extension like ".png"'));

export const EngineConfigSchema = z.object({
    loop: z.object({
        mode: z.enum(['fixed', 'variable']),
        fixedStepMs: z.number().positive(),
        maxFrameMs: z.number().positive(),
        maxStepsPerFrame: z.number().int().positive(),
        targetFps: z.number().positive(),
    }),
    animation: z.object({
        maxFrameAdvances: z.number().int().positive(),
    }),
    resources: z.object({
        root: z.string(),
        supportedFormats: z.object({
            image: FormatListSchema,
            sound: FormatListSchema,
            music: FormatListSchema,
            font: FormatListSchema,
        }),
    }),
    log: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
        eventThrottleMs: z.number().nonnegative(),
    }),
    /** Stale-handle access throws instead of being logged and skipped. */
    strictHandles: z.boolean(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const EngineConfigOverridesSchema = z.object({
    loop: EngineConfigSchema.shape.loop.partial().optional(),
    animation: EngineConfigSchema.shape.animation.partial().optional(),
    resources: z
        .object({
            root: z.string().optional(),
            supportedFormats: EngineConfigSchema.shape.resources.shape.supportedFormats.partial().optional(),
        })
        .optional(),
    log: EngineConfigSchema.shape.log.partial().optional(),
    strictHandles: z.boolean().optional(),
});

/** Section-wise partial; each section may itself be partial. */
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;

export function defaultEngineConfig(): EngineConfig {
    return {
        loop: {
            mode: 'fixed',
            fixedStepMs: DEFAULT_FIXED_STEP_MS,
            maxFrameMs: MAX_FRAME_MS,
            maxStepsPerFrame: MAX_STEPS_PER_FRAME,
            targetFps: DEFAULT_TARGET_FPS,
        },
        animation: { maxFrameAdvances: MAX_FRAME_ADVANCES },
        resources: {
            root: '.',
            supportedFormats: {
                image: [...SUPPORTED_FORMATS.image],
                sound: [...SUPPORTED_FORMATS.sound],
                music: [...SUPPORTED_FORMATS.music],
                font: [...SUPPORTED_FORMATS.font],
            },
        },
        log: { level: 'info', eventThrottleMs: EVENT_LOG_THROTTLE_MS },
        strictHandles: false,
    };
}

/** Merges `overrides` over the defaults section by section and validates the result. */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}, source = 'overrides'): EngineConfig {
    const base = defaultEngineConfig();
    const merged = {
        loop: { ...base.loop, ...overrides.loop },
        animation: { ...base.animation, ...overrides.animation },
        resources: {
            ...base.resources,
            ...overrides.resources,
            supportedFormats: { ...base.resources.supportedFormats, ...overrides.resources?.supportedFormats },
        },
        log: { ...base.log, ...overrides.log },
        strictHandles: overrides.strictHandles ?? base.strictHandles,
    };
    return parseConfig(merged, source);
}

/** Reads a JSON config file of per-section overrides. */
export function loadEngineConfig(path: string): EngineConfig {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf8');
    } catch (err) {
        throw new ConfigError(path, [`config file not found or unreadable`], err);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new ConfigError(path, [`malformed JSON: ${err instanceof Error ? err.message : String(err)}`], err);
    }

    const parsed = EngineConfigOverridesSchema.safeParse(json);
    if (!parsed.success) {
        throw new ConfigError(path, formatIssues(parsed.error));
    }
    return resolveEngineConfig(parsed.data, path);
}

function parseConfig(value: unknown, source: string): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(value);
    if (!parsed.success) {
        throw new ConfigError(source, formatIssues(parsed.error));
    }
    return parsed.data;
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
