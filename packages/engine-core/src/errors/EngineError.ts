/**
 * Engine error taxonomy.
 * Load/template/config errors surface synchronously to the caller.
 * NotFound is a programming error: loud when strict, a logged no-op otherwise.
 */

import type { AssetKind } from '../resources/assets.js';

export type EngineErrorCode =
    | 'LOAD_ERROR'
    | 'UNKNOWN_TEMPLATE'
    | 'INVALID_TEMPLATE'
    | 'DUPLICATE_TEMPLATE'
    | 'NOT_FOUND'
    | 'EMPTY_STACK'
    | 'SCENE_EXITED'
    | 'CONFIG_ERROR';

export abstract class EngineError extends Error {
    abstract readonly code: EngineErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type LoadFailureReason = 'not_found' | 'invalid_format' | 'decode_failed';

export class LoadError extends EngineError {
    readonly code = 'LOAD_ERROR';

    constructor(
        readonly path: string,
        readonly kind: AssetKind,
        readonly reason: LoadFailureReason,
        cause?: unknown,
    ) {
        super(`Error loading ${kind} '${path}': ${describeReason(reason, cause)}`, { cause });
    }
}

function describeReason(reason: LoadFailureReason, cause: unknown): string {
    switch (reason) {
        case 'not_found':
            return 'not found';
        case 'invalid_format':
            return cause instanceof Error ? cause.message : 'unsupported format';
        case 'decode_failed':
            return cause instanceof Error ? cause.message : String(cause);
    }
}

export class UnknownTemplateError extends EngineError {
    readonly code = 'UNKNOWN_TEMPLATE';

    constructor(readonly template: string | number) {
        super(`Template '${template}' is not registered`);
    }
}

export class InvalidTemplateError extends EngineError {
    readonly code = 'INVALID_TEMPLATE';

    constructor(
        readonly template: string,
        readonly problems: readonly string[],
    ) {
        super(`Template '${template}' is invalid: ${problems.join('; ')}`);
    }
}

export class DuplicateTemplateError extends EngineError {
    readonly code = 'DUPLICATE_TEMPLATE';

    constructor(readonly template: string) {
        super(`Template '${template}' is already registered`);
    }
}

export class NotFoundError extends EngineError {
    readonly code = 'NOT_FOUND';

    constructor(
        readonly what: 'resource' | 'entity' | 'subscription',
        readonly id: string,
    ) {
        super(`No live ${what} for handle ${id}`);
    }
}

export class EmptyStackError extends EngineError {
    readonly code = 'EMPTY_STACK';

    constructor(readonly operation: 'pop' | 'replace') {
        super(
            operation === 'pop'
                ? 'Cannot pop the last scene; request quit to shut down'
                : 'Cannot replace on an empty scene stack',
        );
    }
}

export class SceneExitedError extends EngineError {
    readonly code = 'SCENE_EXITED';

    constructor(
        readonly scene: string,
        readonly operation: string,
    ) {
        super(`Scene '${scene}' has exited; cannot ${operation}`);
    }
}

export class ConfigError extends EngineError {
    readonly code = 'CONFIG_ERROR';

    constructor(
        readonly source: string,
        readonly problems: readonly string[],
        cause?: unknown,
    ) {
        super(`Invalid configuration in ${source}: ${problems.join('; ')}`, { cause });
    }
}
