/**
 * Raw asset shapes handed out by the ResourceCache.
 * Decoding is external: the core only needs image bounds for template checks.
 */

export const ASSET_KINDS = ['image', 'sound', 'music', 'font'] as const;

export type AssetKind = (typeof ASSET_KINDS)[number];

/** Opaque handle to a cached asset. Never reused after the asset is freed. */
export type ResourceHandle = number;

export interface ImageAsset {
    kind: 'image';
    path: string;
    width: number;
    height: number;
    data: Uint8Array;
}

export interface AudioAsset {
    kind: 'sound' | 'music';
    path: string;
    data: Uint8Array;
}

export interface FontAsset {
    kind: 'font';
    path: string;
    data: Uint8Array;
}

export type RawAsset = ImageAsset | AudioAsset | FontAsset;

/**
 * External decoder. Throws on failure; the cache wraps whatever it throws in a
 * LoadError.
 */
export type AssetLoader = (path: string, kind: AssetKind) => RawAsset;
