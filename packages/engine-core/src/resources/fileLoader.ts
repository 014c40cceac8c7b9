/**
 * Disk-backed AssetLoader. Bytes are handed through undecoded; images only
 * have their header read for width and height (PNG and BMP).
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { AssetKind, AssetLoader, RawAsset } from './assets.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function createFileAssetLoader(root: string): AssetLoader {
    return (path: string, kind: AssetKind): RawAsset => {
        const data = new Uint8Array(readFileSync(join(root, path)));
        if (kind === 'image') {
            const { width, height } = readImageSize(data, path);
            return { kind, path, width, height, data };
        }
        return { kind, path, data };
    };
}

export function readImageSize(data: Uint8Array, path = '<buffer>'): { width: number; height: number } {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

    if (data.length >= 24 && PNG_SIGNATURE.every((b, i) => data[i] === b)) {
        // IHDR is always the first chunk: width and height are big-endian at 16 and 20.
        return { width: view.getUint32(16), height: view.getUint32(20) };
    }

    if (data.length >= 26 && data[0] === 0x42 && data[1] === 0x4d) {
        // BITMAPINFOHEADER; height is negative for top-down bitmaps.
        return { width: view.getInt32(18, true), height: Math.abs(view.getInt32(22, true)) };
    }

    throw new Error(`'${path}' is not a PNG or BMP image`);
}
