/**
 * ScriptedInput — replays input samples keyed by frame number, standing in
 * for a keyboard in headless runs.
 */

import type { InputSample, InputSource } from '@pixelhold/engine-core';

export type InputScript = ReadonlyMap<number, readonly InputSample[]>;

export class ScriptedInput implements InputSource {
    private frame = 0;

    constructor(private readonly script: InputScript) {}

    /** Frames polled so far. */
    get polled(): number {
        return this.frame;
    }

    poll(): InputSample[] {
        const samples = this.script.get(this.frame) ?? [];
        this.frame++;
        return [...samples];
    }
}

/** Key press then release on the same frame. */
export function tap(key: string): InputSample[] {
    return [
        { type: 'key', key, pressed: true },
        { type: 'key', key, pressed: false },
    ];
}
