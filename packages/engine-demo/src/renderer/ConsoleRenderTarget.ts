/**
 * ConsoleRenderTarget — headless stand-in for a rasterizer. Counts frames and
 * periodically logs what would have been drawn.
 */

import type { DrawCommand, Logger, RenderTarget } from '@pixelhold/engine-core';

export class ConsoleRenderTarget implements RenderTarget {
    frames = 0;
    lastFrame: readonly DrawCommand[] = [];

    constructor(
        private readonly logger: Logger,
        private readonly every = 60,
    ) {}

    draw(commands: readonly DrawCommand[]): void {
        this.frames++;
        this.lastFrame = commands;
        if (this.frames % this.every !== 0) return;

        const perLayer = new Map<string, number>();
        for (const { layer } of commands) {
            const name = layer ?? 'world';
            perLayer.set(name, (perLayer.get(name) ?? 0) + 1);
        }
        const layers = [...perLayer].map(([name, count]) => `${name}:${count}`).join(' ');
        this.logger.info(`Frame ${this.frames}: ${commands.length} sprite(s) ${layers}`);
    }
}
