/**
 * Demo — wires the engine to the demo's data files and headless collaborators.
 */

import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
    ConsoleLogger,
    GameLoop,
    applyManifest,
    createEngineContext,
    createFileAssetLoader,
    loadEngineConfig,
    readManifest,
    type EngineContext,
    type Logger,
    type Scheduler,
} from '@pixelhold/engine-core';
import { LoggingAudioSink } from '../audio/LoggingAudioSink.js';
import { ScriptedInput, tap, type InputScript } from '../input/ScriptedInput.js';
import { ConsoleRenderTarget } from '../renderer/ConsoleRenderTarget.js';
import { MenuScene } from '../scenes/MenuScene.js';
import { DemoAssets } from './DemoAssets.js';

export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

/** Start a wave, pause for a moment, resume; the wave ends the session. */
export const DEMO_SCRIPT: InputScript = new Map([
    [5, tap('Enter')],
    [40, tap('Escape')],
    [70, tap('Escape')],
]);

export interface DemoOptions {
    dataDir?: string;
    script?: InputScript;
    logger?: Logger;
    scheduler?: Scheduler;
}

export interface Demo {
    loop: GameLoop;
    context: EngineContext;
    assets: DemoAssets;
    input: ScriptedInput;
    renderer: ConsoleRenderTarget;
    audio: LoggingAudioSink;
    /** The first scene to run. */
    createMenu(): MenuScene;
}

export function createDemo(options: DemoOptions = {}): Demo {
    const dataDir = options.dataDir ?? DATA_DIR;
    const configPath = join(dataDir, 'engine.config.json');
    const config = loadEngineConfig(configPath);

    const logger =
        options.logger ??
        new ConsoleLogger({ level: config.log.level, eventThrottleMs: config.log.eventThrottleMs, context: 'Demo' });
    const loader = createFileAssetLoader(resolve(dirname(configPath), config.resources.root));
    const context = createEngineContext(config, { loader, logger });

    const assets = new DemoAssets(
        applyManifest(readManifest(join(dataDir, 'manifest.json')), context.resources, context.templates),
    );
    logger.info(`Loaded ${context.resources.size} resources and ${context.templates.size} templates`);

    const input = new ScriptedInput(options.script ?? DEMO_SCRIPT);
    const renderer = new ConsoleRenderTarget(logger.child('Renderer'));
    const audio = new LoggingAudioSink(context.resources, logger.child('Audio'));
    const loop = new GameLoop({ context, input, renderer, audio, scheduler: options.scheduler });

    return { loop, context, assets, input, renderer, audio, createMenu: () => new MenuScene(assets) };
}
