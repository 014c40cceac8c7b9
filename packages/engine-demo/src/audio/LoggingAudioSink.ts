import { EngineEventType, type AudioEvent, type AudioSink, type Logger, type ResourceCache } from '@pixelhold/engine-core';

/** Audio stand-in: logs each mixer command with the asset path it names. */
export class LoggingAudioSink implements AudioSink {
    readonly history: string[] = [];

    constructor(
        private readonly resources: ResourceCache,
        private readonly logger: Logger,
    ) {}

    handle(command: AudioEvent): void {
        const line = this.describe(command);
        this.history.push(line);
        this.logger.info(line);
    }

    private describe(command: AudioEvent): string {
        switch (command.kind) {
            case EngineEventType.PlaySound:
                return `play sound ${this.resources.pathOf(command.payload.handle)}`;
            case EngineEventType.PlayMusic:
                return `play music ${this.resources.pathOf(command.payload.handle)}${command.payload.loop ? ' (loop)' : ''}`;
            case EngineEventType.StopSound:
                return `stop sound ${this.resources.pathOf(command.payload.handle)}`;
            case EngineEventType.StopMusic:
                return 'stop music';
        }
    }
}
