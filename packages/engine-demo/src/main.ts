/**
 * Pixelhold demo — Entry Point
 * Runs a scripted headless session: menu, one wave with a pause, then exit.
 */

import { createDemo } from './game/Demo.js';

async function main(): Promise<void> {
    const demo = createDemo();
    await demo.loop.run(demo.createMenu());
    demo.loop.dispose();
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
