#!/usr/bin/env node
import * as readline from 'node:readline';
import { Camera } from './Camera.js';
import { CameraController } from './CameraController.js';
import * as Common from './common.js';
import { RethrownError, toError } from './common.js';
import { buildConfig, parseArgs, RenderConfig, scenePathFrom, USAGE } from './config.js';
import { FrameTimer } from './FrameTimer.js';
import { toAnsi, writePNG } from './output.js';
import { createFrameBuffer } from './renderer.js';
import { RenderPool } from './RenderPool.js';
import { LoadedScene, Scene } from './types.js';

// Seconds of movement per key event
const KEY_DT = 0.05;

interface Keypress {
    name?: string;
    ctrl?: boolean;
}

/**
 * Renders into the terminal and re-renders whenever a key moves the camera.
 * Resolves when the user presses Ctrl+C.
 */
class TerminalViewer {
    private controller: CameraController;
    private fpsTimer = new FrameTimer();
    private drawing = false;
    private dirty = false;

    constructor(
        private scene: Scene,
        private camera: Camera,
        private pool: RenderPool
    ) {
        this.controller = new CameraController(camera);
    }

    run(): Promise<void> {
        const stdin = process.stdin;
        readline.emitKeypressEvents(stdin);
        if (stdin.isTTY) {
            stdin.setRawMode(true);
        }

        return new Promise<void>((resolve, reject) => {
            const finish = (error?: Error) => {
                stdin.off('keypress', onKeypress);
                if (stdin.isTTY) {
                    stdin.setRawMode(false);
                }
                stdin.pause();
                process.stdout.write('\x1b[0m\n');
                if (error) reject(error);
                else resolve();
            };

            const redraw = () => {
                this.draw().catch((error) => finish(toError(error)));
            };

            const onKeypress = (_str: string | undefined, key: Keypress | undefined) => {
                if (!key?.name) return;
                if (key.ctrl && key.name === 'c') {
                    finish();
                    return;
                }
                if (this.controller.handleKey(key.name, KEY_DT)) {
                    redraw();
                }
            };

            stdin.on('keypress', onKeypress);
            stdin.resume();
            redraw();
        });
    }

    // Coalesces key events that arrive while a frame is in flight
    private async draw(): Promise<void> {
        if (this.drawing) {
            this.dirty = true;
            return;
        }
        this.drawing = true;
        try {
            do {
                this.dirty = false;
                await this.drawFrame();
            } while (this.dirty);
        } finally {
            this.drawing = false;
        }
    }

    private async drawFrame(): Promise<void> {
        const columns = process.stdout.columns ?? 80;
        const rows = process.stdout.rows ?? 24;
        const frame = createFrameBuffer(columns, Math.max(1, rows - 1) * 2);

        await this.fpsTimer.time(() => this.pool.render(this.scene, this.camera, frame));

        const p = this.camera.transform.position;
        const status =
            `${this.fpsTimer.describe()} | pos ${p[0].toFixed(2)},${p[1].toFixed(2)},${p[2].toFixed(2)}` +
            ` | focal ${this.camera.focalLength.toFixed(2)} | Ctrl+C to quit`;
        process.stdout.write(`\x1b[H${toAnsi(frame)}${status.slice(0, columns)}\x1b[K`);
    }
}

async function renderToFile(
    config: RenderConfig,
    scene: Scene,
    camera: Camera,
    pool: RenderPool
): Promise<void> {
    const frame = createFrameBuffer(config.width, config.height);
    const timer = new FrameTimer();

    for (let i = 0; i < config.frames; i++) {
        await timer.time(() => pool.render(scene, camera, frame));
        console.log(timer.describe());
    }

    const raysPerSecond = (config.width * config.height * 1000) / timer.getAverage();
    console.log(`Primary rays/sec: ${Common.formatNumber(raysPerSecond)}`);

    try {
        await writePNG(frame, config.outPath);
    } catch (error) {
        throw new RethrownError(`Failed to write '${config.outPath}'`, toError(error));
    }
    console.log(`Wrote ${config.outPath} (${config.width}x${config.height})`);

    if (config.preview) {
        process.stdout.write(toAnsi(frame));
    }
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    if (args.flags.help) {
        console.log(USAGE);
        return;
    }

    const scenePath = scenePathFrom(args);
    let loaded: LoadedScene;
    try {
        loaded = await Common.loadScene(scenePath);
    } catch (error) {
        throw new RethrownError(`Failed to load '${scenePath}'`, toError(error));
    }
    const { scene } = loaded;
    console.log(`Loaded ${scene.objects.length} objects from ${scenePath}`);

    const config = buildConfig(args, loaded.camera);
    const camera = Camera.fromConfig(config.camera);

    const pool = new RenderPool(config.workers);
    console.log(`Rendering with ${pool.size || 'no'} worker threads`);
    try {
        if (config.interactive) {
            // Terminal cells are coarser than output pixels
            camera.pxPerUnit *= process.stdout.columns ? process.stdout.columns / config.width : 1;
            await new TerminalViewer(scene, camera, pool).run();
        } else {
            await renderToFile(config, scene, camera, pool);
        }
    } finally {
        await pool.destroy();
    }
}

main().catch((error) => {
    Common.showError(toError(error).stack ?? String(error));
    process.exitCode = 1;
});
