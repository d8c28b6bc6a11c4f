import { Worker } from 'node:worker_threads';
import { Camera } from './Camera.js';
import { RethrownError } from './common.js';
import { renderFrame, splitRows } from './renderer.js';
import type { RenderJob, RenderResult, WorkerRequest } from './renderJob.js';
import { FrameBuffer, Scene } from './types.js';

let nextId = 1;

interface Pending {
    resolve: (buf: ArrayBuffer) => void;
    reject: (err: Error) => void;
}

// Copy of the band, so alpha comes back untouched
function copyBand(
    frame: FrameBuffer,
    rowStart: number,
    rowEnd: number
): ArrayBuffer {
    const rowBytes = frame.width * 4;
    const buf = new ArrayBuffer((rowEnd - rowStart) * rowBytes);
    new Uint8ClampedArray(buf).set(
        frame.data.subarray(rowStart * rowBytes, rowEnd * rowBytes)
    );
    return buf;
}

/**
 * Fixed set of worker threads rendering disjoint row bands of a frame. With no
 * workers the frame is rendered on the calling thread.
 *
 * A worker that errors or exits rejects every frame in flight, and the pool
 * rejects all later frames.
 */
export class RenderPool {
    private workers: Worker[] = [];
    private inflight = new Map<number, Pending>();
    private failure: Error | null = null;
    // Scene the workers currently hold
    private sentScene: Scene | null = null;
    private renderTime = 0;

    constructor(
        size: number,
        workerUrl: URL = new URL('./renderWorker.js', import.meta.url)
    ) {
        for (let i = 0; i < size; ++i) {
            const worker = new Worker(workerUrl, {
                workerData: { name: `render-${i}` },
            });
            worker.on('message', (msg: RenderResult) => this.onResult(msg));
            worker.on('error', (err) => this.fail(err));
            worker.on('exit', (code) => {
                this.fail(new Error(`Render worker exited with code ${code}`));
            });
            this.workers.push(worker);
        }
    }

    get size(): number {
        return this.workers.length;
    }

    getStats() {
        return {
            renderTime: this.renderTime,
            nWorkers: this.workers.length,
        };
    }

    async render(
        scene: Scene,
        camera: Camera,
        frame: FrameBuffer
    ): Promise<void> {
        if (this.failure) {
            throw new RethrownError('Render pool is no longer usable', this.failure);
        }
        if (this.workers.length === 0) {
            renderFrame(scene, camera, frame);
            return;
        }

        if (scene !== this.sentScene) {
            for (const worker of this.workers) {
                worker.postMessage({ type: 'scene', scene } satisfies WorkerRequest);
            }
            this.sentScene = scene;
        }

        const snapshot = camera.snapshot();
        const bands = splitRows(frame.height, this.workers.length);
        await Promise.all(
            bands.map((band, index) =>
                this.renderBand(this.workers[index], {
                    id: nextId++,
                    camera: snapshot,
                    width: frame.width,
                    height: frame.height,
                    rowStart: band.rowStart,
                    rowEnd: band.rowEnd,
                    buf: copyBand(frame, band.rowStart, band.rowEnd),
                }).then((buf) => {
                    frame.data.set(
                        new Uint8ClampedArray(buf),
                        band.rowStart * frame.width * 4
                    );
                })
            )
        );
    }

    async destroy(): Promise<void> {
        this.fail(new Error('Render pool was destroyed'));
        const workers = this.workers;
        this.workers = [];
        await Promise.all(workers.map((worker) => worker.terminate()));
    }

    private renderBand(worker: Worker, job: RenderJob): Promise<ArrayBuffer> {
        return new Promise((resolve, reject) => {
            this.inflight.set(job.id, { resolve, reject });

            // Transfer the band buffer to the worker (zero-copy)
            worker.postMessage({ type: 'render', ...job } satisfies WorkerRequest, [job.buf]);
        });
    }

    private onResult(msg: RenderResult): void {
        const pending = this.inflight.get(msg.id);
        if (!pending) return;
        this.inflight.delete(msg.id);

        if (!msg.ok) {
            pending.reject(new Error(msg.error));
            return;
        }
        this.renderTime += msg.renderTime;
        pending.resolve(msg.buf);
    }

    // Hard failure: reject everything in flight
    private fail(err: Error): void {
        this.failure ??= err;
        const pending = Array.from(this.inflight.values());
        this.inflight.clear();
        pending.forEach(({ reject }) => reject(err));
    }
}
