// renderWorker.ts
import { parentPort } from 'node:worker_threads';
import { RenderJobHandler, WorkerRequest } from './renderJob.js';

const port = parentPort;
if (!port) {
    throw new Error('No parentPort available in worker');
}

const handler = new RenderJobHandler();

port.on('message', (msg: WorkerRequest) => {
    const out = handler.handle(msg);
    if (out) {
        // Hand the band back without copying
        port.postMessage(out, [out.buf]);
    }
});
