import { Camera } from './Camera.js';
import { FrameBuffer, Scene } from './types.js';

export function createFrameBuffer(width: number, height: number): FrameBuffer {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
        throw new RangeError(`Invalid frame size ${width}x${height}`);
    }
    if (width <= 0 || height <= 0) {
        throw new RangeError(`Invalid frame size ${width}x${height}`);
    }
    // Alpha stays opaque; rendering only ever writes RGB.
    const data = new Uint8ClampedArray(width * height * 4).fill(0xff);
    return { width, height, data };
}

/**
 * Renders rows `[rowStart, rowEnd)` of a `width`×`height` image into `out`,
 * which holds exactly those rows. Pixels are independent, so any split of the
 * rows gives the same image.
 */
export function renderBand(
    scene: Scene,
    camera: Camera,
    width: number,
    height: number,
    rowStart: number,
    rowEnd: number,
    out: Uint8ClampedArray
): void {
    const halfWidth = width / 2;
    const halfHeight = height / 2;

    for (let y = rowStart; y < rowEnd; y++) {
        for (let x = 0; x < width; x++) {
            const color = camera.getPixel(scene, x - halfWidth, y - halfHeight);
            const offset = ((y - rowStart) * width + x) * 4;
            out[offset] = color[0];
            out[offset + 1] = color[1];
            out[offset + 2] = color[2];
        }
    }
}

export function renderRows(
    scene: Scene,
    camera: Camera,
    frame: FrameBuffer,
    rowStart: number,
    rowEnd: number
): void {
    const rowBytes = frame.width * 4;
    renderBand(
        scene,
        camera,
        frame.width,
        frame.height,
        rowStart,
        rowEnd,
        frame.data.subarray(rowStart * rowBytes, rowEnd * rowBytes)
    );
}

export function renderFrame(
    scene: Scene,
    camera: Camera,
    frame: FrameBuffer
): void {
    renderRows(scene, camera, frame, 0, frame.height);
}

/**
 * Splits `height` rows into at most `parts` contiguous, non-empty bands of
 * near-equal size.
 */
export function splitRows(
    height: number,
    parts: number
): { rowStart: number; rowEnd: number }[] {
    const count = Math.max(1, Math.min(height, Math.floor(parts)));
    const base = Math.floor(height / count);
    const extra = height % count;

    const bands: { rowStart: number; rowEnd: number }[] = [];
    let rowStart = 0;
    for (let i = 0; i < count; i++) {
        const rows = base + (i < extra ? 1 : 0);
        bands.push({ rowStart, rowEnd: rowStart + rows });
        rowStart += rows;
    }
    return bands;
}
