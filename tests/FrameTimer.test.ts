import { describe, it, expect } from 'vitest';
import { FrameTimer, N_FRAMES } from '../src/FrameTimer.js';

describe('FrameTimer', () => {
    it('averages over the last N_FRAMES frames', () => {
        const timer = new FrameTimer();
        for (let ms = 1; ms <= N_FRAMES + 5; ms++) {
            timer.record(ms);
        }
        expect(timer.getLatest()).toBe(25);
        expect(timer.getAverage()).toBe(15.5);
        expect(timer.getFPS()).toBe(65);
        expect(timer.describe()).toBe('Frame took: 25.00ms (avg: 15.50ms)');
    });

    it('reports zero before any frame', () => {
        const timer = new FrameTimer();
        expect(timer.getLatest()).toBe(0);
        expect(timer.getAverage()).toBe(0);
        expect(timer.getFPS()).toBe(0);
    });

    it('honours a custom window', () => {
        const timer = new FrameTimer(2);
        [10, 20, 30].forEach((ms) => timer.record(ms));
        expect(timer.getAverage()).toBe(25);
    });

    it('times a frame and passes its result through', async () => {
        const timer = new FrameTimer();
        await expect(timer.time(async () => 'done')).resolves.toBe('done');
        expect(timer.getLatest()).toBeGreaterThanOrEqual(0);
        expect(timer.getFPS()).toBeGreaterThanOrEqual(0);
    });
});
