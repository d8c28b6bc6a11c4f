// Number of frames in the rolling average
export const N_FRAMES = 20;

export class FrameTimer {
    // Newest first
    private frameTimes: number[] = [];

    constructor(private readonly capacity: number = N_FRAMES) {}

    // Call this method with the duration of each rendered frame
    public record(ms: number): void {
        while (this.frameTimes.length >= this.capacity) {
            this.frameTimes.pop();
        }
        this.frameTimes.unshift(ms);
    }

    // Times the promise and records it as one frame
    public async time<T>(frame: () => Promise<T>): Promise<T> {
        const start = performance.now();
        const result = await frame();
        this.record(performance.now() - start);
        return result;
    }

    public getLatest(): number {
        return this.frameTimes[0] ?? 0;
    }

    public getAverage(): number {
        if (this.frameTimes.length === 0) {
            return 0;
        }
        const total = this.frameTimes.reduce((sum, ms) => sum + ms, 0);
        return total / this.frameTimes.length;
    }

    public getFPS(): number {
        const average = this.getAverage();
        return average > 0 ? Math.round(1000 / average) : 0;
    }

    public describe(): string {
        return `Frame took: ${this.getLatest().toFixed(2)}ms (avg: ${this.getAverage().toFixed(2)}ms)`;
    }
}
