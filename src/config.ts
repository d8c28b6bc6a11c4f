import { availableParallelism } from 'node:os';
import { CameraConfig, Vec3 } from './types.js';

export const DEFAULT_SCENE = 'scenes/scene_spheres.json';
export const DEFAULT_OUT = 'out.png';

// Default viewpoint, slightly below the origin looking along +x
export const DEFAULT_CAMERA: CameraConfig = {
    position: [0, -0.8, 0],
    focalLength: 2,
    pxPerUnit: 160,
};

export interface RenderConfig {
    scenePath: string;
    outPath: string;
    width: number;
    height: number;
    workers: number;
    frames: number;
    preview: boolean;
    interactive: boolean;
    camera: CameraConfig;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface CliArgs {
    _: string[];
    flags: Record<string, string | true>;
}

export const USAGE = `Usage: raycaster [scene.json] [flags]

Flags (all optional):
  --scene <path>    Scene file, default: ${DEFAULT_SCENE}
  --out <path>      Output PNG, default: ${DEFAULT_OUT}
  --w <int>         Width in pixels, default: 600
  --h <int>         Height in pixels, default: 375
  --workers <int>   Render threads, 0 renders on the main thread
  --frames <int>    Frames to render (timing), default: 1
  --focal <num>     Focal length, default: ${DEFAULT_CAMERA.focalLength}
  --scale <num>     Pixels per world unit, default: ${DEFAULT_CAMERA.pxPerUnit}
  --cam <x,y,z>     Camera position
  --preview         Print the frame to the terminal
  --interactive     Fly the camera with the keyboard in the terminal
  --help            Show this message`;

// Tiny flag parser: `--key value`, bare `--key` is a boolean.
export function parseArgs(argv: readonly string[]): CliArgs {
    const out: CliArgs = { _: [], flags: {} };
    for (let i = 0; i < argv.length; i++) {
        const tok = argv[i];
        if (tok.startsWith('--')) {
            const key = tok.slice(2);
            const next = argv[i + 1];
            if (next !== undefined && !next.startsWith('--')) {
                out.flags[key] = next;
                i++;
            } else out.flags[key] = true;
        } else {
            out._.push(tok);
        }
    }
    return out;
}

function readString(args: CliArgs, key: string): string | undefined {
    const value = args.flags[key];
    if (value === true) {
        throw new ConfigError(`--${key} needs a value`);
    }
    return value;
}

function readNumber(
    args: CliArgs,
    key: string,
    fallback: number,
    opts: { integer?: boolean; min?: number } = {}
): number {
    const raw = readString(args, key);
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || (opts.integer && !Number.isInteger(value))) {
        throw new ConfigError(`--${key}: invalid number '${raw}'`);
    }
    if (opts.min !== undefined && value < opts.min) {
        throw new ConfigError(`--${key}: must be at least ${opts.min}`);
    }
    return value;
}

export function parseVec3(raw: string, key: string): Vec3 {
    const parts = raw.split(',').map((p) => Number(p.trim()));
    if (parts.length !== 3 || !parts.every(Number.isFinite)) {
        throw new ConfigError(`--${key}: expected x,y,z, got '${raw}'`);
    }
    return [parts[0], parts[1], parts[2]];
}

export function defaultWorkerCount(): number {
    return Math.max(0, availableParallelism() - 1);
}

export function scenePathFrom(args: CliArgs): string {
    return readString(args, 'scene') ?? args._[0] ?? DEFAULT_SCENE;
}

/**
 * Resolves the final configuration. Precedence: command line, then the scene
 * file's camera block, then the built-in defaults.
 */
export function buildConfig(
    args: CliArgs,
    sceneCamera: Partial<CameraConfig> = {}
): RenderConfig {
    const camera: CameraConfig = { ...DEFAULT_CAMERA, ...sceneCamera };
    const cam = readString(args, 'cam');
    if (cam !== undefined) {
        camera.position = parseVec3(cam, 'cam');
    }
    camera.focalLength = readNumber(args, 'focal', camera.focalLength);
    camera.pxPerUnit = readNumber(args, 'scale', camera.pxPerUnit);
    if (camera.pxPerUnit <= 0) {
        throw new ConfigError('Pixels per unit must be positive');
    }

    return {
        scenePath: scenePathFrom(args),
        outPath: readString(args, 'out') ?? DEFAULT_OUT,
        width: readNumber(args, 'w', 600, { integer: true, min: 1 }),
        height: readNumber(args, 'h', 375, { integer: true, min: 1 }),
        workers: readNumber(args, 'workers', defaultWorkerCount(), {
            integer: true,
            min: 0,
        }),
        frames: readNumber(args, 'frames', 1, { integer: true, min: 1 }),
        preview: args.flags.preview === true,
        interactive: args.flags.interactive === true,
        camera,
    };
}
