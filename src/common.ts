import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { mat4, vec3 } from 'wgpu-matrix';
import { isColor } from './color.js';
import {
    CameraConfig,
    Color,
    LoadedScene,
    Model,
    RawScene,
    SceneObject,
    Triangle,
    Vec3,
} from './types.js';

export function showError(message: string): void {
    console.error('Error:', message);
}

export class RethrownError extends Error {
    original_error: Error;
    stack_before_rethrow: string | undefined;

    constructor(message: string, error: Error) {
        super(message);
        this.name = this.constructor.name;
        this.original_error = error;
        this.stack_before_rethrow = this.stack;
        const message_lines = (this.message.match(/\n/g) || []).length + 1;
        this.stack =
            this.stack
                ?.split('\n')
                .slice(0, message_lines + 1)
                .join('\n') +
            '\n' +
            error.stack;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

// Malformed scene data
export class SceneError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SceneError';
    }
}

// =============================================================================
// OBJ models
// =============================================================================

export async function loadOBJ(file: string) {
    const text = await readFile(file, 'utf8');
    const result = parseOBJ(text);

    // Log some statistics
    console.log(`Loaded OBJ from ${file}: ${result.triangles.length} triangles`);

    return result;
}

/**
 * Reads vertex positions and faces. Faces with more than three vertices are
 * fan-triangulated; texture and normal indices are ignored.
 */
export function parseOBJ(objText: string): { triangles: [Vec3, Vec3, Vec3][] } {
    const triangles: [Vec3, Vec3, Vec3][] = [];
    const positions: Vec3[] = [];

    const resolveIndex = (token: string): Vec3 | null => {
        const idx = parseInt(token.split('/')[0], 10);
        // Negative indices count back from the latest vertex
        const resolved = idx < 0 ? positions.length + idx : idx - 1;
        if (!Number.isInteger(idx) || idx === 0 || resolved < 0 || resolved >= positions.length) {
            console.warn(`Invalid index in face definition: ${token}`);
            return null;
        }
        return positions[resolved];
    };

    const lines = objText.split('\n');
    for (let line of lines) {
        line = line.trim();
        if (line.startsWith('v ')) {
            const [, x, y, z] = line.split(/\s+/);
            positions.push([parseFloat(x), parseFloat(y), parseFloat(z)]);
        } else if (line.startsWith('f ')) {
            const parts = line.slice(2).trim().split(/\s+/);
            if (parts.length < 3) continue;

            const vertices = parts.map(resolveIndex);
            for (let i = 1; i < vertices.length - 1; i++) {
                const a = vertices[0];
                const b = vertices[i];
                const c = vertices[i + 1];
                if (!a || !b || !c) continue;
                triangles.push([a, b, c]);
            }
        }
    }

    return { triangles };
}

async function expandModel(model: Model, baseDir: string): Promise<Triangle[]> {
    const modelRot = vec3.mulScalar(
        vec3.fromValues(model.rotation[0], model.rotation[1], model.rotation[2]),
        Math.PI / 180
    ); // Convert degrees to radians
    let modelMat = mat4.identity();
    modelMat = mat4.translate(
        modelMat,
        vec3.fromValues(model.position[0], model.position[1], model.position[2])
    );
    modelMat = mat4.rotateX(modelMat, modelRot[0]);
    modelMat = mat4.rotateY(modelMat, modelRot[1]);
    modelMat = mat4.rotateZ(modelMat, modelRot[2]);
    modelMat = mat4.scale(
        modelMat,
        vec3.fromValues(model.scale[0], model.scale[1], model.scale[2])
    );

    const transform = (v: Vec3): Vec3 => {
        const out = vec3.transformMat4(vec3.fromValues(v[0], v[1], v[2]), modelMat);
        return [out[0], out[1], out[2]];
    };

    const modelPath = path.resolve(baseDir, model.path);
    try {
        const objData = await loadOBJ(modelPath);
        return objData.triangles.map(([p0, p1, p2]): Triangle => ({
            kind: 'triangle',
            p0: transform(p0),
            p1: transform(p1),
            p2: transform(p2),
            color: model.color,
        }));
    } catch (error) {
        throw new RethrownError(
            `Failed to load model: ${model.path}`,
            toError(error)
        );
    }
}

// =============================================================================
// Scene files
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readVec3(value: unknown, where: string): Vec3 {
    if (
        !Array.isArray(value) ||
        value.length !== 3 ||
        !value.every((n) => typeof n === 'number' && Number.isFinite(n))
    ) {
        throw new SceneError(`${where}: expected [x, y, z], got ${JSON.stringify(value)}`);
    }
    return [value[0], value[1], value[2]];
}

function readColor(value: unknown, where: string): Color {
    if (!isColor(value)) {
        throw new SceneError(`${where}: expected [r, g, b] in 0..255, got ${JSON.stringify(value)}`);
    }
    return [value[0], value[1], value[2]];
}

function readNumber(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SceneError(`${where}: expected a number, got ${JSON.stringify(value)}`);
    }
    return value;
}

function readObject(value: unknown, index: number): SceneObject {
    const where = `objects[${index}]`;
    if (!isRecord(value)) {
        throw new SceneError(`${where}: expected an object`);
    }
    switch (value.type) {
        case 'sphere': {
            const radius = readNumber(value.radius, `${where}.radius`);
            if (radius <= 0) {
                throw new SceneError(`${where}.radius: must be positive`);
            }
            return {
                kind: 'sphere',
                center: readVec3(value.center, `${where}.center`),
                radius,
                color: readColor(value.color, `${where}.color`),
            };
        }
        case 'triangle': {
            const vertices = value.vertices;
            if (!Array.isArray(vertices) || vertices.length !== 3) {
                throw new SceneError(`${where}.vertices: expected three points`);
            }
            return {
                kind: 'triangle',
                p0: readVec3(vertices[0], `${where}.vertices[0]`),
                p1: readVec3(vertices[1], `${where}.vertices[1]`),
                p2: readVec3(vertices[2], `${where}.vertices[2]`),
                color: readColor(value.color, `${where}.color`),
            };
        }
        default:
            throw new SceneError(`${where}.type: unknown object type ${JSON.stringify(value.type)}`);
    }
}

function readModel(value: unknown, index: number): Model {
    const where = `models[${index}]`;
    if (!isRecord(value) || typeof value.path !== 'string') {
        throw new SceneError(`${where}: expected an object with a path`);
    }
    return {
        path: value.path,
        position: value.position === undefined ? [0, 0, 0] : readVec3(value.position, `${where}.position`),
        rotation: value.rotation === undefined ? [0, 0, 0] : readVec3(value.rotation, `${where}.rotation`),
        scale: value.scale === undefined ? [1, 1, 1] : readVec3(value.scale, `${where}.scale`),
        color: readColor(value.color, `${where}.color`),
    };
}

function readCamera(value: unknown): Partial<CameraConfig> {
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new SceneError('camera: expected an object');
    }

    const camera: Partial<CameraConfig> = {};
    if (value.position !== undefined) {
        camera.position = readVec3(value.position, 'camera.position');
    }
    if (value.rotation !== undefined) {
        const rotation = value.rotation;
        if (!isRecord(rotation)) {
            throw new SceneError('camera.rotation: expected { axis, angle }');
        }
        camera.rotation = {
            axis: readVec3(rotation.axis, 'camera.rotation.axis'),
            angle: readNumber(rotation.angle, 'camera.rotation.angle'),
        };
    }
    if (value.focalLength !== undefined) {
        camera.focalLength = readNumber(value.focalLength, 'camera.focalLength');
    }
    if (value.pxPerUnit !== undefined) {
        camera.pxPerUnit = readNumber(value.pxPerUnit, 'camera.pxPerUnit');
    }
    return camera;
}

/**
 * Checks the shape of a parsed scene file. Geometry is not checked: a
 * degenerate triangle is accepted and simply never hit.
 */
export function parseSceneJSON(value: unknown): RawScene {
    if (!isRecord(value)) {
        throw new SceneError('Scene file must contain a JSON object');
    }
    const objects = value.objects ?? [];
    const models = value.models ?? [];
    if (!Array.isArray(objects)) {
        throw new SceneError('objects: expected an array');
    }
    if (!Array.isArray(models)) {
        throw new SceneError('models: expected an array');
    }

    return {
        light: readVec3(value.light, 'light'),
        objects: objects.map(readObject),
        models: models.map(readModel),
        camera: readCamera(value.camera),
    };
}

export async function loadScene(scenePath: string): Promise<LoadedScene> {
    let text: string;
    try {
        text = await readFile(scenePath, 'utf8');
    } catch (error) {
        throw new RethrownError(`Failed to load scene file: ${scenePath}`, toError(error));
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new SceneError(`Invalid JSON in ${scenePath}: ${toError(error).message}`);
    }

    const scene = parseSceneJSON(json);

    // Models are resolved next to the scene file
    const baseDir = path.dirname(scenePath);
    const objects: SceneObject[] = [...scene.objects];
    for (const model of scene.models) {
        objects.push(...(await expandModel(model, baseDir)));
    }

    return {
        scene: { objects, light: scene.light },
        camera: scene.camera ?? {},
    };
}

// Formats large numbers into a more readable string with suffixes (K, M, B)
export function formatNumber(num: number) {
    const formatter = new Intl.NumberFormat('en-US', {
        notation: 'compact',
        compactDisplay: 'short', // 'short' for K, M, B; 'long' for thousand, million, billion
        maximumFractionDigits: 2,
    });
    return formatter.format(num);
}
