import { BACKGROUND, BLACK, scaleColor } from './color.js';
import { intersect } from './intersect.js';
import { Color, Hit, Scene, Vec3 } from './types.js';

// Shadow hits closer than this to the shaded point are the surface itself.
export const SHADOW_EPSILON = 1e-4;

/**
 * Nearest usable hit. Missing and non-finite candidates never take part in
 * the comparison; on an exact tie the earliest candidate wins.
 */
export function nearestHit(hits: readonly (Hit | null)[]): Hit | null {
    let best: Hit | null = null;
    for (const hit of hits) {
        if (!hit || !Number.isFinite(hit.t) || hit.t < 0) {
            continue;
        }
        if (!best || hit.t < best.t) {
            best = hit;
        }
    }
    return best;
}

/**
 * Whether anything in the scene blocks the segment from `point` to the light.
 * Occluders past the light do not count.
 */
export function isOccluded(scene: Scene, point: Vec3): boolean {
    const toLight = Vec3.subtract(scene.light, point);
    const lightSqDist = Vec3.sqMag(toLight);
    const dir = Vec3.normalize(toLight);
    if (!Vec3.isFinite(dir)) {
        return false;
    }

    // `dir` is unit length, so t² is the squared distance along the ray.
    return scene.objects.some((object) => {
        const hit = intersect(point, dir, object);
        return hit !== null && hit.t > SHADOW_EPSILON && hit.t * hit.t < lightSqDist;
    });
}

export function shade(
    scene: Scene,
    origin: Vec3,
    dir: Vec3,
    hit: Hit
): Color {
    const point = Vec3.add(origin, Vec3.scale(dir, hit.t));
    if (!Vec3.isFinite(point) || isOccluded(scene, point)) {
        return BLACK;
    }

    const lightDir = Vec3.normalize(Vec3.subtract(scene.light, point));
    const illumination = Math.max(0, Vec3.dot(lightDir, hit.normal));
    if (!Number.isFinite(illumination)) {
        return BLACK;
    }
    return scaleColor(hit.color, illumination);
}

export function traceRay(scene: Scene, origin: Vec3, dir: Vec3): Color {
    const hit = nearestHit(
        scene.objects.map((object) => intersect(origin, dir, object))
    );
    return hit ? shade(scene, origin, dir, hit) : BACKGROUND;
}
