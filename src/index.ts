export * from './types.js';
export { Quat, rotate, degToRad } from './math.js';
export { BACKGROUND, BLACK, interpolateColor, scaleColor } from './color.js';
export { intersect, intersectSphere, intersectTriangle } from './intersect.js';
export { isOccluded, nearestHit, shade, SHADOW_EPSILON, traceRay } from './shading.js';
export { Camera, type CameraSnapshot, type Transform } from './Camera.js';
export { CameraController } from './CameraController.js';
export { createFrameBuffer, renderBand, renderFrame, renderRows, splitRows } from './renderer.js';
export { RenderPool } from './RenderPool.js';
export { loadScene, parseOBJ, parseSceneJSON, RethrownError, SceneError } from './common.js';
export { buildConfig, ConfigError, parseArgs } from './config.js';
export { toAnsi, writePNG } from './output.js';
export { FrameTimer } from './FrameTimer.js';
