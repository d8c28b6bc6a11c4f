import { createWriteStream } from 'node:fs';
import * as PImage from 'pureimage';
import { FrameBuffer } from './types.js';

export async function writePNG(frame: FrameBuffer, file: string): Promise<void> {
    const img = PImage.make(frame.width, frame.height);
    img.data.set(frame.data);
    await PImage.encodePNGToStream(img, createWriteStream(file));
}

const ESC = '\x1b[';
const UPPER_HALF_BLOCK = '▀';

function rgbAt(frame: FrameBuffer, x: number, y: number): string {
    if (y >= frame.height) {
        return '0;0;0';
    }
    const i = (y * frame.width + x) * 4;
    return `${frame.data[i]};${frame.data[i + 1]};${frame.data[i + 2]}`;
}

/**
 * 24-bit ANSI rendering, two pixel rows per text line: the upper half block
 * takes the even row as foreground and the odd row as background.
 */
export function toAnsi(frame: FrameBuffer): string {
    let out = '';
    for (let y = 0; y < frame.height; y += 2) {
        for (let x = 0; x < frame.width; x++) {
            out += `${ESC}38;2;${rgbAt(frame, x, y)}m`;
            out += `${ESC}48;2;${rgbAt(frame, x, y + 1)}m`;
            out += UPPER_HALF_BLOCK;
        }
        out += `${ESC}0m\n`;
    }
    return out;
}
