import { PNG } from 'pngjs';

// ── Frame ────────────────────────────────────────────────────

/** An RGB image, row-major, 3 bytes per pixel. */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export function createFrame(width: number, height: number, fill: number): Frame {
  return { width, height, data: new Uint8Array(width * height * 3).fill(fill) };
}

export function fillRect(
  frame: Frame,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  rgb: readonly [number, number, number],
): void {
  const xs = Math.max(0, x0);
  const xe = Math.min(frame.width, x1);
  const ys = Math.max(0, y0);
  const ye = Math.min(frame.height, y1);

  for (let y = ys; y < ye; y++) {
    for (let x = xs; x < xe; x++) {
      const offset = (y * frame.width + x) * 3;
      frame.data[offset] = rgb[0];
      frame.data[offset + 1] = rgb[1];
      frame.data[offset + 2] = rgb[2];
    }
  }
}

export function pixelAt(frame: Frame, x: number, y: number): [number, number, number] {
  const offset = (y * frame.width + x) * 3;
  return [
    frame.data[offset] ?? 0,
    frame.data[offset + 1] ?? 0,
    frame.data[offset + 2] ?? 0,
  ];
}

// ── PNG codec ────────────────────────────────────────────────

export function encodePng(frame: Frame): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  const rgba = Buffer.alloc(frame.width * frame.height * 4);

  for (let i = 0, j = 0; i < frame.data.length; i += 3, j += 4) {
    rgba[j] = frame.data[i] ?? 0;
    rgba[j + 1] = frame.data[i + 1] ?? 0;
    rgba[j + 2] = frame.data[i + 2] ?? 0;
    rgba[j + 3] = 255;
  }

  png.data = rgba;
  return PNG.sync.write(png);
}

export function decodePng(buffer: Buffer): Frame {
  const png = PNG.sync.read(buffer);
  const data = new Uint8Array(png.width * png.height * 3);

  for (let i = 0, j = 0; j < png.data.length; i += 3, j += 4) {
    data[i] = png.data[j] ?? 0;
    data[i + 1] = png.data[j + 1] ?? 0;
    data[i + 2] = png.data[j + 2] ?? 0;
  }

  return { width: png.width, height: png.height, data };
}
