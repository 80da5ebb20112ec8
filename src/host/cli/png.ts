import { PNG } from 'pngjs';
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/ppu/render';

// RGBA framebuffer -> PNG file bytes
export function encodePng(rgba: Uint8Array, width = SCREEN_WIDTH, height = SCREEN_HEIGHT): Buffer {
  if (rgba.length !== width * height * 4) {
    throw new Error(`framebuffer is ${rgba.length} bytes, expected ${width * height * 4} for ${width}x${height}`);
  }
  const png = new PNG({ width, height });
  png.data = Buffer.from(rgba);
  return PNG.sync.write(png);
}

export function decodePng(bytes: Uint8Array): { width: number; height: number; data: Uint8Array } {
  const png = PNG.sync.read(Buffer.from(bytes));
  return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
}
