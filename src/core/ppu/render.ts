import type { Byte } from '@core/cpu/types';
import { SHADES, shadeOf } from './palette';

// Pure scanline composition. Everything here is a function of VRAM, OAM, the
// LCD registers and the line number, so it can be driven without a CPU.

export const SCREEN_WIDTH = 160;
export const SCREEN_HEIGHT = 144;
export const MAX_SPRITES_PER_LINE = 10;

// LCDC bits
export const LCDC_BG_ENABLE = 0x01;
export const LCDC_OBJ_ENABLE = 0x02;
export const LCDC_OBJ_TALL = 0x04;
export const LCDC_BG_MAP = 0x08;
export const LCDC_TILE_DATA = 0x10;
export const LCDC_WINDOW_ENABLE = 0x20;
export const LCDC_WINDOW_MAP = 0x40;
export const LCDC_LCD_ENABLE = 0x80;

// OAM attribute bits
export const ATTR_BEHIND_BG = 0x80;
export const ATTR_Y_FLIP = 0x40;
export const ATTR_X_FLIP = 0x20;
export const ATTR_PALETTE = 0x10;

export interface Sprite {
  index: number; // OAM slot 0..39
  y: number; // screen Y of the top row (OAM Y - 16)
  x: number; // screen X of the left column (OAM X - 8)
  tile: Byte;
  attrs: Byte;
}

export interface LineRegisters {
  lcdc: Byte;
  scx: Byte;
  scy: Byte;
  wx: Byte;
  bgp: Byte;
  obp0: Byte;
  obp1: Byte;
}

export interface LineInput extends LineRegisters {
  vram: Uint8Array; // 8 KiB, index 0 = $8000
  ly: number;
  sprites: readonly Sprite[]; // already selected and ordered
  // Window line counter for this line, or null when the window is not drawn on it
  windowLine: number | null;
}

export interface ResolvedPixel {
  colorId: number;
  palette: 'bg' | 'obp0' | 'obp1';
}

/** Color id 0..3 of pixel (col,row) in the tile whose 16 bytes start at tileAddr (VRAM offset). */
export function tileColorId(vram: Uint8Array, tileAddr: number, row: number, col: number): number {
  const lo = vram[(tileAddr + row * 2) & 0x1FFF];
  const hi = vram[(tileAddr + row * 2 + 1) & 0x1FFF];
  const bit = 7 - col;
  return (((hi >> bit) & 1) << 1) | ((lo >> bit) & 1);
}

/** VRAM offset of a background/window tile: unsigned from $8000 or signed from $9000. */
export function bgTileAddress(lcdc: Byte, tileIndex: Byte): number {
  if (lcdc & LCDC_TILE_DATA) return tileIndex * 16;
  const signed = tileIndex < 0x80 ? tileIndex : tileIndex - 0x100;
  return 0x1000 + signed * 16;
}

/**
 * OAM scan: the first 10 entries (in OAM order) that cover line ly, then ordered
 * by ascending X with OAM index breaking ties. That order is drawing priority.
 */
export function selectSprites(oam: Uint8Array, ly: number, tall: boolean): Sprite[] {
  const height = tall ? 16 : 8;
  const picked: Sprite[] = [];
  for (let i = 0; i < 40 && picked.length < MAX_SPRITES_PER_LINE; i++) {
    const base = i * 4;
    const y = oam[base] - 16;
    if (ly < y || ly >= y + height) continue;
    picked.push({ index: i, y, x: oam[base + 1] - 8, tile: oam[base + 2], attrs: oam[base + 3] });
  }
  picked.sort((p, q) => (p.x - q.x) || (p.index - q.index));
  return picked;
}

/** Color id of sprite s at screen column x on line ly; 0 when outside or transparent. */
export function spriteColorId(vram: Uint8Array, s: Sprite, x: number, ly: number, tall: boolean): number {
  const col = x - s.x;
  if (col < 0 || col > 7) return 0;
  const height = tall ? 16 : 8;
  let row = ly - s.y;
  if (row < 0 || row >= height) return 0;
  if (s.attrs & ATTR_Y_FLIP) row = height - 1 - row;
  let tile = s.tile;
  if (tall) {
    tile = row < 8 ? (s.tile & 0xFE) : (s.tile | 0x01);
    row &= 7;
  }
  const c = (s.attrs & ATTR_X_FLIP) ? 7 - col : col;
  return tileColorId(vram, tile * 16, row, c);
}

/**
 * Background vs object. Object color id 0 is transparent whatever its priority bit;
 * an opaque object loses only when it is flagged behind-BG, BG is enabled and the
 * BG color id is nonzero.
 */
export function resolvePixel(bgColorId: number, bgEnabled: boolean, obj: { colorId: number; attrs: Byte } | null): ResolvedPixel {
  const bg = bgEnabled ? bgColorId : 0;
  if (obj && obj.colorId !== 0) {
    const behind = (obj.attrs & ATTR_BEHIND_BG) !== 0;
    if (!(behind && bgEnabled && bg !== 0)) {
      return { colorId: obj.colorId, palette: (obj.attrs & ATTR_PALETTE) ? 'obp1' : 'obp0' };
    }
  }
  return { colorId: bg, palette: 'bg' };
}

function bgColorAt(input: LineInput, x: number): number {
  const { vram, lcdc, ly } = input;
  const winX = input.wx - 7;
  if (input.windowLine !== null && x >= winX) {
    const map = (lcdc & LCDC_WINDOW_MAP) ? 0x1C00 : 0x1800;
    const wxPix = x - winX;
    const wy = input.windowLine;
    const idx = vram[map + (((wy >> 3) & 31) * 32) + ((wxPix >> 3) & 31)];
    return tileColorId(vram, bgTileAddress(lcdc, idx), wy & 7, wxPix & 7);
  }
  const map = (lcdc & LCDC_BG_MAP) ? 0x1C00 : 0x1800;
  const px = (x + input.scx) & 0xFF;
  const py = (ly + input.scy) & 0xFF;
  const idx = vram[map + ((py >> 3) * 32) + (px >> 3)];
  return tileColorId(vram, bgTileAddress(lcdc, idx), py & 7, px & 7);
}

/** Final shade (0..3) for each of the 160 pixels of a line. */
export function composeLine(input: LineInput, out: Uint8Array = new Uint8Array(SCREEN_WIDTH)): Uint8Array {
  const bgEnabled = (input.lcdc & LCDC_BG_ENABLE) !== 0;
  const objEnabled = (input.lcdc & LCDC_OBJ_ENABLE) !== 0;
  const tall = (input.lcdc & LCDC_OBJ_TALL) !== 0;
  for (let x = 0; x < SCREEN_WIDTH; x++) {
    const bg = bgEnabled ? bgColorAt(input, x) : 0;
    let obj: { colorId: number; attrs: Byte } | null = null;
    if (objEnabled) {
      for (const s of input.sprites) {
        const id = spriteColorId(input.vram, s, x, input.ly, tall);
        if (id !== 0) { obj = { colorId: id, attrs: s.attrs }; break; }
      }
    }
    const px = resolvePixel(bg, bgEnabled, obj);
    const pal = px.palette === 'bg' ? input.bgp : px.palette === 'obp0' ? input.obp0 : input.obp1;
    out[x] = shadeOf(pal, px.colorId);
  }
  return out;
}

/** Expand shades of one line into the RGBA framebuffer at row ly. */
export function writeRgbaLine(shades: Uint8Array, rgba: Uint8Array, ly: number): void {
  let o = ly * SCREEN_WIDTH * 4;
  for (let x = 0; x < SCREEN_WIDTH; x++) {
    const c = SHADES[shades[x] & 3];
    rgba[o++] = c[0]; rgba[o++] = c[1]; rgba[o++] = c[2]; rgba[o++] = c[3];
  }
}
