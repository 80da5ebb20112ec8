import type { Byte, Word } from '@core/cpu/types';
import { Interrupt, InterruptController } from '@core/interrupts/interrupts';
import { createLogger, envFlag, hex2 } from '@utils/log';
import {
  LCDC_LCD_ENABLE, LCDC_OBJ_TALL, LCDC_WINDOW_ENABLE, SCREEN_HEIGHT, SCREEN_WIDTH,
  composeLine, selectSprites, writeRgbaLine, type Sprite,
} from './render';

const log = createLogger('ppu');

export enum PPUMode {
  HBlank = 0,
  VBlank = 1,
  OamScan = 2,
  Transfer = 3,
}

// Line timing in dots (T-cycles)
export const DOTS_PER_LINE = 456;
export const OAM_SCAN_DOTS = 80;
export const TRANSFER_DOTS = 172;
export const HBLANK_DOTS = DOTS_PER_LINE - OAM_SCAN_DOTS - TRANSFER_DOTS;
export const VISIBLE_LINES = SCREEN_HEIGHT;
export const LINES_PER_FRAME = 154;
export const DOTS_PER_FRAME = DOTS_PER_LINE * LINES_PER_FRAME;

// STAT interrupt select bits
const STAT_HBLANK = 0x08;
const STAT_VBLANK = 0x10;
const STAT_OAM = 0x20;
const STAT_LYC = 0x40;

export type FrameListener = (rgba: Uint8Array, frame: number) => void;

export interface PPUOptions {
  // Value every LY read returns instead of the real line (trace comparison mode)
  lyOverride?: number | null;
}

export class PPU {
  // LCD registers
  lcdc = 0;
  scy = 0;
  scx = 0;
  lyc = 0;
  bgp = 0;
  obp0 = 0;
  obp1 = 0;
  wy = 0;
  wx = 0;
  dma = 0;
  private statSelect = 0; // STAT bits 3..6

  // Timing
  ly = 0;
  dot = 0; // 0..455 within the current line
  mode: PPUMode = PPUMode.HBlank;
  frame = 0;

  readonly vram = new Uint8Array(0x2000);
  readonly oam = new Uint8Array(0xA0);

  // Shade index per pixel and the RGBA image derived from it
  readonly shades = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  readonly frameBuffer = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT * 4);

  private lineSprites: Sprite[] = [];
  private lineShades = new Uint8Array(SCREEN_WIDTH);
  private windowCounter = 0;
  private wyTriggered = false;
  private statLine = false;
  private frameListeners: FrameListener[] = [];
  private readonly lyOverride: number | null;
  private readonly traceDma = envFlag('TRACE_DMA');

  constructor(private readonly interrupts: InterruptController, opts: PPUOptions = {}) {
    this.lyOverride = opts.lyOverride ?? null;
  }

  get lcdOn(): boolean { return (this.lcdc & LCDC_LCD_ENABLE) !== 0; }

  get coincidence(): boolean { return this.ly === this.lyc; }

  onFrame(listener: FrameListener): () => void {
    this.frameListeners.push(listener);
    return () => { this.frameListeners = this.frameListeners.filter((l) => l !== listener); };
  }

  // LCD state right after the boot ROM hands over
  applyPostBoot(): void {
    this.writeRegister(0xFF40, 0x91);
    this.bgp = 0xFC;
    this.obp0 = 0xFF;
    this.obp1 = 0xFF;
  }

  tick(dots: number): void {
    if (!this.lcdOn) return;
    while (dots > 0) {
      const boundary = this.modeEnd();
      const step = Math.min(dots, boundary - this.dot);
      this.dot += step;
      dots -= step;
      if (this.dot >= boundary) this.advanceMode();
    }
  }

  private modeEnd(): number {
    switch (this.mode) {
      case PPUMode.OamScan: return OAM_SCAN_DOTS;
      case PPUMode.Transfer: return OAM_SCAN_DOTS + TRANSFER_DOTS;
      default: return DOTS_PER_LINE;
    }
  }

  private advanceMode(): void {
    switch (this.mode) {
      case PPUMode.OamScan:
        this.lineSprites = selectSprites(this.oam, this.ly, (this.lcdc & LCDC_OBJ_TALL) !== 0);
        this.mode = PPUMode.Transfer;
        break;
      case PPUMode.Transfer:
        this.renderLine();
        this.mode = PPUMode.HBlank;
        break;
      case PPUMode.HBlank:
        this.dot = 0;
        this.ly++;
        if (this.ly === VISIBLE_LINES) {
          this.mode = PPUMode.VBlank;
          this.interrupts.request(Interrupt.VBlank);
          this.finishFrame();
        } else {
          this.startLine();
        }
        break;
      case PPUMode.VBlank:
        this.dot = 0;
        this.ly++;
        if (this.ly === LINES_PER_FRAME) {
          this.ly = 0;
          this.windowCounter = 0;
          this.wyTriggered = false;
          this.startLine();
        }
        break;
    }
    this.updateStatLine();
  }

  private startLine(): void {
    this.mode = PPUMode.OamScan;
    if (this.ly === this.wy) this.wyTriggered = true;
  }

  private renderLine(): void {
    const drawWindow = (this.lcdc & LCDC_WINDOW_ENABLE) !== 0 && this.wyTriggered && this.wx <= 166;
    composeLine({
      vram: this.vram,
      ly: this.ly,
      lcdc: this.lcdc,
      scx: this.scx,
      scy: this.scy,
      wx: this.wx,
      bgp: this.bgp,
      obp0: this.obp0,
      obp1: this.obp1,
      sprites: this.lineSprites,
      windowLine: drawWindow ? this.windowCounter : null,
    }, this.lineShades);
    if (drawWindow) this.windowCounter++;
    this.shades.set(this.lineShades, this.ly * SCREEN_WIDTH);
    writeRgbaLine(this.lineShades, this.frameBuffer, this.ly);
  }

  private finishFrame(): void {
    this.frame++;
    for (const l of this.frameListeners) l(this.frameBuffer, this.frame);
  }

  // STAT interrupt fires on the rising edge of the OR of all enabled conditions
  private updateStatLine(): void {
    const s = this.statSelect;
    const line = this.lcdOn && (
      (this.mode === PPUMode.HBlank && (s & STAT_HBLANK) !== 0) ||
      (this.mode === PPUMode.VBlank && (s & STAT_VBLANK) !== 0) ||
      (this.mode === PPUMode.OamScan && (s & STAT_OAM) !== 0) ||
      (this.coincidence && (s & STAT_LYC) !== 0)
    );
    if (line && !this.statLine) this.interrupts.request(Interrupt.Stat);
    this.statLine = line;
  }

  private setLcdc(value: Byte): void {
    const wasOn = this.lcdOn;
    this.lcdc = value;
    if (wasOn && !this.lcdOn) {
      this.ly = 0;
      this.dot = 0;
      this.mode = PPUMode.HBlank;
      this.statLine = false;
      log.debug('LCD off');
    } else if (!wasOn && this.lcdOn) {
      this.ly = 0;
      this.dot = 0;
      this.windowCounter = 0;
      this.wyTriggered = false;
      this.startLine();
      this.updateStatLine();
      log.debug('LCD on');
    }
  }

  readRegister(addr: Word): Byte {
    switch (addr) {
      case 0xFF40: return this.lcdc;
      case 0xFF41: return 0x80 | this.statSelect | (this.coincidence ? 0x04 : 0) | (this.lcdOn ? this.mode : 0);
      case 0xFF42: return this.scy;
      case 0xFF43: return this.scx;
      case 0xFF44: return this.lyOverride ?? this.ly;
      case 0xFF45: return this.lyc;
      case 0xFF46: return this.dma;
      case 0xFF47: return this.bgp;
      case 0xFF48: return this.obp0;
      case 0xFF49: return this.obp1;
      case 0xFF4A: return this.wy;
      case 0xFF4B: return this.wx;
      default: return 0xFF;
    }
  }

  writeRegister(addr: Word, value: Byte): void {
    value &= 0xFF;
    switch (addr) {
      case 0xFF40: this.setLcdc(value); break;
      case 0xFF41: this.statSelect = value & 0x78; this.updateStatLine(); break;
      case 0xFF42: this.scy = value; break;
      case 0xFF43: this.scx = value; break;
      case 0xFF44: break; // read-only
      case 0xFF45: this.lyc = value; this.updateStatLine(); break;
      case 0xFF47: this.bgp = value; break;
      case 0xFF48: this.obp0 = value; break;
      case 0xFF49: this.obp1 = value; break;
      case 0xFF4A: this.wy = value; break;
      case 0xFF4B: this.wx = value; break;
      default: break;
    }
  }

  // CPU-side VRAM/OAM access, blocked while the PPU owns the memory
  private vramLocked(): boolean { return this.lcdOn && this.mode === PPUMode.Transfer; }
  private oamLocked(): boolean { return this.lcdOn && (this.mode === PPUMode.OamScan || this.mode === PPUMode.Transfer); }

  cpuReadVram(addr: Word): Byte {
    return this.vramLocked() ? 0xFF : this.vram[addr & 0x1FFF];
  }

  cpuWriteVram(addr: Word, value: Byte): void {
    if (!this.vramLocked()) this.vram[addr & 0x1FFF] = value & 0xFF;
  }

  cpuReadOam(addr: Word): Byte {
    return this.oamLocked() ? 0xFF : this.oam[(addr - 0xFE00) & 0xFF];
  }

  cpuWriteOam(addr: Word, value: Byte): void {
    if (!this.oamLocked()) this.oam[(addr - 0xFE00) & 0xFF] = value & 0xFF;
  }

  // $FF46: copy 160 bytes from page `page` straight into OAM
  oamDMA(read: (addr: Word) => Byte, page: Byte): void {
    this.dma = page & 0xFF;
    const base = (page & 0xFF) << 8;
    for (let i = 0; i < this.oam.length; i++) this.oam[i] = read((base + i) & 0xFFFF) & 0xFF;
    if (this.traceDma) log.info(`OAM DMA from $${hex2(page)}00 at LY=${this.ly}`);
  }

  getOAMByte(index: number): Byte { return this.oam[index % this.oam.length]; }
}
