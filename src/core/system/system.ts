import { MemoryBus } from '@core/bus/memory';
import { CPU, type TraceHook } from '@core/cpu/cpu';
import { postBootState } from '@core/cpu/types';
import { PPU, DOTS_PER_FRAME } from '@core/ppu/ppu';
import { Timer, POST_BOOT_COUNTER } from '@core/timer/timer';
import { InterruptController } from '@core/interrupts/interrupts';
import { Serial, type SerialListener } from '@core/io/serial';
import { Joypad } from '@core/io/joypad';
import { Cartridge } from '@core/cart/cartridge';
import { parseCartridge, type CartImage } from '@core/cart/header';

// LY value every read returns in doctor mode (first V-blank line)
export const DOCTOR_LY = 0x90;

export interface SystemOptions {
  // Pin LY reads for per-instruction trace comparison
  doctor?: boolean;
  // Start from the state the boot ROM leaves behind (default true)
  postBoot?: boolean;
}

export type FrameHandler = (rgba: Uint8Array, frame: number) => void;

export class DMGSystem {
  readonly interrupts: InterruptController;
  readonly timer: Timer;
  readonly serial: Serial;
  readonly joypad: Joypad;
  readonly ppu: PPU;
  readonly cart: Cartridge;
  readonly bus: MemoryBus;
  readonly cpu: CPU;
  private readonly postBoot: boolean;

  constructor(image: CartImage, opts: SystemOptions = {}) {
    this.interrupts = new InterruptController();
    this.timer = new Timer(this.interrupts);
    this.serial = new Serial(this.interrupts);
    this.joypad = new Joypad(this.interrupts);
    this.ppu = new PPU(this.interrupts, { lyOverride: opts.doctor ? DOCTOR_LY : null });
    this.cart = new Cartridge(image);
    this.bus = new MemoryBus({
      cart: this.cart,
      ppu: this.ppu,
      timer: this.timer,
      interrupts: this.interrupts,
      serial: this.serial,
      joypad: this.joypad,
    });
    this.cpu = new CPU(this.bus, this.interrupts);
    this.cpu.setStopHook(() => this.timer.write(0xFF04, 0));
    this.postBoot = opts.postBoot ?? true;
    this.reset();
  }

  static fromBytes(bytes: Uint8Array, opts: SystemOptions = {}): DMGSystem {
    return new DMGSystem(parseCartridge(bytes), opts);
  }

  reset(): void {
    if (this.postBoot) {
      this.cpu.reset(postBootState());
      this.timer.reset(POST_BOOT_COUNTER);
      this.interrupts.writeIF(0x01);
      this.ppu.applyPostBoot();
    } else {
      this.cpu.reset({ a: 0, f: 0, b: 0, c: 0, d: 0, e: 0, h: 0, l: 0, sp: 0xFFFE, pc: 0x0100, cycles: 0 });
      this.timer.reset(0);
    }
  }

  get cycles(): number { return this.cpu.state.cycles; }

  // One CPU step, then every other component advanced by the same cycle count
  stepInstruction(): number {
    const c = this.cpu.step();
    this.timer.tick(c);
    this.serial.tick(c);
    this.ppu.tick(c);
    return c;
  }

  // Until the next V-blank entry, or one frame's worth of cycles with the LCD off
  runFrame(): number {
    const start = this.ppu.frame;
    let cycles = 0;
    while (this.ppu.frame === start && cycles < DOTS_PER_FRAME) cycles += this.stepInstruction();
    return cycles;
  }

  onFrame(handler: FrameHandler): () => void {
    return this.ppu.onFrame((rgba, frame) => handler(rgba.slice(), frame));
  }

  onSerial(listener: SerialListener): () => void {
    return this.serial.onByte(listener);
  }

  setTrace(hook: TraceHook | null): void {
    this.cpu.setTraceHook(hook);
  }
}
