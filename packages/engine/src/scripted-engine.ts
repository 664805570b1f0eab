import type { Engine, Register, StepHook } from "./engine.js";
import { SCREEN_HEIGHT, SCREEN_WIDTH } from "./movement.js";

export const MEMORY_SIZE = 0x10000;
export const ROM_BANK_SIZE = 0x4000;

export type InstructionEffect = (engine: ScriptedEngine) => void;

export interface ScriptedEngineOptions {
  /** Program counters visited on every frame that has no queued program. */
  program?: readonly number[];
  romBanks?: number;
}

/**
 * In-process engine that "executes" a list of program counters per frame instead of
 * real instructions. Each visited PC runs the step hook first, then whatever effect is
 * registered for the PC the hook left behind. A hook that moves the PC forward to a
 * later entry of the same frame skips everything in between.
 */
export class ScriptedEngine implements Engine {
  readonly memory = new Uint8Array(MEMORY_SIZE);
  readonly rom: Uint8Array;
  /** Every PC executed, after hook redirects. Cleared by {@link clearTrace}. */
  readonly trace: number[] = [];
  private registers: Record<Register, number> = { a: 0, b: 0, c: 0, d: 0, e: 0, h: 0, l: 0 };
  private pc = 0;
  private hook: StepHook | null = null;
  private program: readonly number[];
  private queued: (readonly number[])[] = [];
  private effects = new Map<number, InstructionEffect[]>();
  private framebuffer = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private frameReady = false;
  private frames = 0;

  constructor(options: ScriptedEngineOptions = {}) {
    this.program = options.program ?? [];
    this.rom = new Uint8Array((options.romBanks ?? 64) * ROM_BANK_SIZE);
  }

  get frameCount(): number {
    return this.frames;
  }

  setProgram(program: readonly number[]): void {
    this.program = program;
  }

  /** Runs `program` on the next frame instead of the default one. Frames queue up in order. */
  queueFrame(program: readonly number[]): void {
    this.queued.push(program);
  }

  onInstruction(pc: number, effect: InstructionEffect): () => void {
    const list = this.effects.get(pc) ?? [];
    list.push(effect);
    this.effects.set(pc, list);
    return () => {
      const remaining = (this.effects.get(pc) ?? []).filter((e) => e !== effect);
      if (remaining.length > 0) this.effects.set(pc, remaining);
      else this.effects.delete(pc);
    };
  }

  stepFrame(): void {
    const program = this.queued.shift() ?? this.program;
    let i = 0;
    while (i < program.length) {
      const scheduled = program[i] ?? 0;
      this.pc = scheduled;
      this.hook?.(this);

      const executed = this.pc;
      this.trace.push(executed);
      for (const effect of this.effects.get(executed) ?? []) effect(this);

      if (executed === scheduled) {
        i++;
        continue;
      }
      const target = program.indexOf(executed, i + 1);
      i = target >= 0 ? target + 1 : i + 1;
    }
    this.frames++;
    this.framebuffer[this.frames % this.framebuffer.length] = this.frames & 0xff;
    this.frameReady = true;
  }

  readByte(address: number): number {
    return this.memory[address & 0xffff] ?? 0;
  }

  writeByte(address: number, value: number): void {
    this.memory[address & 0xffff] = value & 0xff;
  }

  readRegister(register: Register): number {
    return this.registers[register];
  }

  writeRegister(register: Register, value: number): void {
    this.registers[register] = value & 0xff;
  }

  getProgramCounter(): number {
    return this.pc;
  }

  setProgramCounter(address: number): void {
    this.pc = address & 0xffff;
  }

  patchRom(bank: number, address: number, value: number): void {
    const offset = bank * ROM_BANK_SIZE + (address & (ROM_BANK_SIZE - 1));
    if (offset >= this.rom.length) {
      throw new RangeError(`ROM bank ${bank} is outside the ${this.rom.length / ROM_BANK_SIZE}-bank image`);
    }
    this.rom[offset] = value & 0xff;
  }

  readRom(bank: number, address: number): number {
    return this.rom[bank * ROM_BANK_SIZE + (address & (ROM_BANK_SIZE - 1))] ?? 0;
  }

  setStepHook(hook: StepHook | null): void {
    this.hook = hook;
  }

  pollScreen(): Uint8Array | null {
    if (!this.frameReady) return null;
    this.frameReady = false;
    return this.framebuffer.slice();
  }

  clearTrace(): void {
    this.trace.length = 0;
  }
}
