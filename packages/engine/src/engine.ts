/**
 * The narrow capability surface the hooks and the sync layer need from an
 * instruction-level emulator. Adapters wrap a concrete emulator; `ScriptedEngine`
 * is the in-process stand-in.
 */

export type Register = "a" | "b" | "c" | "d" | "e" | "h" | "l";

/** Runs synchronously once per executed instruction, before the instruction at the current PC. */
export type StepHook = (engine: Engine) => void;

export interface Engine {
  /** Run until the next full frame has been produced. */
  stepFrame(): void;
  readByte(address: number): number;
  writeByte(address: number, value: number): void;
  readRegister(register: Register): number;
  writeRegister(register: Register, value: number): void;
  getProgramCounter(): number;
  setProgramCounter(address: number): void;
  /** Writes into cartridge ROM; `address` is the CPU-visible form inside the bank window. */
  patchRom(bank: number, address: number, value: number): void;
  setStepHook(hook: StepHook | null): void;
  /** Returns the framebuffer when a new frame is ready since the last poll, else null. */
  pollScreen(): Uint8Array | null;
}

/** Module contract for engine adapters loaded by the CLI. */
export interface EngineFactoryOptions {
  romPath?: string;
  save?: Uint8Array | null;
}

export interface EngineModule {
  createEngine(options: EngineFactoryOptions): Engine | Promise<Engine>;
  /** Optional: hand back the cartridge RAM to persist at shutdown. */
  exportSave?(engine: Engine): Uint8Array | null;
}
