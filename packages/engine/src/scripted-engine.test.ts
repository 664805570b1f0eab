import { describe, it, expect, vi } from "vitest";
import { ScriptedEngine } from "./scripted-engine.js";

describe("ScriptedEngine", () => {
  it("visits every scheduled program counter once per frame", () => {
    const engine = new ScriptedEngine({ program: [0x100, 0x101, 0x102] });
    const hook = vi.fn();
    engine.setStepHook(hook);
    engine.stepFrame();
    expect(hook).toHaveBeenCalledTimes(3);
    expect(engine.trace).toEqual([0x100, 0x101, 0x102]);
    expect(engine.frameCount).toBe(1);
  });

  it("skips ahead when the hook jumps to a later entry", () => {
    const engine = new ScriptedEngine({ program: [0x100, 0x101, 0x102, 0x103] });
    engine.setStepHook((e) => {
      if (e.getProgramCounter() === 0x100) e.setProgramCounter(0x102);
    });
    engine.stepFrame();
    expect(engine.trace).toEqual([0x102, 0x103]);
  });

  it("runs effects for the address the hook left behind", () => {
    const engine = new ScriptedEngine({ program: [0x200, 0x300] });
    const effect = vi.fn();
    engine.onInstruction(0x201, effect);
    engine.setStepHook((e) => {
      if (e.getProgramCounter() === 0x200) e.setProgramCounter(0x201);
    });
    engine.stepFrame();
    expect(effect).toHaveBeenCalledTimes(1);
    expect(engine.trace).toEqual([0x201, 0x300]);
  });

  it("runs queued frames before falling back to the default program", () => {
    const engine = new ScriptedEngine({ program: [0x1] });
    engine.queueFrame([0x2, 0x3]);
    engine.stepFrame();
    engine.stepFrame();
    expect(engine.trace).toEqual([0x2, 0x3, 0x1]);
  });

  it("removes effects", () => {
    const engine = new ScriptedEngine({ program: [0x10] });
    const effect = vi.fn();
    const off = engine.onInstruction(0x10, effect);
    off();
    engine.stepFrame();
    expect(effect).not.toHaveBeenCalled();
  });

  it("hands out each frame once", () => {
    const engine = new ScriptedEngine();
    expect(engine.pollScreen()).toBeNull();
    engine.stepFrame();
    expect(engine.pollScreen()).toBeInstanceOf(Uint8Array);
    expect(engine.pollScreen()).toBeNull();
  });

  it("keeps memory and registers to a byte", () => {
    const engine = new ScriptedEngine();
    engine.writeByte(0x10000 + 5, 0x1ff);
    expect(engine.readByte(5)).toBe(0xff);
    engine.writeRegister("a", 0x150);
    expect(engine.readRegister("a")).toBe(0x50);
  });

  it("patches ROM by bank and windowed address", () => {
    const engine = new ScriptedEngine({ romBanks: 4 });
    engine.patchRom(2, 0x4010, 0xab);
    expect(engine.rom[2 * 0x4000 + 0x10]).toBe(0xab);
    expect(engine.readRom(2, 0x4010)).toBe(0xab);
    expect(() => engine.patchRom(4, 0x4000, 1)).toThrow(RangeError);
  });
});
