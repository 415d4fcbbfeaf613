/**
 * CHIP-8 Virtual Machine
 *
 * Fetch/decode/execute engine over:
 * - 16 × 8-bit registers V0-VF (VF is also the flags output)
 * - 16-bit index register I and program counter
 * - 4K memory: font at $050-$09F, programs from $200
 * - 24-entry return address stack
 * - 64×32 XOR framebuffer and a 16-key keypad snapshot
 * - Delay and sound timers, ticked once per frame
 *
 * Timing: each frame ticks the timers once, then runs as many instructions
 * as the elapsed wall-clock time pays for at the configured instruction rate
 * (700 Hz by default). Unspent time carries over to the next frame in whole
 * nanoseconds, so the instruction rate stays exact at any frame rate.
 *
 * A fetched $0000 word marks the end of a program with no trailing halt.
 */

import { Chip8Keypad } from '@/emulator/chip8/keypad';
import { Chip8Screen, type FrameBuffer } from '@/emulator/chip8/screen';
import { Chip8Stack } from './stack';
import { decode, disassemble, type DecodedInstruction } from './opcodes';
import {
  FLAG_REG,
  REGISTER_COUNT,
  MEMORY_SIZE,
  FONT_START_ADDRESS,
  FONT_GLYPH_HEIGHT,
  FONT_SIZE,
  PROGRAM_START_ADDRESS,
  DEFAULT_QUIRKS,
  DEFAULT_INSTRUCTIONS_PER_SECOND,
  NANOS_PER_SECOND,
  NANOS_PER_MILLI,
  Chip8Error,
  MemoryAccessError,
  UnimplementedInstructionError,
  hex,
  type Chip8Options,
  type Chip8Quirks,
  type Chip8State,
  type RandomSource,
  type TraceCallback,
} from './types';

export class Chip8 {
  readonly quirks: Chip8Quirks;

  /** Wall-clock cost of one instruction. */
  readonly instructionDurationNs: number;

  private registers: Uint8Array = new Uint8Array(REGISTER_COUNT);
  private memory: Uint8Array = new Uint8Array(MEMORY_SIZE);
  private pc = PROGRAM_START_ADDRESS;
  private index = 0;

  private delayTimer = 0;
  private soundTimer = 0;
  private playingSound = false;

  private reachedEnd = false;

  /** Elapsed time not yet spent on instructions. */
  private debtNs = 0;

  private readonly stack = new Chip8Stack();
  private readonly screen = new Chip8Screen();
  private keypad = new Chip8Keypad();

  private readonly random: RandomSource;
  private onTrace: TraceCallback | null = null;

  constructor(options: Chip8Options = {}) {
    this.quirks = Object.freeze({ ...DEFAULT_QUIRKS, ...options.quirks });

    const ips = options.instructionsPerSecond ?? DEFAULT_INSTRUCTIONS_PER_SECOND;
    if (!Number.isFinite(ips) || ips <= 0) {
      throw new RangeError(`Instruction rate must be a positive number, got ${ips}`);
    }
    this.instructionDurationNs = Math.floor(NANOS_PER_SECOND / ips);
    this.random = options.random ?? Math.random;
  }

  // --- Memory access ---
  private read(address: number): number {
    if (address < 0 || address >= MEMORY_SIZE) {
      throw new MemoryAccessError(address);
    }
    return this.memory[address];
  }

  private write(address: number, value: number): void {
    if (address < 0 || address >= MEMORY_SIZE) {
      throw new MemoryAccessError(address);
    }
    this.memory[address] = value & 0xff;
  }

  /** Big-endian word at PC. */
  private fetch(): number {
    return (this.read(this.pc) << 8) | this.read(this.pc + 1);
  }

  // --- Execute single instruction ---
  /**
   * Fetch, advance PC by 2, then execute. The trace callback only hears
   * about instructions that executed.
   * Throws UnimplementedInstructionError with PC left on the offending word.
   */
  step(): void {
    const address = this.pc;
    const opcode = this.fetch();
    this.pc = (this.pc + 2) & 0xffff;

    if (!this.execute(decode(opcode))) {
      this.pc = address;
      throw new UnimplementedInstructionError(opcode, address);
    }

    if (this.onTrace) {
      this.onTrace({ address, opcode, mnemonic: disassemble(opcode) });
    }
  }

  /** Returns false when the word matches no instruction. */
  private execute(d: DecodedInstruction): boolean {
    const { group, x, y, n, nn, nnn } = d;
    const v = this.registers;

    switch (group) {
      case 0x0:
        switch (d.opcode) {
          case 0x0000: this.reachedEnd = true; return true;
          case 0x00e0: this.screen.clear(); return true;
          case 0x00ee: this.pc = this.stack.pop(); return true;
          default: return false;
        }

      case 0x1:
        this.pc = nnn;
        return true;

      case 0x2:
        this.stack.push(this.pc);
        this.pc = nnn;
        return true;

      case 0x3:
        if (v[x] === nn) this.skip();
        return true;

      case 0x4:
        if (v[x] !== nn) this.skip();
        return true;

      case 0x5:
        if (n !== 0) return false;
        if (v[x] === v[y]) this.skip();
        return true;

      case 0x6:
        v[x] = nn;
        return true;

      case 0x7:
        // No carry out of ADD Vx, byte
        v[x] = (v[x] + nn) & 0xff;
        return true;

      case 0x8:
        return this.executeAlu(x, y, n);

      case 0x9:
        if (n !== 0) return false;
        if (v[x] !== v[y]) this.skip();
        return true;

      case 0xa:
        this.index = nnn;
        return true;

      case 0xb:
        this.pc = nnn + v[0];
        return true;

      case 0xc:
        v[x] = Math.floor(this.random() * 256) & nn;
        return true;

      case 0xd:
        this.drawSprite(x, y, n);
        return true;

      case 0xe:
        if (nn === 0x9e) {
          if (this.keypad.isPressed(v[x])) this.skip();
          return true;
        }
        if (nn === 0xa1) {
          if (!this.keypad.isPressed(v[x])) this.skip();
          return true;
        }
        return false;

      case 0xf:
        return this.executeMisc(x, nn);

      default:
        return false;
    }
  }

  /**
   * 8XYN: register-register arithmetic and logic.
   * ADD/SUB/SUBN write VF after VX; the shifts write VF before shifting VX.
   */
  private executeAlu(x: number, y: number, n: number): boolean {
    const v = this.registers;

    switch (n) {
      case 0x0:
        v[x] = v[y];
        return true;
      case 0x1:
        v[x] |= v[y];
        return true;
      case 0x2:
        v[x] &= v[y];
        return true;
      case 0x3:
        v[x] ^= v[y];
        return true;
      case 0x4: {
        const sum = v[x] + v[y];
        v[x] = sum & 0xff;
        v[FLAG_REG] = sum > 0xff ? 1 : 0;
        return true;
      }
      case 0x5: {
        const vx = v[x];
        const vy = v[y];
        v[x] = (vx - vy) & 0xff;
        // VF = NOT borrow
        v[FLAG_REG] = vx < vy ? 0 : 1;
        return true;
      }
      case 0x6: {
        if (this.quirks.assignBeforeShift) v[x] = v[y];
        v[FLAG_REG] = v[x] & 0x01;
        v[x] >>= 1;
        return true;
      }
      case 0x7: {
        const vx = v[x];
        const vy = v[y];
        v[x] = (vy - vx) & 0xff;
        v[FLAG_REG] = vy < vx ? 0 : 1;
        return true;
      }
      case 0xe: {
        if (this.quirks.assignBeforeShift) v[x] = v[y];
        v[FLAG_REG] = (v[x] & 0x80) >> 7;
        v[x] = (v[x] << 1) & 0xff;
        return true;
      }
      default:
        return false;
    }
  }

  /** FXNN: timers, keypad wait, index register and bulk register transfer. */
  private executeMisc(x: number, nn: number): boolean {
    const v = this.registers;

    switch (nn) {
      case 0x07:
        v[x] = this.delayTimer;
        return true;

      case 0x0a: {
        const key = this.keypad.firstPressed();
        if (key === null) {
          // Re-run this instruction next step until a key is down
          this.pc -= 2;
        } else {
          v[x] = key;
        }
        return true;
      }

      case 0x15:
        this.delayTimer = v[x];
        return true;

      case 0x18:
        this.soundTimer = v[x];
        return true;

      case 0x1e:
        this.index = (this.index + v[x]) & 0xffff;
        if (this.quirks.setFlagOnIndexOverflow && this.index >= MEMORY_SIZE) {
          v[FLAG_REG] = 1;
        }
        return true;

      case 0x29:
        this.index = FONT_START_ADDRESS + (v[x] & 0xf) * FONT_GLYPH_HEIGHT;
        return true;

      case 0x33: {
        const value = v[x];
        this.write(this.index, Math.floor(value / 100));
        this.write(this.index + 1, Math.floor(value / 10) % 10);
        this.write(this.index + 2, value % 10);
        return true;
      }

      case 0x55:
        for (let i = 0; i <= x; i++) {
          this.write(this.index + i, v[i]);
        }
        if (this.quirks.modifyIndexOnDumpOrLoad) {
          this.index = (this.index + x + 1) & 0xffff;
        }
        return true;

      case 0x65:
        for (let i = 0; i <= x; i++) {
          v[i] = this.read(this.index + i);
        }
        if (this.quirks.modifyIndexOnDumpOrLoad) {
          this.index = (this.index + x + 1) & 0xffff;
        }
        return true;

      default:
        return false;
    }
  }

  private skip(): void {
    this.pc = (this.pc + 2) & 0xffff;
  }

  private drawSprite(x: number, y: number, height: number): void {
    const rows: number[] = [];
    for (let i = 0; i < height; i++) {
      rows.push(this.read(this.index + i));
    }
    // VF is only ever raised here, never cleared
    if (this.screen.drawSprite(this.registers[x], this.registers[y], rows)) {
      this.registers[FLAG_REG] = 1;
    }
  }

  // --- Frame timing ---
  private tickTimers(): void {
    if (this.delayTimer > 0) {
      this.delayTimer--;
    }

    if (this.soundTimer <= 1) {
      this.soundTimer = 0;
      this.playingSound = false;
    } else {
      this.soundTimer--;
      this.playingSound = true;
    }
  }

  /**
   * Advance one frame: tick timers once, then execute instructions for
   * `elapsedMs` of wall-clock time. Returns the number of instructions run.
   *
   * Errors propagate immediately; the frame's timer tick stays applied.
   * Reaching the end-of-program word does not stop the frame; callers check
   * hasReachedEnd() and decide for themselves.
   */
  runFrame(elapsedMs: number): number {
    if (!Number.isFinite(elapsedMs) || elapsedMs < 0) {
      throw new RangeError(`Frame duration must be a non-negative number, got ${elapsedMs}`);
    }

    this.tickTimers();
    this.debtNs += Math.round(elapsedMs * NANOS_PER_MILLI);

    let executed = 0;
    while (this.debtNs >= this.instructionDurationNs) {
      this.step();
      this.debtNs -= this.instructionDurationNs;
      executed++;
    }
    return executed;
  }

  // --- Loading / injection ---
  /** Copy bytes verbatim into memory. Nothing is written if any byte would fall outside. */
  loadBytes(bytes: ArrayLike<number>, address: number): void {
    if (address < 0) {
      throw new MemoryAccessError(address);
    }
    if (address + bytes.length > MEMORY_SIZE) {
      throw new MemoryAccessError(Math.max(address, MEMORY_SIZE));
    }
    for (let i = 0; i < bytes.length; i++) {
      this.memory[address + i] = bytes[i] & 0xff;
    }
  }

  loadOpcode(opcode: number, address: number): void {
    this.loadBytes([(opcode >> 8) & 0xff, opcode & 0xff], address);
  }

  loadOpcodes(opcodes: readonly number[], address: number): void {
    opcodes.forEach((opcode, i) => this.loadOpcode(opcode, address + i * 2));
  }

  /** Install 16 × 5-byte glyphs at the font base address. */
  loadFont(font: ArrayLike<number>): void {
    if (font.length !== FONT_SIZE) {
      throw new Chip8Error(`Font must be ${FONT_SIZE} bytes, got ${font.length}`);
    }
    this.loadBytes(font, FONT_START_ADDRESS);
  }

  /** Replace the keypad snapshot read by EX9E, EXA1 and FX0A. */
  loadKeypad(keypad: Chip8Keypad): void {
    this.keypad = keypad;
  }

  setRegister(id: number, value: number): void {
    if (!Number.isInteger(id) || id < 0 || id >= REGISTER_COUNT) {
      throw new RangeError(`Register id out of range: ${id}`);
    }
    this.registers[id] = value & 0xff;
  }

  setRegisters(values: readonly number[]): void {
    if (values.length !== REGISTER_COUNT) {
      throw new RangeError(`Expected ${REGISTER_COUNT} register values, got ${values.length}`);
    }
    values.forEach((value, id) => {
      this.registers[id] = value & 0xff;
    });
  }

  setIndex(address: number): void {
    this.index = address & 0xffff;
  }

  /** Zero all 4K of memory, font included. */
  clearMemory(): void {
    this.memory.fill(0);
  }

  setTraceCallback(cb: TraceCallback | null): void {
    this.onTrace = cb;
  }

  /**
   * Back to power-on state with memory left intact: registers, index,
   * timers, stack, screen, keypad and timing debt cleared, PC at $200.
   */
  reset(): void {
    this.registers.fill(0);
    this.pc = PROGRAM_START_ADDRESS;
    this.index = 0;
    this.delayTimer = 0;
    this.soundTimer = 0;
    this.playingSound = false;
    this.reachedEnd = false;
    this.debtNs = 0;
    this.stack.reset();
    this.screen.reset();
    this.keypad = new Chip8Keypad();
  }

  // --- Accessors ---
  getRegister(id: number): number {
    return this.registers[id & 0xf];
  }

  getIndex(): number {
    return this.index;
  }

  getPC(): number {
    return this.pc;
  }

  getDelayTimer(): number {
    return this.delayTimer;
  }

  getSoundTimer(): number {
    return this.soundTimer;
  }

  isPlayingSound(): boolean {
    return this.playingSound;
  }

  hasReachedEnd(): boolean {
    return this.reachedEnd;
  }

  getStackDepth(): number {
    return this.stack.depth;
  }

  readMemory(address: number): number {
    return this.read(address);
  }

  getFrameBuffer(): FrameBuffer {
    return this.screen.getFrameBuffer();
  }

  getScreenText(on?: string, off?: string): string {
    return this.screen.toText(on, off);
  }

  getState(): Chip8State {
    return {
      registers: Array.from(this.registers),
      index: this.index,
      pc: this.pc,
      delayTimer: this.delayTimer,
      soundTimer: this.soundTimer,
      playingSound: this.playingSound,
      stackDepth: this.stack.depth,
      reachedEnd: this.reachedEnd,
    };
  }

  /** Register dump for debugging. */
  formatDebugInfo(): string {
    const lines = [
      `PC: ${hex(this.pc, 4)}  I: ${hex(this.index, 4)}  SP: ${this.stack.depth}`,
      `DT: ${this.delayTimer}  ST: ${this.soundTimer}`,
    ];
    this.registers.forEach((value, id) => {
      lines.push(`V${id.toString(16).toUpperCase()}: ${hex(value, 2)} = ${String(value).padStart(3)}`);
    });
    return lines.join('\n');
  }
}
