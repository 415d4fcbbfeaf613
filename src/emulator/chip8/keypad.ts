/**
 * CHIP-8 hexadecimal keypad: 16 keys, 0-F
 *
 * Original COSMAC VIP layout:
 *   1 2 3 C
 *   4 5 6 D
 *   7 8 9 E
 *   A 0 B F
 *
 * Which host key drives which pad key is up to the embedder. The machine
 * receives a fresh snapshot every frame and only ever reads it: EX9E/EXA1
 * test a single key, FX0A takes the lowest-numbered key that is down.
 */

export const KEY_COUNT = 16;

export class Chip8Keypad {
  private keys: Uint8Array = new Uint8Array(KEY_COUNT);

  /** Build a snapshot from exactly 16 key states, index = key number. */
  static fromStates(states: readonly boolean[]): Chip8Keypad {
    if (states.length !== KEY_COUNT) {
      throw new Error(`Keypad snapshot must have ${KEY_COUNT} states, got ${states.length}`);
    }
    const keypad = new Chip8Keypad();
    states.forEach((down, key) => {
      if (down) keypad.set(key);
    });
    return keypad;
  }

  set(key: number): void {
    this.keys[key] = 1;
  }

  clear(key: number): void {
    this.keys[key] = 0;
  }

  isPressed(key: number): boolean {
    return this.keys[key] === 1;
  }

  /** Lowest key index currently down, or null if none. */
  firstPressed(): number | null {
    const key = this.keys.indexOf(1);
    return key === -1 ? null : key;
  }

  getStates(): boolean[] {
    return Array.from(this.keys, (k) => k === 1);
  }

  reset(): void {
    this.keys.fill(0);
  }
}
