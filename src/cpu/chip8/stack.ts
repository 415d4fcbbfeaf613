/**
 * CHIP-8 return address stack.
 *
 * Only subroutine calls use it: 2NNN pushes the address of the following
 * instruction, 00EE pops it back into PC. 24 entries of 16 bits each.
 */

import { STACK_DEPTH, StackOverflowError, StackUnderflowError } from './types';

export class Chip8Stack {
  private entries: Uint16Array = new Uint16Array(STACK_DEPTH);
  private sp = 0;

  /** Number of return addresses currently held. */
  get depth(): number {
    return this.sp;
  }

  push(address: number): void {
    if (this.sp >= STACK_DEPTH) {
      throw new StackOverflowError();
    }
    this.entries[this.sp] = address;
    this.sp++;
  }

  pop(): number {
    if (this.sp <= 0) {
      throw new StackUnderflowError();
    }
    this.sp--;
    return this.entries[this.sp];
  }

  reset(): void {
    this.entries.fill(0);
    this.sp = 0;
  }
}
