import { describe, it, expect, beforeEach } from 'vitest';
import { Chip8Stack, STACK_DEPTH, StackOverflowError, StackUnderflowError } from '../index';

describe('Chip8Stack', () => {
  let stack: Chip8Stack;

  beforeEach(() => {
    stack = new Chip8Stack();
  });

  it('should start empty', () => {
    expect(stack.depth).toBe(0);
  });

  it('should pop addresses in reverse push order', () => {
    stack.push(0x202);
    stack.push(0x312);
    stack.push(0x4a0);
    expect(stack.depth).toBe(3);
    expect(stack.pop()).toBe(0x4a0);
    expect(stack.pop()).toBe(0x312);
    expect(stack.pop()).toBe(0x202);
    expect(stack.depth).toBe(0);
  });

  it('should hold 24 entries', () => {
    for (let i = 0; i < STACK_DEPTH; i++) {
      stack.push(0x200 + i * 2);
    }
    expect(stack.depth).toBe(24);
    expect(stack.pop()).toBe(0x200 + 23 * 2);
  });

  it('should refuse a 25th push and keep its contents', () => {
    for (let i = 0; i < STACK_DEPTH; i++) {
      stack.push(i);
    }
    expect(() => stack.push(0x999)).toThrow(StackOverflowError);
    expect(() => stack.push(0x999)).toThrow('Stack overflow: call depth exceeds 24');
    expect(stack.depth).toBe(24);
    expect(stack.pop()).toBe(23);
  });

  it('should refuse to pop when empty', () => {
    expect(() => stack.pop()).toThrow(StackUnderflowError);
    expect(stack.depth).toBe(0);
  });

  it('should empty on reset', () => {
    stack.push(0x300);
    stack.reset();
    expect(stack.depth).toBe(0);
    expect(() => stack.pop()).toThrow(StackUnderflowError);
  });
});
