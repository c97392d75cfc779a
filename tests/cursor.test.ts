import { describe, it, expect } from 'vitest';
import { Cursor, digitValue, isDigit } from '../src/cursor';
import { PlayError } from '../src/errors';
import { capturePlayError } from './helpers';

describe('Cursor', () => {
  it('should upper-case the current character', () => {
    const cursor = new Cursor('c');
    expect(cursor.current()).toBe('C');
    expect(cursor.index).toBe(0);
  });

  it('should advance and read', () => {
    const cursor = new Cursor('o4');
    expect(cursor.advance()).toBe('4');
    expect(cursor.index).toBe(1);
  });

  it('should fail when advancing past the end', () => {
    const cursor = new Cursor('O');
    const error = capturePlayError(() => cursor.advance());
    expect(error.code).toBe('UNEXPECTED_END_OF_INPUT');
    expect(error.index).toBe(1);
    expect(error.character).toBeUndefined();
  });

  it('should fail reading an empty text', () => {
    expect(() => new Cursor('').current()).toThrow(PlayError);
  });

  it('should peek without moving', () => {
    const cursor = new Cursor('a#');
    expect(cursor.peekNext()).toBe('#');
    expect(cursor.index).toBe(0);
    expect(cursor.current()).toBe('A');
  });

  it('should peek undefined at the end', () => {
    const cursor = new Cursor('C');
    expect(cursor.peekNext()).toBeUndefined();
  });

  it('should commit a peeked character with skip', () => {
    const cursor = new Cursor('l8');
    cursor.skip();
    expect(cursor.index).toBe(1);
    expect(cursor.current()).toBe('8');
    cursor.skip();
    expect(cursor.done).toBe(true);
  });

  it('should report raw characters for errors', () => {
    const cursor = new Cursor('mx');
    cursor.advance();
    const error = cursor.error('UNEXPECTED_CHARACTER');
    expect(error.index).toBe(1);
    expect(error.character).toBe('x');
    expect(error.message).toBe("Invalid token at 1: 'x'. Unexpected character.");
  });
});

describe('digit helpers', () => {
  it('should recognize digits', () => {
    expect(isDigit('0')).toBe(true);
    expect(isDigit('9')).toBe(true);
    expect(isDigit('A')).toBe(false);
    expect(isDigit('.')).toBe(false);
    expect(isDigit(undefined)).toBe(false);
  });

  it('should convert digits to values', () => {
    expect(digitValue('0')).toBe(0);
    expect(digitValue('7')).toBe(7);
    expect(digitValue('#')).toBeUndefined();
    expect(digitValue(undefined)).toBeUndefined();
  });
});
