import { describe, it, expect } from 'vitest';
import { createUserId, startEvent, stopEvent } from './types.js';
import { IntegrityError } from './errors.js';

describe('createUserId', () => {
  it('should brand non-empty strings', () => {
    expect(createUserId('usr_1')).toBe('usr_1');
  });

  it('should throw for an empty string', () => {
    expect(() => createUserId('')).toThrow('UserId must be a non-empty string');
  });
});

describe('uptime events', () => {
  it('should build tagged start and stop events', () => {
    expect(startEvent(5)).toEqual({ tsMs: 5, kind: 'start' });
    expect(stopEvent(9)).toEqual({ tsMs: 9, kind: 'stop' });
  });
});

describe('IntegrityError', () => {
  it('should carry its code and name', () => {
    const error = new IntegrityError('unsortedTimestamps', 'out of order');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('IntegrityError');
    expect(error.code).toBe('unsortedTimestamps');
    expect(error.message).toBe('out of order');
  });
});
