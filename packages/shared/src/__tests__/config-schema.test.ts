import { describe, it, expect } from 'vitest';
import { RelayConfigSchema, RELAY_CONFIG_DEFAULTS } from '../config-schema.js';

describe('RelayConfigSchema', () => {
  it('parses empty input with defaults filled', () => {
    expect(RelayConfigSchema.parse({})).toEqual({
      collection: 'Messages',
      roomCode: null,
      roomCodeAlphabet: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
      roomCodeLength: 4,
      verboseLogging: false,
      tickIntervalMs: 100,
    });
  });

  it('exposes the same defaults as a constant', () => {
    expect(RELAY_CONFIG_DEFAULTS).toEqual(RelayConfigSchema.parse({}));
  });

  it('trims a fixed room code', () => {
    expect(RelayConfigSchema.parse({ roomCode: '  abcd ' }).roomCode).toBe('abcd');
  });

  it('rejects a blank room code', () => {
    expect(() => RelayConfigSchema.parse({ roomCode: '   ' })).toThrow();
  });

  it('rejects an empty collection name', () => {
    expect(() => RelayConfigSchema.parse({ collection: '' })).toThrow();
  });

  it('accepts a zero tick interval', () => {
    expect(RelayConfigSchema.parse({ tickIntervalMs: 0 }).tickIntervalMs).toBe(0);
  });

  it('rejects a negative tick interval', () => {
    expect(() => RelayConfigSchema.parse({ tickIntervalMs: -1 })).toThrow();
  });

  it('rejects a room code length of zero', () => {
    expect(() => RelayConfigSchema.parse({ roomCodeLength: 0 })).toThrow();
  });

  it('rejects an unknown log level', () => {
    expect(() => RelayConfigSchema.parse({ logLevel: 'loud' })).toThrow();
  });

  it('keeps an explicit log level', () => {
    expect(RelayConfigSchema.parse({ logLevel: 'warn' }).logLevel).toBe('warn');
  });
});
