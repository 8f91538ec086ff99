import { describe, it, expect } from 'vitest';
import { channelKey, channelsEqual, isSimpleChannel, parseChannel } from './channel';
import { InvalidChannelError } from './errors';

describe('parseChannel', () => {
  it('should accept every simple channel', () => {
    for (const name of ['blocks', 'mempool-blocks', 'live-2h-chart', 'stats']) {
      expect(parseChannel({ name })).toEqual({ name });
    }
  });

  it('should accept the mempool toggle channels without a parameter', () => {
    expect(parseChannel({ name: 'mempool-transactions' })).toEqual({ name: 'mempool-transactions' });
    expect(() => parseChannel({ name: 'mempool-txids', parameter: true })).toThrow(InvalidChannelError);
  });

  it('should trim address parameters', () => {
    expect(parseChannel({ name: 'address', parameter: '  bc1qtest  ' })).toEqual({
      name: 'address',
      parameter: 'bc1qtest',
    });
  });

  it('should accept rbf modes and mempool block indexes', () => {
    expect(parseChannel({ name: 'rbf', parameter: 'fullRbf' })).toEqual({ name: 'rbf', parameter: 'fullRbf' });
    expect(parseChannel({ name: 'mempool-block', parameter: 0 })).toEqual({ name: 'mempool-block', parameter: 0 });
  });

  it.each([
    ['an unknown name', { name: 'mempool' }],
    ['an empty address', { name: 'address', parameter: '   ' }],
    ['a missing address', { name: 'address' }],
    ['a negative block index', { name: 'mempool-block', parameter: -1 }],
    ['a fractional block index', { name: 'mempool-block', parameter: 1.5 }],
    ['an unknown rbf mode', { name: 'rbf', parameter: 'some' }],
    ['a parameter on a simple channel', { name: 'blocks', parameter: 'x' }],
    ['a non-object', 'blocks'],
  ])('should reject %s', (_label, input) => {
    expect(() => parseChannel(input)).toThrow(InvalidChannelError);
  });

  it('should carry the rejected input and code', () => {
    try {
      parseChannel({ name: 'address', parameter: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidChannelError);
      if (error instanceof InvalidChannelError) {
        expect(error.code).toBe('INVALID_CHANNEL');
        expect(error.input).toEqual({ name: 'address', parameter: '' });
        expect(error.message.startsWith('Invalid channel: ')).toBe(true);
      }
    }
  });
});

describe('channelKey', () => {
  it('should key simple channels by name', () => {
    expect(channelKey({ name: 'stats' })).toBe('stats');
    expect(channelKey({ name: 'unknown' })).toBe('unknown');
  });

  it('should include the parameter for parameterized channels', () => {
    expect(channelKey({ name: 'address', parameter: 'bc1qtest' })).toBe('address:bc1qtest');
    expect(channelKey({ name: 'mempool-block', parameter: 3 })).toBe('mempool-block:3');
  });

  it('should compare channels by key', () => {
    expect(channelsEqual({ name: 'rbf', parameter: 'all' }, { name: 'rbf', parameter: 'all' })).toBe(true);
    expect(channelsEqual({ name: 'rbf', parameter: 'all' }, { name: 'rbf', parameter: 'fullRbf' })).toBe(false);
  });

  it('should tell simple channels apart', () => {
    expect(isSimpleChannel({ name: 'blocks' })).toBe(true);
    expect(isSimpleChannel({ name: 'address', parameter: 'bc1qtest' })).toBe(false);
    expect(isSimpleChannel({ name: 'mempool-txids' })).toBe(false);
  });
});
