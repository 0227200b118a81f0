// Tests for the deferred log buffer and scoped loggers

import { describe, it, expect, vi } from 'vitest';
import { DeferredLogBuffer } from './deferred-buffer.js';
import { createCapturingHandler } from './handlers.js';
import { Logger, errorData } from './logger.js';
import type { LogEntry } from './types.js';

describe('DeferredLogBuffer', () => {
  it('should queue entries until a handler is attached', () => {
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');

    logger.info('first');
    logger.warn('second');

    expect(buffer.phase).toBe('buffering');
    expect(buffer.pending).toBe(2);
    expect(buffer.handler).toBeNull();
  });

  it('should drain queued entries in write order on attach', () => {
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');
    const handler = createCapturingHandler();

    logger.info('one');
    logger.error('two');
    logger.debug('three');
    buffer.attach(handler);

    expect(handler.entries.map((entry) => entry.message)).toEqual(['one', 'two', 'three']);
    expect(buffer.phase).toBe('draining');
    expect(buffer.pending).toBe(0);
  });

  it('should bypass the queue once attached', () => {
    const buffer = new DeferredLogBuffer();
    const handler = createCapturingHandler();
    buffer.attach(handler);

    new Logger(buffer, 'test').info('direct');

    expect(buffer.pending).toBe(0);
    expect(handler.entries).toHaveLength(1);
    expect(handler.entries[0].message).toBe('direct');
  });

  it('should keep order when the handler logs while draining', () => {
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');
    const messages: string[] = [];

    logger.info('a');
    logger.info('b');
    buffer.attach({
      log(entry: LogEntry) {
        messages.push(entry.message);
        if (entry.message === 'a') {
          logger.info('from handler');
        }
      },
    });

    expect(messages).toEqual(['a', 'b', 'from handler']);
  });

  it('should deliver the rest of the queue once when the handler throws', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');
    const messages: string[] = [];

    logger.info('a');
    logger.info('b');
    buffer.attach({
      log(entry: LogEntry) {
        if (entry.message === 'a') {
          throw new Error('sink unavailable');
        }
        messages.push(entry.message);
      },
    });
    const next = createCapturingHandler();
    buffer.attach(next);

    expect(messages).toEqual(['b']);
    expect(next.entries).toEqual([]);
    expect(buffer.pending).toBe(0);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toBe('Logging handler failed on [test] a');
    stderr.mockRestore();
  });

  it('should not throw to the writer when the handler throws', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const buffer = new DeferredLogBuffer();
    buffer.attach({
      log() {
        throw new Error('sink unavailable');
      },
    });

    expect(() => new Logger(buffer, 'test').error('lost')).not.toThrow();
    expect(stderr).toHaveBeenCalledTimes(1);
    stderr.mockRestore();
  });

  it('should swap the handler on a second attach without buffering', () => {
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');
    const first = createCapturingHandler();
    const second = createCapturingHandler();

    buffer.attach(first);
    logger.info('to first');
    buffer.attach(second);
    logger.info('to second');

    expect(first.entries.map((entry) => entry.message)).toEqual(['to first']);
    expect(second.entries.map((entry) => entry.message)).toEqual(['to second']);
  });

  it('should not evaluate producers of levels the handler ignores', () => {
    const buffer = new DeferredLogBuffer();
    const logger = new Logger(buffer, 'test');
    const handler = createCapturingHandler('info');
    const producer = vi.fn(() => 'expensive');

    logger.debug(producer);
    logger.info(() => 'cheap');
    buffer.attach(handler);

    expect(producer).not.toHaveBeenCalled();
    expect(handler.entries.map((entry) => entry.message)).toEqual(['cheap']);
  });

  it('should replace a throwing producer with a placeholder message', () => {
    const buffer = new DeferredLogBuffer();
    const handler = createCapturingHandler();
    buffer.attach(handler);

    new Logger(buffer, 'test').warn(() => {
      throw new Error('boom');
    });

    expect(handler.entries[0].message).toBe('<log message producer threw: boom>');
  });
});

describe('Logger', () => {
  it('should prefix child scopes', () => {
    const buffer = new DeferredLogBuffer();
    const handler = createCapturingHandler();
    buffer.attach(handler);

    new Logger(buffer, 'orchestrator').child('host').child('Core').trace('hello');

    expect(handler.entries[0].scope).toBe('orchestrator/host/Core');
    expect(handler.entries[0].level).toBe('trace');
  });

  it('should pass structured data through', () => {
    const buffer = new DeferredLogBuffer();
    const handler = createCapturingHandler();
    buffer.attach(handler);

    new Logger(buffer, 'test').error('failed', errorData(new TypeError('bad'), { path: '/tmp/a' }));

    expect(handler.at('error')[0].data).toEqual({ path: '/tmp/a', error: 'bad', errorName: 'TypeError' });
  });
});
