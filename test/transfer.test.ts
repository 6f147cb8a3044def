import { describe, it, expect } from 'vitest';
import type { ContentWriter } from '../src/content/types.js';
import {
  TransferEngine,
  classifyFault,
  type TransferSource,
} from '../src/transfer/TransferEngine.js';
import {
  ContentError,
  ContentErrorType,
  IOError,
  ObjectDisposedError,
  createCanceledError,
  createCapacityExceededError,
  createTransferFailedError,
  isContentError,
} from '../src/utils/errors.js';
import { RecordingSink, ScriptedWriter, bytes, utf8 } from './fixtures.js';

function source(writer: ContentWriter, buffered: Uint8Array | null = null, isDisposed = false): TransferSource {
  return { writer, isDisposed, getBufferedContent: () => buffered };
}

function errorWithCode(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe('classifyFault', () => {
  it('reports cancellation ahead of the fault itself', () => {
    const controller = new AbortController();
    controller.abort();
    const io = new IOError('socket closed');

    const result = classifyFault(io, controller.signal);

    expect(isContentError(result, ContentErrorType.CANCELED)).toBe(true);
    expect(result).toHaveProperty('cause', io);
  });

  it('turns an AbortError into CANCELED', () => {
    const abort = Object.assign(new Error('aborted'), { name: 'AbortError' });

    expect(isContentError(classifyFault(abort), ContentErrorType.CANCELED)).toBe(true);
  });

  it('passes an existing CANCELED error through', () => {
    const canceled = createCanceledError();

    expect(classifyFault(canceled)).toBe(canceled);
  });

  it('wraps I/O faults', () => {
    const io = new IOError('disk full');

    const result = classifyFault(io);

    expect(isContentError(result, ContentErrorType.TRANSFER_FAILED)).toBe(true);
    expect(result).toHaveProperty('message', 'Error while copying content to a stream.');
    expect(result).toHaveProperty('cause', io);
  });

  it('wraps socket error codes and errno faults', () => {
    expect(isContentError(classifyFault(errorWithCode('EPIPE')), ContentErrorType.TRANSFER_FAILED)).toBe(true);

    const errno = Object.assign(new Error('write failed'), { syscall: 'write' });
    expect(isContentError(classifyFault(errno), ContentErrorType.TRANSFER_FAILED)).toBe(true);
  });

  it('wraps use-after-release faults', () => {
    expect(
      isContentError(classifyFault(new ObjectDisposedError('Socket')), ContentErrorType.TRANSFER_FAILED)
    ).toBe(true);
    expect(
      isContentError(classifyFault(errorWithCode('ERR_STREAM_DESTROYED')), ContentErrorType.TRANSFER_FAILED)
    ).toBe(true);
  });

  it('does not wrap twice', () => {
    const failed = createTransferFailedError(new IOError('reset'));

    expect(classifyFault(failed)).toBe(failed);
  });

  it('leaves other errors untouched', () => {
    const plain = new Error('writer bug');
    const capacity = createCapacityExceededError(10);

    expect(classifyFault(plain)).toBe(plain);
    expect(classifyFault(capacity)).toBe(capacity);
  });
});

describe('TransferEngine', () => {
  const engine = new TransferEngine();

  it('writes buffered content in one call', () => {
    const writer = new ScriptedWriter({ chunks: [utf8('unused')] });
    const sink = new RecordingSink();

    engine.copyTo(source(writer, utf8('buffered')), sink);

    expect(sink.chunks).toHaveLength(1);
    expect(sink.text()).toBe('buffered');
    expect(writer.writeCalls).toBe(0);
  });

  it('lets the writer write straight into the sink', () => {
    const writer = new ScriptedWriter({ chunks: [utf8('ab'), utf8('cd')] });
    const sink = new RecordingSink();

    engine.copyTo(source(writer), sink);

    expect(sink.chunks).toEqual([utf8('ab'), utf8('cd')]);
  });

  it('copies asynchronously', async () => {
    const writer = new ScriptedWriter({ chunks: [utf8('ab'), utf8('cd')], sync: false });
    const sink = new RecordingSink();

    await engine.copyToAsync(source(writer), sink);

    expect(sink.text()).toBe('abcd');
  });

  it('refuses a disposed source without wrapping', () => {
    const writer = new ScriptedWriter({ chunks: [bytes(1)] });

    expect(() => engine.copyTo(source(writer, null, true), new RecordingSink())).toThrow(
      'Cannot access a disposed object: ContentBody'
    );
    expect(writer.writeCalls).toBe(0);
  });

  it('wraps a sink I/O failure', () => {
    const writer = new ScriptedWriter({ chunks: [bytes(1), bytes(2)] });
    const sink = new RecordingSink({ afterWrites: 1, error: new IOError('peer gone') });

    let caught: unknown;
    try {
      engine.copyTo(source(writer), sink);
    } catch (error) {
      caught = error;
    }

    expect(isContentError(caught, ContentErrorType.TRANSFER_FAILED)).toBe(true);
    expect(sink.chunks).toEqual([bytes(1)]);
  });

  it('requires a synchronous path for copyTo', () => {
    const writer = new ScriptedWriter({ chunks: [bytes(1)], sync: false });

    expect(() => engine.copyTo(source(writer), new RecordingSink())).toThrow(
      'The content does not support synchronous serialization; use the asynchronous methods.'
    );
  });

  it('reports CANCELED when aborted mid-copy', async () => {
    const controller = new AbortController();
    const writer = new ScriptedWriter({
      chunks: [bytes(1), bytes(2), bytes(3)],
      sync: false,
      onChunk: (index) => {
        if (index === 1) controller.abort();
      },
    });
    const sink = new RecordingSink();

    const failure = engine.copyToAsync(source(writer), sink, controller.signal);

    await expect(failure).rejects.toBeInstanceOf(ContentError);
    await expect(failure).rejects.toMatchObject({ type: ContentErrorType.CANCELED });
    expect(sink.chunks).toEqual([bytes(1)]);
  });

  it('passes through a writer bug', async () => {
    const writer = new ScriptedWriter({
      chunks: [bytes(1)],
      sync: false,
      failure: { atChunk: 0, error: new Error('writer bug') },
    });

    await expect(engine.copyToAsync(source(writer), new RecordingSink())).rejects.toThrow('writer bug');
  });
});
