import { afterEach, describe, it, expect, vi } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { PinoSink } from '../logging/pino-sink.js';
import { LogLevel } from '../logging/types.js';

const passThrough = () => (text: string) => text;

function captureDestinations() {
  const realDestination = pino.destination;
  const streams: ReturnType<typeof pino.destination>[] = [];
  vi.spyOn(pino, 'destination').mockImplementation((options) => {
    const stream = realDestination(options);
    streams.push(stream);
    return stream;
  });
  return streams;
}

describe('PinoSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ends the log file stream on close', () => {
    const streams = captureDestinations();
    const sink = new PinoSink({ file: join(tmpdir(), 'trello-mcp-tests', `sink-${process.pid}.log`) }, passThrough);
    const end = vi.spyOn(streams[0], 'end');

    sink.close();

    expect(end).toHaveBeenCalledTimes(1);
  });

  it('leaves stderr open on close', () => {
    const streams = captureDestinations();
    const sink = new PinoSink('stderr', passThrough);
    const end = vi.spyOn(streams[0], 'end');

    sink.close();

    expect(end).not.toHaveBeenCalled();
  });

  it('does not throw when an entry cannot be serialized', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const sink = new PinoSink('stderr', passThrough);

    expect(() =>
      sink.log({ level: LogLevel.ERROR, message: 'Tool call failed', data: { size: BigInt(1) } })
    ).not.toThrow();
    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError.mock.calls[0][0]).toBe('[PinoSink] Failed to write log:');
  });
});
