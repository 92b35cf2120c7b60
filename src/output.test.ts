import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OutputWriteError } from './errors';
import { FileSink, MemorySink, writeTo, type OutputSink } from './output';

describe('writeTo', () => {
  it('passes chunks through to the sink', () => {
    let sink = new MemorySink();
    writeTo(sink, 'P3\n');
    writeTo(sink, '1 1\n');

    expect(sink.toString()).toBe('P3\n1 1\n');
  });

  it('turns sink failures into OutputWriteError', () => {
    let failure = new Error('disk full');
    let sink: OutputSink = {
      write() {
        throw failure;
      }
    };

    let caught: unknown = null;
    try {
      writeTo(sink, 'P3\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OutputWriteError);
    expect(caught).toMatchObject({ message: 'Failed to write to PPM output: disk full', cause: failure });
  });
});

describe('FileSink', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ppm-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes chunks to the file', () => {
    let path = join(dir, 'out.ppm');
    let sink = new FileSink(path);
    sink.write('P3\n');
    sink.write('1 1\n255\n');
    sink.close();

    expect(readFileSync(path, 'utf8')).toBe('P3\n1 1\n255\n');
  });

  it('refuses writes after close', () => {
    let sink = new FileSink(join(dir, 'closed.ppm'));
    sink.close();

    expect(() => writeTo(sink, 'P3\n')).toThrow(OutputWriteError);
  });
});
