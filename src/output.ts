import { closeSync, openSync, writeSync } from 'fs';
import { OutputWriteError } from './errors';

// where the encoded image goes; the tracer never opens files itself
export interface OutputSink {
  write(chunk: string): void;
}

export function writeTo(sink: OutputSink, chunk: string): void {
  try {
    sink.write(chunk);
  } catch (error) {
    throw new OutputWriteError(error);
  }
}

export class MemorySink implements OutputSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export class FileSink implements OutputSink {
  private fd: number | null;

  constructor(public readonly path: string) {
    this.fd = openSync(path, 'w');
  }

  write(chunk: string): void {
    if (this.fd === null) throw new Error(`${this.path} is already closed`);
    writeSync(this.fd, chunk);
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
