import type { RenderSink } from './types.js';

/**
 * RenderSink collecting everything written into a single string
 */
export class StringSink implements RenderSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
