import type { TextSink } from './types.js';

/**
 * Accumulates generated text in memory.
 */
export class StringSink implements TextSink {
  private chunks: string[] = [];
  private isDiscarded = false;

  write(text: string): void {
    if (this.isDiscarded) return;
    this.chunks.push(text);
  }

  discard(): void {
    this.chunks = [];
    this.isDiscarded = true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  get discarded(): boolean {
    return this.isDiscarded;
  }
}
