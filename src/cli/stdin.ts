import { readSync } from 'fs';
import { scanInt } from '../core/io';
import type { InputSource } from '../core/io';

/** Next chunk of input text, or null at end of input. */
export type ChunkReader = () => string | null;

const CHUNK_SIZE = 256;

/**
 * Blocking reads from file descriptor 0. A terminal hands back one line
 * per read. End of input and read errors both end the stream.
 */
export function readStdinChunk(): string | null {
  const buffer = Buffer.alloc(CHUNK_SIZE);
  for (;;) {
    try {
      const count = readSync(0, buffer, 0, CHUNK_SIZE, null);
      return count > 0 ? buffer.toString('utf-8', 0, count) : null;
    } catch (err) {
      // Non-blocking stdin has nothing yet; try again
      if (err instanceof Error && 'code' in err && err.code === 'EAGAIN') continue;
      console.error(`Warning: cannot read stdin (${err instanceof Error ? err.message : String(err)}); READ yields 0`);
      return null;
    }
  }
}

/**
 * READ source backed by standard input, scanf("%d") style. Input is
 * pulled only until the next token is complete, so an interactive
 * program continues as soon as a number and a newline are typed.
 */
export class StdinInput implements InputSource {
  private pending = '';
  private ended = false;

  constructor(private readonly readChunk: ChunkReader = readStdinChunk) {}

  readInt(): number | null {
    // A token is complete once whitespace follows it or the input ends
    while (!this.ended && !/\S\s/.test(this.pending)) {
      const chunk = this.readChunk();
      if (chunk === null) this.ended = true;
      else this.pending += chunk;
    }
    const scanned = scanInt(this.pending);
    if (!scanned) return null;
    this.pending = scanned.rest;
    return scanned.value;
  }
}
