/**
 * Named demonstration programs. The assembly sources live in samples/
 * at the project root.
 */
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export interface SampleProgram {
  name: string;
  title: string;
  description: string;
  file: string;
}

// Order is the order `all` runs them in
export const SAMPLES: readonly SampleProgram[] = [
  { name: 'arithmetic', title: 'Arithmetic Demo', description: 'Arithmetic operations demo', file: 'arithmetic.asm' },
  { name: 'factorial', title: 'Recursive Factorial', description: 'Recursive factorial (10!)', file: 'factorial.asm' },
  { name: 'fibonacci', title: 'Fibonacci Sequence', description: 'Fibonacci sequence (first 15 numbers)', file: 'fibonacci.asm' },
  { name: 'nested', title: 'Nested Function Calls', description: 'Nested function call demo', file: 'nested.asm' },
];

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const SAMPLES_DIR = join(__dirname, '../samples');

export function findSample(name: string): SampleProgram | null {
  return SAMPLES.find(s => s.name === name) ?? null;
}

export function loadSampleSource(sample: SampleProgram, dir: string = SAMPLES_DIR): string {
  return readFileSync(join(dir, sample.file), 'utf-8');
}
