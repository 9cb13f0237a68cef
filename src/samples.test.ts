import { describe, it, expect } from 'vitest';
import { SAMPLES, findSample, loadSampleSource } from './samples';
import { assemble, formatAssemblyError } from './core/assembler/compiler';
import { VirtualMachine } from './core/vm';
import { BufferOutput, BufferDiagnostics } from './core/io';
import { VmStatus } from './core/types';

const EXPECTED_OUTPUT: Record<string, string> = {
  arithmetic: [
    '=== Arithmetic Demo ===',
    '10 + 25 = 35',
    '100 - 37 = 63',
    '7 * 8 = 56',
    '99 / 9 = 11',
    '17 % 5 = 2',
    '5 < 10 = 1',
    '5 > 10 = 0',
    '=== Done ===',
    '',
  ].join('\n'),
  factorial: 'Calculating 10! (factorial)...\n3628800\nDone!\n',
  fibonacci: 'Fibonacci sequence:\n'
    + [0, 1, 1, 2, 3, 5, 8, 13, 21, 34, 55, 89, 144, 233, 377].map(n => `${n}\n`).join('')
    + 'Done!\n',
  nested: [
    'Testing nested calls...',
    'outer called with: 5',
    '  inner called with: 5',
    '  inner returning: 10',
    'Final result: 15',
    '',
  ].join('\n'),
};

describe('sample programs', () => {
  it('lists the programs in run order', () => {
    expect(SAMPLES.map(s => s.name)).toEqual(['arithmetic', 'factorial', 'fibonacci', 'nested']);
  });

  it.each(SAMPLES)('$name assembles, runs and prints the expected text', (sample) => {
    const assembled = assemble(loadSampleSource(sample));
    if (!assembled.ok) throw new Error(formatAssemblyError(assembled.error));

    const output = new BufferOutput();
    const diagnostics = new BufferDiagnostics();
    const result = new VirtualMachine(assembled.code, { output, diagnostics }).run();

    expect(result.status).toBe(VmStatus.HALTED);
    expect(result.stack).toEqual([]);
    expect(output.text).toBe(EXPECTED_OUTPUT[sample.name]);
    expect(diagnostics.errors).toEqual([]);
  });

  it('finds samples by name', () => {
    expect(findSample('nested')?.title).toBe('Nested Function Calls');
    expect(findSample('nope')).toBeNull();
  });
});
