/**
 * vmc driver: assemble, list and run sample programs or assembly files.
 * All console traffic goes through CliIo so the driver runs under test.
 */
import { assemble, formatAssemblyError } from '../core/assembler/compiler';
import { disassembleToText } from '../core/disassembler';
import { VirtualMachine } from '../core/vm';
import {
  STACK_SIZE, CALL_STACK_SIZE, LOCALS_SIZE, GLOBALS_SIZE, CODE_SIZE, OPCODE_COUNT,
} from '../core/constants';
import type { InputSource } from '../core/io';
import { SAMPLES, findSample, loadSampleSource } from '../samples';

export interface CliIo {
  /** Program output bytes, written as-is. */
  out: (bytes: Uint8Array) => void;
  log: (line: string) => void;
  error: (line: string) => void;
  input: InputSource;
  readFile: (path: string) => string;
}

export interface CliOptions {
  program: string;
  file: string | null;
  debug: boolean;
  disasm: boolean;
  help: boolean;
}

interface ProgramSource {
  title: string;
  source: string;
}

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';

export function parseArgs(args: string[]): { ok: true; options: CliOptions } | { ok: false; message: string } {
  const options: CliOptions = { program: 'all', file: null, debug: false, disasm: true, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-d':
      case '--debug':
        options.debug = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--no-disasm':
        options.disasm = false;
        break;
      case '-f':
      case '--file': {
        const path = args[i + 1];
        if (path === undefined || path.startsWith('-')) {
          return { ok: false, message: `${arg} requires a file path` };
        }
        options.file = path;
        i++;
        break;
      }
      default:
        if (arg.startsWith('-')) return { ok: false, message: `Unknown option: ${arg}` };
        options.program = arg;
    }
  }

  return { ok: true, options };
}

export function usage(program: string = 'vmc'): string[] {
  return [
    'Bytecode Virtual Machine',
    '========================',
    '',
    `Usage: ${program} [options] [program]`,
    '',
    'Programs:',
    ...SAMPLES.map(s => `  ${s.name.padEnd(11)} - ${s.description}`),
    `  ${'all'.padEnd(11)} - Run all demo programs`,
    '',
    'Options:',
    '  -d, --debug        Enable instruction tracing',
    '  -f, --file <path>  Assemble and run an assembly file',
    '      --no-disasm    Skip the disassembly listing',
    '  -h, --help         Show this help',
  ];
}

function banner(debug: boolean): string[] {
  return [
    'Bytecode Virtual Machine Interpreter',
    '====================================',
    `Stack size: ${STACK_SIZE} entries`,
    `Call stack: ${CALL_STACK_SIZE} frames`,
    `Locals per frame: ${LOCALS_SIZE}`,
    `Global variables: ${GLOBALS_SIZE}`,
    `Code buffer: ${CODE_SIZE} bytes`,
    `Total opcodes: ${OPCODE_COUNT}`,
    `Debug mode: ${debug ? 'ON' : 'OFF'}`,
  ];
}

/** Assemble, list and execute one program. False on assembly failure or a fault. */
export function runOne(program: ProgramSource, options: CliOptions, io: CliIo): boolean {
  io.log('');
  io.log('========================================');
  io.log(`Running: ${program.title}`);
  io.log('========================================');
  io.log('');

  const assembled = assemble(program.source);
  if (!assembled.ok) {
    io.error(`${RED}✗ ${program.title}: ${formatAssemblyError(assembled.error)}${RESET}`);
    io.error(`  ${assembled.error.text.trim()}`);
    io.error('Assembly failed!');
    return false;
  }
  io.log(`Assembly successful: ${assembled.size} bytes`);

  if (options.disasm) {
    io.log('');
    for (const line of disassembleToText(assembled.code)) io.log(line);
    io.log('');
  }

  io.log('=== Execution ===');
  const vm = new VirtualMachine(assembled.code, {
    trace: options.debug,
    output: { write: io.out },
    input: io.input,
    diagnostics: { log: io.log, error: io.error },
  });
  const result = vm.run();

  io.log('');
  io.log('=== Statistics ===');
  io.log(`Instructions executed: ${result.instructionCount}`);
  io.log(`Final stack pointer: ${result.stack.length}`);
  io.log('==================');

  if (result.fault) {
    io.error(`${RED}✗ ${program.title}: ${result.fault.message} at address ${result.fault.address}${RESET}`);
    return false;
  }
  return true;
}

function resolvePrograms(options: CliOptions, io: CliIo): ProgramSource[] | null {
  if (options.file !== null) {
    const path = options.file;
    try {
      return [{ title: path, source: io.readFile(path) }];
    } catch (err) {
      io.error(`Error: cannot read file '${path}': ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  if (options.program === 'all') {
    return SAMPLES.map(s => ({ title: s.title, source: loadSampleSource(s) }));
  }

  const sample = findSample(options.program);
  if (!sample) {
    io.error(`Unknown program: ${options.program}`);
    for (const line of usage()) io.error(line);
    return null;
  }
  return [{ title: sample.title, source: loadSampleSource(sample) }];
}

/** Returns the process exit code. */
export function runCli(args: string[], io: CliIo): number {
  const parsed = parseArgs(args);
  if (!parsed.ok) {
    io.error(parsed.message);
    for (const line of usage()) io.error(line);
    return 1;
  }
  const options = parsed.options;

  if (options.help) {
    for (const line of usage()) io.log(line);
    return 0;
  }

  const programs = resolvePrograms(options, io);
  if (!programs) return 1;

  for (const line of banner(options.debug)) io.log(line);

  let failures = 0;
  for (const program of programs) {
    if (!runOne(program, options, io)) failures++;
  }

  io.log('');
  if (failures > 0) {
    io.error(`${RED}✗ ${failures} of ${programs.length} program(s) failed${RESET}`);
    return 1;
  }
  io.log(`${GREEN}✓ All programs completed${RESET}`);
  return 0;
}
