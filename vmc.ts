/**
 * vmc: bytecode VM command-line driver
 *
 * Usage:
 *   npm run vmc -- [options] [program]
 *   # bundles this file with esbuild into dist/vmc.mjs, then runs it with node
 *
 * Programs: arithmetic, factorial, fibonacci, nested, all (default)
 *
 * Options:
 *   -d, --debug        Trace every instruction with a stack dump
 *   -f, --file <path>  Assemble and run an assembly file
 *   --no-disasm        Skip the disassembly listing
 *   -h, --help         Show usage
 */
import { readFileSync } from 'fs';
import { runCli } from './src/cli/driver';
import { StdinInput } from './src/cli/stdin';

process.exitCode = runCli(process.argv.slice(2), {
  out: bytes => process.stdout.write(bytes),
  log: line => console.log(line),
  error: line => console.error(line),
  input: new StdinInput(),
  readFile: path => readFileSync(path, 'utf-8'),
});
