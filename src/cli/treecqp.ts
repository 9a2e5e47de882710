/// <reference types="node" />
/**
 * treecqp CLI
 *
 * Translates dependency tree queries (grew, dep_search, deptreepy, CoNLL-U)
 * to CQP. Inputs come from --query, --file or STDIN.
 *
 * Usage:
 *   treecqp grew --query 'pattern { X -[nsubj]-> Y }'
 *   treecqp --file query.conllu --span s
 *   echo '_ <nsubj VERB' | treecqp depsearch
 *   treecqp repl
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { IdentifierAllocator } from '../ir/identifier.ts';
import { translate } from '../compiler/translate.ts';
import { createDefaultRegistry } from '../frontends/registry.ts';
import type { TranslatorRegistry } from '../frontends/registry.ts';
import { describeFailure, formatPlan } from './output.ts';

type Args = {
  cmd?: 'run' | 'repl';
  translator?: string;
  queries: string[];
  files: string[];
  output?: string;
  encoding: BufferEncoding;
  span?: string;
  list?: boolean;
};

function printHelp(registry: TranslatorRegistry): void {
  console.log(`treecqp CLI

Usage:
  treecqp [TRANSLATOR] [--query <q>... | --file <path>...] [options]
  treecqp repl

Translators:
  ${registry.names().join(', ')} (guessed for each input when omitted)

Options:
  --query, -q <q>          Query text (repeatable)
  --file, -f <path>        File containing one query (repeatable)
  --output, -o <path>      Write translations to a file instead of STDOUT
  --encoding, -e <enc>     Encoding of input and output files (default: utf8)
  --span <name>            Structural attribute anchors refer to, e.g. s
  --list                   List the translators and exit
  --help, -h               Show this message
`);
}

function nextValueOrExit(argv: string[], idxRef: { i: number }, flag: string, registry: TranslatorRegistry): string {
  idxRef.i++;
  const v = argv[idxRef.i];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  console.error(`Error: ${flag} requires a value`);
  printHelp(registry);
  process.exit(1);
}

function parseArgs(argv: string[], registry: TranslatorRegistry): Args {
  const args: Args = { queries: [], files: [], encoding: 'utf8' };
  const ref = { i: 1 };
  if (argv[2] === 'repl') {
    args.cmd = 'repl';
    return args;
  }
  while (++ref.i < argv.length) {
    const a = argv[ref.i];
    if (a === '--query' || a === '-q') args.queries.push(nextValueOrExit(argv, ref, '--query', registry));
    else if (a === '--file' || a === '-f') args.files.push(nextValueOrExit(argv, ref, '--file', registry));
    else if (a === '--output' || a === '-o') args.output = nextValueOrExit(argv, ref, '--output', registry);
    else if (a === '--encoding' || a === '-e') {
      const v = nextValueOrExit(argv, ref, '--encoding', registry);
      if (!Buffer.isEncoding(v)) {
        console.error(`Error: unknown encoding "${v}"`);
        process.exit(1);
      }
      args.encoding = v;
    } else if (a === '--span') args.span = nextValueOrExit(argv, ref, '--span', registry);
    else if (a === '--list') args.list = true;
    else if (a === '--help' || a === '-h') {
      printHelp(registry);
      process.exit(0);
    } else if (a !== undefined && !a.startsWith('-') && args.translator === undefined) {
      if (!registry.has(a)) {
        console.error(`Error: unknown translator "${a}" (expected one of ${registry.names().join(', ')})`);
        process.exit(1);
      }
      args.translator = a;
    } else {
      console.error(`Unknown option: ${a}`);
      printHelp(registry);
      process.exit(1);
    }
  }
  if (args.queries.length > 0 && args.files.length > 0) {
    console.error('Error: --query and --file cannot be combined');
    process.exit(1);
  }
  return args;
}

async function readStdin(): Promise<string> {
  return await new Promise<string>((resolve, reject) => {
    let buf = '';
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk) => {
      buf += chunk;
    });
    process.stdin.on('end', () => resolve(buf));
    process.stdin.on('error', reject);
  });
}

async function* readInputs(args: Args): AsyncGenerator<string> {
  if (args.queries.length > 0) {
    yield* args.queries;
    return;
  }
  if (args.files.length > 0) {
    for (const file of args.files) {
      try {
        yield await fs.readFile(path.resolve(file), { encoding: args.encoding });
      } catch (err) {
        console.error(`Could not read input file ${file}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return;
  }
  console.error('No input specified. Reading from STDIN instead.');
  yield await readStdin();
}

/** Translates every input; returns the number of successful translations. */
async function runOnce(args: Args, registry: TranslatorRegistry): Promise<number> {
  const results: string[] = [];
  for await (const input of readInputs(args)) {
    const allocator = new IdentifierAllocator();
    try {
      const { recipe } = registry.translate(input, allocator, args.translator);
      results.push(formatPlan(translate(recipe, allocator, { span: args.span })));
    } catch (err) {
      const lines = describeFailure(err);
      if (!lines) throw err;
      for (const line of lines) console.error(line);
    }
  }

  const text = results.map((r) => `${r}\n`).join('');
  if (args.output) await fs.writeFile(path.resolve(args.output), text, { encoding: args.encoding });
  else process.stdout.write(text);
  return results.length;
}

async function main() {
  const registry = createDefaultRegistry();
  const args = parseArgs(process.argv, registry);
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl(registry);
    return;
  }
  if (args.list) {
    for (const name of registry.names()) console.log(name);
    return;
  }
  const translated = await runOnce(args, registry);
  process.exitCode = translated > 0 ? 0 : 1;
}

main().catch((err) => {
  console.error('treecqp error:', err);
  process.exit(1);
});
