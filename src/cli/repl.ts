/**
 * treecqp REPL
 *
 * Translates one query per line and prints the CQP. :q quits.
 *
 * Commands:
 *   :q                        quit
 *   :translator <name|auto>   fix the translator, or guess it for every line (default)
 *   :span <name|off>          structural attribute for anchors
 */

import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { IdentifierAllocator } from '../ir/identifier.ts';
import { translate } from '../compiler/translate.ts';
import type { TranslatorRegistry } from '../frontends/registry.ts';
import { describeFailure, formatPlan } from './output.ts';

export async function startRepl(registry: TranslatorRegistry): Promise<void> {
  let translator: string | undefined = undefined;
  let span: string | undefined = undefined;

  const rl = readline.createInterface({ input, output, prompt: 'treecqp> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    if (text.startsWith(':translator ')) {
      const name = text.slice(12).trim();
      if (name === 'auto') translator = undefined;
      else if (registry.has(name)) translator = name;
      else console.log(`usage: :translator auto|${registry.names().join('|')}`);
      console.log(`translator = ${translator ?? 'auto'}`);
      rl.prompt();
      continue;
    }
    if (text.startsWith(':span ')) {
      const v = text.slice(6).trim();
      span = v === 'off' || v === '' ? undefined : v;
      console.log(`span = ${span ?? '(unset)'}`);
      rl.prompt();
      continue;
    }

    try {
      const allocator = new IdentifierAllocator();
      const result = registry.translate(text, allocator, translator);
      console.log(`[${result.translator}]`);
      console.log(formatPlan(translate(result.recipe, allocator, { span })));
    } catch (err) {
      const lines = describeFailure(err);
      if (!lines) throw err;
      for (const l of lines) console.error(l);
    }

    rl.prompt();
  }

  rl.close();
}
