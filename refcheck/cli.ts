/**
 * refcheck: CLI entry point.
 *
 * Run via: npm run check-links -- [paths...] [options]
 */

import 'dotenv/config';
import { parseCliArgs } from './lib/cli.ts';
import { BOOLEAN_FLAGS, getHelp, runCheckLinks } from './commands/check-links.ts';

async function main(): Promise<void> {
  const opts = parseCliArgs(process.argv.slice(2), BOOLEAN_FLAGS);

  if (opts.help === true) {
    console.log(getHelp());
    return;
  }

  const result = await runCheckLinks(opts._positional, opts);
  if (result.output) console.log(result.output);
  process.exit(result.exitCode);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
