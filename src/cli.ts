/**
 * CLI command dispatch. Returns the process exit code; errors from the
 * movers propagate to the caller.
 */

import { classifyFile } from './classification/index.js';
import { appConfig } from './config.js';
import { moveFiles } from './desktop/index.js';
import { organizeDrive } from './drive/index.js';

const USAGE = [
  'Usage:',
  '  doc-sorter classify <path>',
  '  doc-sorter desktop [--dry] [--base <dir>]',
  '  doc-sorter drive [--dry]',
].join('\n');

function optionValue(args: string[], flag: string): string | undefined {
  const inline = args.find((a) => a.startsWith(`${flag}=`));
  if (inline) return inline.slice(flag.length + 1);

  const index = args.indexOf(flag);
  if (index >= 0 && index + 1 < args.length) return args[index + 1];
  return undefined;
}

export async function run(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  const dryFlag = args.includes('--dry');

  switch (command) {
    case 'classify': {
      const target = args.find((a) => !a.startsWith('--'));
      if (!target) {
        console.error(USAGE);
        return 1;
      }
      console.log(await classifyFile(target));
      return 0;
    }

    case 'desktop': {
      const baseDir = optionValue(args, '--base') ?? appConfig.desktop.baseDir;
      const dryRun = dryFlag || appConfig.desktop.dryRun;
      console.log(`[desktop] Scanning base: ${baseDir} (dry_run=${dryRun})`);
      const records = await moveFiles({ baseDir, dryRun });
      console.log(`[desktop] ${dryRun ? 'Planned' : 'Moved'} ${records.length} file(s)`);
      return 0;
    }

    case 'drive': {
      const records = await organizeDrive({ dryRun: dryFlag });
      console.log(`[drive] ${dryFlag ? 'Planned' : 'Moved'} ${records.length} item(s)`);
      return 0;
    }

    default:
      console.error(USAGE);
      return 1;
  }
}
