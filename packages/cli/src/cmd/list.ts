import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse } from '@reqchain/core';
import type { CommandModule } from 'yargs';
import { formatRequestLine } from '../format';

export interface ListOptions {
  file: string;
  json?: boolean;
}

export const listCommand: CommandModule<object, ListOptions> = {
  command: 'list <file>',
  describe: 'List the requests in a .http file',
  builder: {
    file: {
      type: 'string',
      describe: 'Path to .http file',
      demandOption: true
    },
    json: {
      type: 'boolean',
      describe: 'Output requests as JSON',
      default: false
    }
  },
  handler: async (argv) => {
    process.exitCode = await listFile(argv);
  }
};

export async function listFile(argv: ListOptions): Promise<number> {
  const filePath = resolve(process.cwd(), argv.file);
  if (!existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    return 1;
  }

  const document = parse(await readFile(filePath, 'utf8'));

  if (argv.json) {
    console.log(JSON.stringify(document, null, 2));
    return 0;
  }

  if (document.requests.length === 0) {
    console.log('No requests found');
    return 0;
  }

  document.requests.forEach((request, index) => {
    console.log(formatRequestLine(index, request));
  });
  return 0;
}
