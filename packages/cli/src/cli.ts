import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { listCommand } from './cmd/list';
import { runCommand } from './cmd/run';
import { VERSION } from './version';

export async function cli(args: string[]): Promise<void> {
  await yargs(hideBin(['node', 'cli', ...args]))
    .scriptName('reqchain')
    .usage('$0 <command> [options]')
    .command(listCommand)
    .command(runCommand)
    .demandCommand(1, 'You need to specify a command')
    .strict()
    .help()
    .version(VERSION)
    .parseAsync();
}
