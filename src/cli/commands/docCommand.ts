import { Command } from 'commander';
import { executeHandler } from '../types';

interface DocOptions {
  root?: boolean;
  width?: string;
}

export type CommandRunner = (commandKey: string, rawInput: unknown) => Promise<void>;

export function createDocCommand(run: CommandRunner = executeHandler): Command {
  return new Command('odindoc')
    .description('Print Go-doc style API documentation for an Odin package or symbol')
    .argument('[target]', 'Package directory, core:<pkg> reference, or <package>.<symbol>')
    .option('-r, --root', 'Show the resolved Odin root and whether its core library exists')
    .option('--width <n>', 'Wrap doc comments at this column (40-200)')
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  odindoc ./mypkg           document every public declaration in a directory',
        '  odindoc core:fmt          document a package from the core library',
        '  odindoc core:fmt.println  document one symbol',
        '',
        'Environment:',
        '  ODIN_ROOT                 Odin installation root (directory containing core/)',
        '  ODINDOC_WIDTH             default wrap column for doc comments',
        '  ODINDOC_LOG_LEVEL         debug|info|warn|error|silent (logs go to stderr)',
      ].join('\n')
    )
    .action(async (target: string | undefined, options: DocOptions, command: Command) => {
      if (options.root) {
        await run('root', {});
        return;
      }
      if (!target) {
        command.outputHelp();
        return;
      }
      await run('doc', { target, width: options.width });
    });
}

export const docCommand = createDocCommand();
