import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';

export function setupEnvCommand(program: Command): void {
  program
    .command('env')
    .description('Print the resolved MagicMirror environment settings')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      console.log(JSON.stringify({ configDir: ctx.paths.configDir, ...ctx.environment }, null, 2));
    }));
}
