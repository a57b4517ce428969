import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import {
  addExternalPackage,
  removeExternalPackages,
  type ExternalPackageFields
} from '../core/catalog/external-packages.js';

interface AddOptions {
  title?: string;
  author?: string;
  repo?: string;
  desc?: string;
}

export function setupExtPkgCommand(program: Command): void {
  const extPkg = program
    .command('ext-pkg')
    .description('Manage packages that are not listed in the catalog');

  extPkg
    .command('add')
    .description('Register an external package')
    .option('--title <title>', 'package title')
    .option('--author <author>', 'package author')
    .option('--repo <url>', 'git repository URL')
    .option('--desc <description>', 'package description')
    .action(withErrorHandling(async (options: AddOptions, command: Command) => {
      const ctx = await createCommandContext(command);
      const fields: ExternalPackageFields = {
        title: options.title,
        author: options.author,
        repository: options.repo,
        description: options.desc
      };
      await addExternalPackage(ctx, fields);
    }));

  extPkg
    .command('remove')
    .argument('<titles...>', 'titles of external packages')
    .description('Unregister external packages')
    .action(withErrorHandling(async (titles: string[], _options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      if (!(await removeExternalPackages(ctx, titles))) {
        process.exitCode = 1;
      }
    }));
}
