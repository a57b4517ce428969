import { join } from 'path';

import type { ExecutionContext } from '../../types/execution-context.js';
import { DASHBOARD_NAME, DEFAULTS } from '../../constants/index.js';
import { ensureDir, exists } from '../../utils/fs.js';
import { ConfigError } from '../../utils/errors.js';
import { getHomeDirectory, expandHome } from '../../utils/home-directory.js';
import { confirmAction, resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { UpgradeLedger, normalizeRoot } from '../upgrades/upgrade-ledger.js';

/**
 * Install a new dashboard through its upstream installer script. When the
 * configured root already holds an installation, the user picks another
 * parent directory that is not a known environment.
 */
export async function installDashboard(
  ctx: ExecutionContext,
  installerUrl: string = DEFAULTS.DASHBOARD_INSTALLER_URL
): Promise<boolean> {
  const out = resolveOutput(ctx);
  const ledger = new UpgradeLedger(ctx.paths.upgradesFile, ctx.environment.root);
  const knownEnvironments = [...(await ledger.get()).environments.keys()];

  let parent = getHomeDirectory();
  if (await exists(ctx.environment.root)) {
    out.warn(`${DASHBOARD_NAME} appears to be installed already in ${ctx.environment.root}. Provide a new destination`);
    ctx.cancellation.throwIfCancelled();
    const answer = await resolvePrompt(ctx).text('Absolute path to new installation location:', {
      validate: value => {
        if (!value.trim()) {
          return 'A path is required';
        }
        const candidate = normalizeRoot(expandHome(value.trim()));
        if (knownEnvironments.includes(candidate) || knownEnvironments.includes(join(candidate, DEFAULTS.MAGICMIRROR_DIR))) {
          return 'Matches a known MagicMirror environment';
        }
        return undefined;
      }
    });
    parent = normalizeRoot(expandHome(answer.trim()));
  } else {
    out.step(`Installing ${DASHBOARD_NAME}`);
  }

  if (!(await confirmAction(ctx, `Use '${parent}' as the parent directory of the new ${DASHBOARD_NAME} installation?`))) {
    return false;
  }
  await ensureDir(parent);

  const curl = await ctx.runner.run(['which', 'curl']);
  if (curl.code !== 0) {
    throw new ConfigError(`'curl' command not found. Install 'curl', then re-run mmpkg install --magicmirror`);
  }

  out.info(`Installing ${DASHBOARD_NAME} in ${join(parent, DEFAULTS.MAGICMIRROR_DIR)} ...`);
  const code = await ctx.runner.runInteractive(['bash', '-c', `bash -c "$(curl -sL ${installerUrl})"`], { cwd: parent });
  if (code !== 0) {
    out.error(`${DASHBOARD_NAME} installer exited with code ${code}`);
    return false;
  }
  return true;
}
