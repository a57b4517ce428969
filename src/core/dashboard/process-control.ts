import { z } from 'zod';

import type { ExecutionContext } from '../../types/execution-context.js';
import { DASHBOARD_NAME } from '../../constants/index.js';
import { resolveOutput } from '../ports/resolve.js';

const pm2ListSchema = z.array(
  z
    .object({
      name: z.string(),
      pm2_env: z.object({ status: z.string() }).passthrough().optional()
    })
    .passthrough()
);

export type DashboardAction = 'start' | 'stop' | 'restart';

export type Supervisor = 'pm2' | 'docker-compose' | 'none';

const PROGRESS: Record<DashboardAction, string> = { start: 'Starting', stop: 'Stopping', restart: 'Restarting' };
const DONE: Record<DashboardAction, string> = { start: 'started', stop: 'stopped', restart: 'restarted' };

/**
 * Starts, stops and restarts the dashboard through pm2 when a process name
 * is configured, docker-compose when a compose file is configured, and
 * otherwise directly (`npm start` / `pkill electron`).
 */
export class DashboardProcessControl {
  constructor(private readonly ctx: ExecutionContext) {}

  async supervisor(): Promise<Supervisor> {
    const { pm2ProcessName, dockerComposeFile } = this.ctx.environment;
    if (pm2ProcessName && (await this.onPath('pm2'))) {
      return 'pm2';
    }
    if (dockerComposeFile && (await this.onPath('docker-compose'))) {
      return 'docker-compose';
    }
    return 'none';
  }

  start(): Promise<boolean> {
    return this.perform('start');
  }

  stop(): Promise<boolean> {
    return this.perform('stop');
  }

  restart(): Promise<boolean> {
    return this.perform('restart');
  }

  async isRunning(): Promise<boolean> {
    const electron = await this.ctx.runner.run(['pgrep', '-f', 'electron']);
    if (electron.code === 0) {
      return true;
    }

    const { pm2ProcessName } = this.ctx.environment;
    if (!pm2ProcessName) {
      return false;
    }
    const list = await this.ctx.runner.run(['pm2', 'jlist']);
    if (list.code !== 0) {
      return false;
    }
    try {
      const processes = pm2ListSchema.safeParse(JSON.parse(list.stdout));
      return processes.success && processes.data.some(
        entry => entry.name === pm2ProcessName && entry.pm2_env?.status === 'online'
      );
    } catch (error) {
      this.ctx.logger.debug('pm2 jlist output is not JSON', error);
      return false;
    }
  }

  private async perform(action: DashboardAction): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const supervisor = await this.supervisor();
    const { pm2ProcessName, dockerComposeFile, root } = this.ctx.environment;

    out.step(`${PROGRESS[action]} ${DASHBOARD_NAME}${supervisor === 'none' ? '' : ` using ${supervisor}`}`);

    if (supervisor === 'pm2') {
      return this.report(await this.ctx.runner.run(['pm2', action, pm2ProcessName]), action);
    }

    if (supervisor === 'docker-compose') {
      const verb = action === 'start' ? ['up', '-d'] : [action];
      return this.report(await this.ctx.runner.run(['docker-compose', '-f', dockerComposeFile, ...verb]), action);
    }

    if (action === 'stop' || action === 'restart') {
      const stopped = await this.ctx.runner.run(['pkill', 'electron']);
      // pkill exits 1 when nothing matched
      if (stopped.code > 1) {
        return this.report(stopped, action);
      }
      if (action === 'stop') {
        out.success(`${DASHBOARD_NAME} ${DONE.stop}`);
        return true;
      }
    }

    this.ctx.runner.spawnDetached(['npm', 'start'], { cwd: root });
    out.success(`${DASHBOARD_NAME} ${DONE[action]}`);
    return true;
  }

  private report(result: { code: number; stderr: string }, action: DashboardAction): boolean {
    const out = resolveOutput(this.ctx);
    if (result.code !== 0) {
      out.error(`Failed to ${action} ${DASHBOARD_NAME}: ${result.stderr.trim()}`);
      return false;
    }
    out.success(`${DASHBOARD_NAME} ${DONE[action]}`);
    return true;
  }

  private async onPath(command: string): Promise<boolean> {
    const result = await this.ctx.runner.run(['which', command]);
    return result.code === 0;
  }
}
