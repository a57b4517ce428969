import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { DashboardProcessControl } from '../../../src/core/dashboard/process-control.js';
import { type TestContext, makeContext, makeTempDir, removeTempDir } from '../../test-helpers.js';

describe('DashboardProcessControl', () => {
  let dir: string;
  let ctx: TestContext;

  beforeEach(async () => {
    dir = await makeTempDir('mmctl');
    ctx = await makeContext(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('uses pm2 when a process name is configured and pm2 is installed', async () => {
    ctx.environment = { ...ctx.environment, pm2ProcessName: 'MagicMirror' };

    assert.equal(await new DashboardProcessControl(ctx).restart(), true);

    assert.deepEqual(ctx.runner.commandLines(), ['which pm2', 'pm2 restart MagicMirror']);
  });

  it('falls back to docker-compose when pm2 is not on PATH', async () => {
    ctx.environment = { ...ctx.environment, pm2ProcessName: 'MagicMirror', dockerComposeFile: '/srv/mm/compose.yml' };
    ctx.runner.on('which pm2', { code: 1 });

    assert.equal(await new DashboardProcessControl(ctx).start(), true);

    assert.deepEqual(ctx.runner.commandLines(), [
      'which pm2',
      'which docker-compose',
      'docker-compose -f /srv/mm/compose.yml up -d'
    ]);
  });

  it('starts npm detached in the root without a supervisor', async () => {
    assert.equal(await new DashboardProcessControl(ctx).start(), true);

    assert.deepEqual(ctx.runner.calls, []);
    assert.deepEqual(ctx.runner.detachedCalls, [{ argv: ['npm', 'start'], cwd: ctx.environment.root }]);
  });

  it('restarts without a supervisor even when nothing was running', async () => {
    ctx.runner.on('pkill electron', { code: 1 });

    assert.equal(await new DashboardProcessControl(ctx).restart(), true);

    assert.deepEqual(ctx.runner.commandLines(), ['pkill electron']);
    assert.equal(ctx.runner.detachedCalls.length, 1);
  });

  it('reports a failing supervisor command', async () => {
    ctx.environment = { ...ctx.environment, pm2ProcessName: 'MagicMirror' };
    ctx.runner.on('pm2 stop', { code: 1, stderr: '[PM2][ERROR] Process MagicMirror not found' });

    assert.equal(await new DashboardProcessControl(ctx).stop(), false);
    assert.deepEqual(ctx.output.of('error'), ['Failed to stop MagicMirror: [PM2][ERROR] Process MagicMirror not found']);
  });

  describe('isRunning', () => {
    it('is true when an electron process exists', async () => {
      assert.equal(await new DashboardProcessControl(ctx).isRunning(), true);
    });

    it('asks pm2 when no electron process is found', async () => {
      ctx.environment = { ...ctx.environment, pm2ProcessName: 'MagicMirror' };
      ctx.runner
        .on('pgrep -f electron', { code: 1 })
        .on('pm2 jlist', {
          stdout: JSON.stringify([
            { name: 'other', pm2_env: { status: 'online' } },
            { name: 'MagicMirror', pm2_env: { status: 'stopped' } }
          ])
        });

      assert.equal(await new DashboardProcessControl(ctx).isRunning(), false);
    });

    it('is true for an online pm2 process', async () => {
      ctx.environment = { ...ctx.environment, pm2ProcessName: 'MagicMirror' };
      ctx.runner
        .on('pgrep -f electron', { code: 1 })
        .on('pm2 jlist', { stdout: JSON.stringify([{ name: 'MagicMirror', pm2_env: { status: 'online' } }]) });

      assert.equal(await new DashboardProcessControl(ctx).isRunning(), true);
    });
  });
});
