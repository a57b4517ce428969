import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { ExecutionContext } from '../src/types/execution-context.js';
import type { Logger, PackageRecord, ProcessResult, ProcessRunner, RunOptions } from '../src/types/index.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { PromptPort, TextPromptOptions } from '../src/core/ports/prompt.js';
import { CancellationToken } from '../src/utils/cancellation.js';
import { getMmpkgPaths } from '../src/core/directory.js';
import { resolveEnvironmentSettings } from '../src/core/config.js';
import { createPackageRecord } from '../src/core/package-record.js';

export interface RecordedCall {
  argv: string[];
  cwd?: string;
}

type Responder = (call: RecordedCall) => Partial<ProcessResult> | Promise<Partial<ProcessResult>>;

interface Rule {
  command: string;
  cwd?: string;
  respond: Responder;
}

/**
 * In-process stand-in for git, npm and friends. Rules match on the start of
 * the space-joined argv (and the cwd when given); the most recently added
 * rule wins. Unmatched commands succeed with no output.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  readonly interactiveCalls: RecordedCall[] = [];
  readonly detachedCalls: RecordedCall[] = [];
  interactiveExitCode = 0;
  private readonly rules: Rule[] = [];

  on(command: string, response: Partial<ProcessResult> | Responder, cwd?: string): this {
    const respond: Responder = typeof response === 'function' ? response : () => response;
    this.rules.push({ command, cwd, respond });
    return this;
  }

  async run(argv: string[], options: RunOptions = {}): Promise<ProcessResult> {
    const call: RecordedCall = { argv, cwd: options.cwd };
    this.calls.push(call);

    const line = argv.join(' ');
    const rule = [...this.rules]
      .reverse()
      .find(candidate => line.startsWith(candidate.command) && (candidate.cwd === undefined || candidate.cwd === options.cwd));
    const result = rule ? await rule.respond(call) : {};
    return { code: 0, stdout: '', stderr: '', ...result };
  }

  async runInteractive(argv: string[], options: RunOptions = {}): Promise<number> {
    this.interactiveCalls.push({ argv, cwd: options.cwd });
    return this.interactiveExitCode;
  }

  spawnDetached(argv: string[], options: RunOptions = {}): void {
    this.detachedCalls.push({ argv, cwd: options.cwd });
  }

  commandLines(): string[] {
    return this.calls.map(call => call.argv.join(' '));
  }
}

export type OutputKind = 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'note';

export class RecordingOutput implements OutputPort {
  readonly entries: Array<{ kind: OutputKind; message: string }> = [];

  info(message: string): void { this.entries.push({ kind: 'info', message }); }
  step(message: string): void { this.entries.push({ kind: 'step', message }); }
  message(message: string): void { this.entries.push({ kind: 'message', message }); }
  success(message: string): void { this.entries.push({ kind: 'success', message }); }
  error(message: string): void { this.entries.push({ kind: 'error', message }); }
  warn(message: string): void { this.entries.push({ kind: 'warn', message }); }
  note(content: string, title?: string): void {
    this.entries.push({ kind: 'note', message: title ? `${title}: ${content}` : content });
  }

  spinner(): UnifiedSpinner {
    return {
      start: (message: string) => { this.entries.push({ kind: 'step', message }); },
      stop: (finalMessage?: string) => {
        if (finalMessage) this.entries.push({ kind: 'message', message: finalMessage });
      },
      message: () => {}
    };
  }

  of(kind: OutputKind): string[] {
    return this.entries.filter(entry => entry.kind === kind).map(entry => entry.message);
  }
}

/**
 * Answers confirmations from a queue (then `fallback`) and records the
 * questions asked.
 */
export class ScriptedPrompt implements PromptPort {
  readonly asked: string[] = [];

  constructor(
    private readonly confirmations: boolean[] = [],
    private readonly texts: string[] = [],
    private readonly fallback: boolean = true
  ) {}

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return this.confirmations.shift() ?? this.fallback;
  }

  async text(message: string, options: TextPromptOptions = {}): Promise<string> {
    this.asked.push(message);
    const answer = this.texts.shift() ?? '';
    const invalid = options.validate?.(answer);
    if (invalid) {
      throw new Error(`invalid answer '${answer}': ${invalid}`);
    }
    return answer;
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `mmpkg-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface TestContext extends ExecutionContext {
  output: RecordingOutput;
  prompt: ScriptedPrompt;
  runner: FakeRunner;
}

/**
 * Context rooted in `baseDir`: config files under `config/`, a dashboard
 * root at `MagicMirror/` with an existing `modules/` directory.
 */
export async function makeContext(
  baseDir: string,
  overrides: { prompt?: ScriptedPrompt; runner?: FakeRunner; assumeYes?: boolean } = {}
): Promise<TestContext> {
  const paths = getMmpkgPaths(join(baseDir, 'config'));
  await mkdir(paths.configDir, { recursive: true });

  const environment = resolveEnvironmentSettings({}, {}, join(baseDir, 'MagicMirror'));
  await mkdir(environment.modulesDir, { recursive: true });

  return {
    paths,
    environment,
    logger: silentLogger,
    runner: overrides.runner ?? new FakeRunner(),
    cancellation: new CancellationToken(),
    assumeYes: overrides.assumeYes ?? false,
    output: new RecordingOutput(),
    prompt: overrides.prompt ?? new ScriptedPrompt()
  };
}

export function record(
  title: string,
  repository: string,
  extra: { author?: string; description?: string; directory?: string } = {}
): PackageRecord {
  return createPackageRecord({ title, repository, ...extra });
}
