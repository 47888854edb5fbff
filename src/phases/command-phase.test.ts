import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { buildCommandPhases, classifyExit, createCommandPhaseAction, substituteSettings } from './command-phase';
import { CommandPhaseSpec } from '../schemas/validators';
import { PhaseContext } from '../types/phase';
import { SpawnResult } from '../types/process-runner';
import { JsonObject } from '../schemas/installation-state.schema';
import { BufferLogger } from '../logging/buffer-logger';
import { FakeProcessRunner } from '../../tests/utils/fake-process-runner';

function spec(overrides: Partial<CommandPhaseSpec> = {}): CommandPhaseSpec {
  return {
    name: 'start-services',
    command: 'docker',
    args: ['compose', 'up', '-d'],
    destructive: false,
    idempotent: true,
    timeoutMs: 60_000,
    maxRetries: 3,
    retryableExitCodes: [],
    ...overrides,
  };
}

function context(config: JsonObject = {}): PhaseContext {
  return {
    config,
    phase: { index: 0, name: 'start-services', label: 'start-services' },
    attempt: 1,
    signal: new AbortController().signal,
    logger: new BufferLogger(),
  };
}

function exited(exitCode: number, extra: Partial<SpawnResult> = {}): SpawnResult {
  return { exitCode, durationMs: 1, stdoutTail: [], stderrTail: [], interrupted: false, ...extra };
}

const options = (runner: FakeProcessRunner) => ({ processRunner: runner, baseDir: '/srv/app', resolvePath: resolve });

describe('substituteSettings', () => {
  const config: JsonObject = { domain: 'example.test', db: { port: 3306, user: 'app' } };

  it('should replace nested setting references', () => {
    expect(substituteSettings('https://${settings.domain}:${settings.db.port}', config)).toEqual({
      ok: true,
      value: 'https://example.test:3306',
    });
  });

  it('should encode non-string values as JSON', () => {
    expect(substituteSettings('${settings.db}', config)).toEqual({ ok: true, value: '{"port":3306,"user":"app"}' });
  });

  it('should report every unresolved reference', () => {
    expect(substituteSettings('${settings.missing} ${settings.db.port.x}', config)).toEqual({
      ok: false,
      error: 'unresolved setting(s): settings.missing, settings.db.port.x',
    });
  });

  it('should leave text without references alone', () => {
    expect(substituteSettings('--detach', config)).toEqual({ ok: true, value: '--detach' });
  });
});

describe('classifyExit', () => {
  it('should treat exit code 0 as success', () => {
    expect(classifyExit(exited(0), [])).toEqual({ status: 'success' });
  });

  it('should treat listed exit codes as retryable', () => {
    expect(classifyExit(exited(75, { stderrTail: ['registry unavailable'] }), [75])).toEqual({
      status: 'retryable',
      reason: 'exited with code 75: registry unavailable',
    });
  });

  it('should treat other exit codes as fatal with the last output lines', () => {
    expect(classifyExit(exited(1, { stdoutTail: ['a', '', 'b', 'c', 'd'] }), [75])).toEqual({
      status: 'fatal',
      reason: 'exited with code 1: b | c | d',
    });
  });

  it('should treat an interrupted process as retryable', () => {
    expect(classifyExit(exited(143, { interrupted: true, signal: 'SIGTERM' }), [])).toEqual({
      status: 'retryable',
      reason: 'interrupted by SIGTERM',
    });
  });
});

describe('createCommandPhaseAction', () => {
  it('should run the command with substituted arguments and environment', async () => {
    const runner = new FakeProcessRunner();
    const action = createCommandPhaseAction(
      spec({
        args: ['exec', 'web', 'configure', '--domain', '${settings.domain}'],
        env: { ADMIN_PASSWORD: '${settings.adminPassword}' },
        cwd: 'compose',
      }),
      options(runner)
    );
    const ctx = context({ domain: 'example.test', adminPassword: 'test-secret' });

    const result = await action(ctx);

    expect(result).toEqual({ status: 'success' });
    const [call] = runner.callsTo('docker');
    expect(call?.options).toMatchObject({
      args: ['exec', 'web', 'configure', '--domain', 'example.test'],
      cwd: '/srv/app/compose',
      env: { ADMIN_PASSWORD: 'test-secret' },
    });
    expect(call?.options.signal).toBe(ctx.signal);
  });

  it('should default the working directory to the base directory', async () => {
    const runner = new FakeProcessRunner();
    await createCommandPhaseAction(spec(), options(runner))(context());
    expect(runner.calls[0]?.options.cwd).toBe('/srv/app');
  });

  it('should accept an absolute working directory', async () => {
    const runner = new FakeProcessRunner();
    await createCommandPhaseAction(spec({ cwd: '/opt/stack' }), options(runner))(context());
    expect(runner.calls[0]?.options.cwd).toBe('/opt/stack');
  });

  it('should fail without running when a setting is missing', async () => {
    const runner = new FakeProcessRunner();
    const result = await createCommandPhaseAction(spec({ args: ['${settings.domain}'] }), options(runner))(context());
    expect(result).toEqual({ status: 'fatal', reason: 'unresolved setting(s): settings.domain' });
    expect(runner.calls).toHaveLength(0);
  });

  it('should report a command that cannot be started as fatal', async () => {
    const runner = new FakeProcessRunner().on('docker', { spawnError: 'spawn docker ENOENT' });
    const result = await createCommandPhaseAction(spec(), options(runner))(context());
    expect(result).toEqual({ status: 'fatal', reason: 'cannot start docker: spawn docker ENOENT' });
  });

  it('should classify a retryable exit code', async () => {
    const runner = new FakeProcessRunner().on('docker', { exitCode: 75, stderr: 'pull rate limit\n' });
    const result = await createCommandPhaseAction(spec({ retryableExitCodes: [75] }), options(runner))(context());
    expect(result).toEqual({ status: 'retryable', reason: 'exited with code 75: pull rate limit' });
  });
});

describe('buildCommandPhases', () => {
  it('should carry the declared flags onto the definitions', () => {
    const [definition] = buildCommandPhases(
      [spec({ name: 'wipe-volumes', label: 'Wipe volumes', destructive: true, idempotent: false, timeoutFatal: false })],
      options(new FakeProcessRunner())
    );
    expect(definition).toMatchObject({
      name: 'wipe-volumes',
      label: 'Wipe volumes',
      destructive: true,
      idempotent: false,
      timeoutMs: 60_000,
      maxRetries: 3,
      timeoutFatal: false,
    });
  });
});
