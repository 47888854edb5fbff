/**
 * Default pre-flight probes: disk, memory, CPUs, ports and the container
 * engine. Each probe is a named PreflightCheck; `runPreflight` runs them
 * concurrently and reports every result under its check's name.
 */

import { statfs } from 'fs/promises';
import { totalmem, cpus } from 'os';
import { createServer } from 'net';
import { resolve as resolvePath } from 'path';
import { ProcessRunner } from '../types/process-runner';
import { CheckResult, PreflightCheck, PreflightReport } from '../types/preflight';
import { PreflightSpec } from '../schemas/validators';
import { describeError } from '../types/errors';
import { errnoCode } from '../io/real-file-system';

const GB = 1024 * 1024 * 1024;
const ENGINE_PROBE_TIMEOUT_MS = 15000;

export type PortState = 'free' | 'in_use' | 'no_permission';

/**
 * Host facts the checks read; replaced in tests
 */
export interface SystemProbe {
  freeDiskBytes(path: string): Promise<number>;
  totalMemoryBytes(): number;
  cpuCount(): number;
  portState(port: number): Promise<PortState>;
}

function probePort(port: number): Promise<PortState> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', (error) => {
      const code = errnoCode(error);
      if (code === 'EADDRINUSE') {
        resolve('in_use');
      } else if (code === 'EACCES') {
        resolve('no_permission');
      } else {
        reject(error);
      }
    });
    server.once('listening', () => {
      server.close(() => resolve('free'));
    });
    server.listen(port);
  });
}

export const nodeSystemProbe: SystemProbe = {
  async freeDiskBytes(path: string): Promise<number> {
    const stats = await statfs(path);
    return stats.bavail * stats.bsize;
  },
  totalMemoryBytes: () => totalmem(),
  cpuCount: () => cpus().length,
  portState: probePort,
};

function gb(bytes: number): string {
  return `${(bytes / GB).toFixed(1)} GB`;
}

export function diskSpaceCheck(path: string, minGb: number, probe: SystemProbe): PreflightCheck {
  return {
    name: 'disk',
    run: async () => {
      const free = await probe.freeDiskBytes(path);
      const passed = free >= minGb * GB;
      return {
        passed,
        message: passed
          ? `${gb(free)} free at ${path}`
          : `Only ${gb(free)} free at ${path}; at least ${minGb} GB required`,
      };
    },
  };
}

export function memoryCheck(minGb: number, probe: SystemProbe): PreflightCheck {
  return {
    name: 'memory',
    run: async () => {
      const total = probe.totalMemoryBytes();
      const passed = total >= minGb * GB;
      return {
        passed,
        message: passed ? `${gb(total)} RAM` : `${gb(total)} RAM; at least ${minGb} GB required`,
      };
    },
  };
}

export function cpuCheck(minCpus: number, probe: SystemProbe): PreflightCheck {
  return {
    name: 'cpu',
    run: async () => {
      const count = probe.cpuCount();
      const passed = count >= minCpus;
      return {
        passed,
        message: passed ? `${count} CPU(s)` : `${count} CPU(s); at least ${minCpus} required`,
      };
    },
  };
}

export function portsCheck(ports: number[], probe: SystemProbe): PreflightCheck {
  return {
    name: 'ports',
    run: async () => {
      const states = await Promise.all(ports.map(async (port) => ({ port, state: await probe.portState(port) })));
      const busy = states.filter((s) => s.state === 'in_use').map((s) => s.port);
      // Binding a privileged port needs root; the port may still be free
      const unchecked = states.filter((s) => s.state === 'no_permission').map((s) => s.port);

      if (busy.length > 0) {
        return { passed: false, message: `Port(s) in use: ${busy.join(', ')}` };
      }
      if (unchecked.length > 0) {
        return {
          passed: true,
          warning: true,
          message: `Could not test port(s) ${unchecked.join(', ')} without elevated privileges`,
        };
      }
      return { passed: true, message: `Port(s) available: ${ports.join(', ')}` };
    },
  };
}

/**
 * The container engine may be installed by a phase, so an unreachable
 * engine is only a warning
 */
export function containerEngineCheck(command: string, processRunner: ProcessRunner, cwd: string): PreflightCheck {
  return {
    name: 'container-engine',
    run: async () => {
      try {
        const result = await processRunner.spawn(command, {
          args: ['version'],
          cwd,
          signal: AbortSignal.timeout(ENGINE_PROBE_TIMEOUT_MS),
          tailLines: 5,
        });
        if (result.exitCode === 0 && !result.interrupted) {
          return { passed: true, message: `${command} is reachable` };
        }
        return {
          passed: true,
          warning: true,
          message: `${command} is not reachable (exit code ${result.exitCode})`,
        };
      } catch (error) {
        return {
          passed: true,
          warning: true,
          message: `${command} is not available: ${describeError(error)}`,
        };
      }
    },
  };
}

export interface DefaultChecksOptions {
  processRunner: ProcessRunner;
  /** Directory the relative paths of the preflight section resolve against */
  cwd: string;
  probe?: SystemProbe;
}

export function createDefaultChecks(spec: PreflightSpec, options: DefaultChecksOptions): PreflightCheck[] {
  const probe = options.probe ?? nodeSystemProbe;
  const checks: PreflightCheck[] = [
    diskSpaceCheck(resolvePath(options.cwd, spec.diskPath), spec.minDiskGb, probe),
    memoryCheck(spec.minMemoryGb, probe),
    cpuCheck(spec.minCpus, probe),
  ];
  if (spec.ports.length > 0) {
    checks.push(portsCheck(spec.ports, probe));
  }
  if (spec.engineCommand !== null) {
    checks.push(containerEngineCheck(spec.engineCommand, options.processRunner, options.cwd));
  }
  return checks;
}

/**
 * Run every check concurrently. A check that throws counts as failed.
 */
export async function runPreflight(checks: PreflightCheck[]): Promise<PreflightReport> {
  const results = await Promise.all(
    checks.map((check) =>
      check.run().then(
        (outcome): CheckResult => ({ name: check.name, ...outcome }),
        (error: unknown): CheckResult => ({
          name: check.name,
          passed: false,
          message: `Check failed to run: ${describeError(error)}`,
        })
      )
    )
  );
  return { passed: results.every((r) => r.passed), results };
}
