/**
 * Deployment files for CLI and factory tests
 */

export interface DeploymentPhaseInput {
  name: string;
  command: string;
  args?: string[];
  destructive?: boolean;
  idempotent?: boolean;
  maxRetries?: number;
  timeoutMs?: number;
  retryableExitCodes?: number[];
}

/**
 * A two-artifact deployment whose phases all run through `command`.
 * Delays are kept at a millisecond so retries stay fast on the real clock.
 */
export function deploymentFile(
  phases: DeploymentPhaseInput[],
  extra: { settings?: Record<string, unknown>; dumps?: boolean; preflight?: Record<string, unknown> } = {}
): string {
  return JSON.stringify(
    {
      name: 'example-stack',
      settings: extra.settings ?? { domain: 'example.test', adminPassword: 'test-secret' },
      phases: phases.map((phase) => ({
        destructive: false,
        idempotent: true,
        maxRetries: 3,
        timeoutMs: 5000,
        ...phase,
      })),
      backup: {
        targetDir: 'app',
        artifacts: [
          { label: 'env', path: '.env', required: true },
          { label: 'passwords', path: 'PASSWORDS.txt' },
        ],
        dumps: extra.dumps
          ? [{ label: 'database', command: 'mysqldump', args: ['--all-databases'], fileName: 'db.sql' }]
          : [],
      },
      preflight: { minDiskGb: 20, minMemoryGb: 4, minCpus: 2, ports: [80, 443], engineCommand: null, ...extra.preflight },
      orchestrator: { baseDelayMs: 1, maxDelayMs: 2, cancelGraceMs: 50 },
    },
    null,
    2
  );
}
