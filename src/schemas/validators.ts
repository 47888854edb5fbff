/**
 * Schema Validation with Zod
 * Runtime validation for every document phaseguard reads from disk: the
 * state file, backup manifests, the deployment file and the user config.
 */

import { z } from 'zod';
import type {
  InstallationState,
  BackupRecord,
  JsonValue,
} from './installation-state.schema';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

function validateWith<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

function parseJsonWith<T>(
  validate: (data: unknown) => ValidationResult<T>,
  json: string
): ValidationResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validate(data);
}

/**
 * `schemaVersion` of a parsed document, or null when it has none
 */
export function readSchemaVersion(data: unknown): number | null {
  if (typeof data === 'object' && data !== null && 'schemaVersion' in data) {
    const version = data.schemaVersion;
    return typeof version === 'number' ? version : null;
  }
  return null;
}

// =============================================================================
// Shared
// =============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const jsonObjectSchema = z.record(jsonValueSchema);

export const PHASE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

const phaseNameSchema = z
  .string()
  .regex(PHASE_NAME_PATTERN, 'must start with a lowercase letter or digit and contain only a-z, 0-9, "-" and "_"');

const isoTimestampSchema = z.string().datetime({ offset: true });

// =============================================================================
// Installation State
// =============================================================================

const phaseRecordSchema = z.object({
  status: z.enum(['pending', 'running', 'succeeded', 'failed', 'skipped']),
  attempts: z.number().int().nonnegative(),
  startedAt: isoTimestampSchema.nullable(),
  finishedAt: isoTimestampSchema.nullable(),
  durationMs: z.number().nonnegative().nullable(),
  lastError: z.string().nullable(),
});

const installationStateSchema = z
  .object({
    schemaVersion: z.number().int().positive(),
    runId: z.string().min(1),
    status: z.enum(['in_progress', 'failed', 'complete']),
    createdAt: isoTimestampSchema,
    updatedAt: isoTimestampSchema,
    lastPhaseIndex: z.number().int().nonnegative().nullable(),
    lastPhaseName: z.string().nullable(),
    phaseOrder: z.array(phaseNameSchema),
    phases: z.record(phaseRecordSchema),
    configSnapshot: jsonObjectSchema,
    configFingerprint: z.string().regex(/^[a-f0-9]{64}$/, 'must be a sha256 hex digest'),
    lastError: z
      .object({
        kind: z.string(),
        phase: z.string().nullable(),
        message: z.string(),
      })
      .nullable(),
    backups: z.array(z.string()),
  })
  .superRefine((state, ctx) => {
    for (const name of state.phaseOrder) {
      if (!(name in state.phases)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', name],
          message: 'phase listed in phaseOrder has no record',
        });
      }
    }
  });

export function validateInstallationState(data: unknown): ValidationResult<InstallationState> {
  return validateWith(installationStateSchema, data);
}

export function parseInstallationState(json: string): ValidationResult<InstallationState> {
  return parseJsonWith(validateInstallationState, json);
}

// =============================================================================
// Backup Manifest
// =============================================================================

const sha256Schema = z.string().regex(/^[a-f0-9]{64}$/, 'must be a sha256 hex digest');

const backupArtifactSchema = z.object({
  label: z.string().min(1),
  kind: z.enum(['file', 'dump']),
  sourcePath: z.string().nullable(),
  storedPath: z.string().min(1),
  sha256: sha256Schema,
  size: z.number().int().nonnegative(),
  mode: z.number().int().nonnegative().nullable(),
});

const backupRecordSchema = z.object({
  schemaVersion: z.number().int().positive(),
  name: z.string().min(1),
  createdAt: isoTimestampSchema,
  triggeredBy: z.object({ phase: z.string(), runId: z.string() }).nullable(),
  artifacts: z.array(backupArtifactSchema),
  totalSize: z.number().int().nonnegative(),
  stateSnapshot: installationStateSchema.nullable(),
});

export function validateBackupRecord(data: unknown): ValidationResult<BackupRecord> {
  return validateWith(backupRecordSchema, data);
}

export function parseBackupRecord(json: string): ValidationResult<BackupRecord> {
  return parseJsonWith(validateBackupRecord, json);
}

// =============================================================================
// Orchestrator settings (deployment file section and user config)
// =============================================================================

const retentionSchema = z
  .object({
    maxCount: z.number().int().min(1).optional(),
    maxAgeDays: z.number().positive().optional(),
  })
  .strict();

const orchestratorSettingsSchema = z
  .object({
    stateDir: z.string().min(1).optional(),
    backupDir: z.string().min(1).optional(),
    baseDelayMs: z.number().int().nonnegative().optional(),
    maxDelayMs: z.number().int().nonnegative().optional(),
    cancelGraceMs: z.number().int().nonnegative().optional(),
    lockStaleAfterMs: z.number().int().positive().optional(),
    retention: retentionSchema.optional(),
  })
  .strict();

export type OrchestratorSettings = z.infer<typeof orchestratorSettingsSchema>;

const userConfigSchema = orchestratorSettingsSchema
  .extend({
    interactive: z.boolean().optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof userConfigSchema>;

export function validateUserConfig(data: unknown): ValidationResult<UserConfig> {
  return validateWith(userConfigSchema, data);
}

export function parseUserConfig(json: string): ValidationResult<UserConfig> {
  return parseJsonWith(validateUserConfig, json);
}

// =============================================================================
// Deployment file
// =============================================================================

const commandPhaseSchema = z
  .object({
    name: phaseNameSchema,
    label: z.string().min(1).optional(),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string()).optional(),
    destructive: z.boolean({ required_error: 'destructive must be declared on every phase' }),
    idempotent: z.boolean({ required_error: 'idempotent must be declared on every phase' }),
    timeoutMs: z.number().int().positive().default(10 * 60 * 1000),
    maxRetries: z.number().int().min(1).default(3),
    timeoutFatal: z.boolean().optional(),
    retryableExitCodes: z.array(z.number().int()).default([]),
  })
  .strict();

export type CommandPhaseSpec = z.infer<typeof commandPhaseSchema>;

const artifactSpecSchema = z
  .object({
    label: z.string().min(1),
    path: z.string().min(1),
    required: z.boolean().default(false),
  })
  .strict();

export type ArtifactSpec = z.infer<typeof artifactSpecSchema>;

const dumpSpecSchema = z
  .object({
    label: z.string().min(1),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    cwd: z.string().min(1).optional(),
    fileName: z.string().regex(/^[A-Za-z0-9._-]+$/, 'must be a plain file name'),
    required: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(10 * 60 * 1000),
  })
  .strict();

export type DumpSpec = z.infer<typeof dumpSpecSchema>;

const backupSectionSchema = z
  .object({
    targetDir: z.string().min(1).default('.'),
    artifacts: z.array(artifactSpecSchema).default([]),
    dumps: z.array(dumpSpecSchema).default([]),
  })
  .strict();

const preflightSectionSchema = z
  .object({
    diskPath: z.string().min(1).default('.'),
    minDiskGb: z.number().nonnegative().default(20),
    minMemoryGb: z.number().nonnegative().default(4),
    minCpus: z.number().int().nonnegative().default(2),
    ports: z.array(z.number().int().min(1).max(65535)).default([]),
    engineCommand: z.string().min(1).nullable().default('docker'),
  })
  .strict();

export type PreflightSpec = z.infer<typeof preflightSectionSchema>;

const deploymentPlanSchema = z
  .object({
    name: z.string().min(1).optional(),
    settings: jsonObjectSchema.default({}),
    phases: z.array(commandPhaseSchema).min(1, 'at least one phase is required'),
    backup: backupSectionSchema.default({}),
    preflight: preflightSectionSchema.default({}),
    orchestrator: orchestratorSettingsSchema.default({}),
  })
  .strict()
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.phases.forEach((phase, index) => {
      if (seen.has(phase.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'name'],
          message: `duplicate phase name "${phase.name}"`,
        });
      }
      seen.add(phase.name);
    });
  });

export type DeploymentPlan = z.infer<typeof deploymentPlanSchema>;

export function validateDeploymentPlan(data: unknown): ValidationResult<DeploymentPlan> {
  return validateWith(deploymentPlanSchema, data);
}

export function parseDeploymentPlan(json: string): ValidationResult<DeploymentPlan> {
  return parseJsonWith(validateDeploymentPlan, json);
}

// =============================================================================
// Run lock file
// =============================================================================

const lockInfoSchema = z.object({
  pid: z.number().int().positive(),
  hostname: z.string(),
  runId: z.string().nullable(),
  acquiredAt: isoTimestampSchema,
  token: z.string().min(1),
});

export type LockInfo = z.infer<typeof lockInfoSchema>;

export function parseLockInfo(json: string): ValidationResult<LockInfo> {
  return parseJsonWith((data) => validateWith(lockInfoSchema, data), json);
}
