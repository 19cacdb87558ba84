import { promises as fs } from 'fs';
import { z } from 'zod';
import { MigrationConfigError } from '../../store/errors';
import { toConfigError } from '../config';

const FieldMapSchema = z.record(z.unknown());

const RootSelectionSchema = z.object({
  entityType: z.string().min(1),
  ids: z.array(z.string().min(1)).min(1, 'at least one root id is required'),
  /** Cap on the same-type records pulled in by the root prefetch */
  prefetchLimit: z.number().int().positive().optional(),
});

const RelatedSelectionSchema = z.object({
  entityType: z.string().min(1),
  /** Reference field on the child that points at an already migrated parent */
  parentField: z.string().min(1),
  /** -1 copies every child, 0 skips the relation */
  limitPerParent: z.number().int().min(-1).default(-1),
});

const StableNameSchema = z.object({
  nameField: z.string().min(1),
  scopeField: z.string().min(1).optional(),
});

export const MigrationPlanSchema = z.object({
  runId: z.string().min(1).optional(),
  roots: z.array(RootSelectionSchema).min(1, 'at least one root selection is required'),
  related: z.array(RelatedSelectionSchema).default([]),
  /** Extra entity types whose metadata must be loaded */
  entityTypes: z.array(z.string().min(1)).default([]),
  dummyTemplates: z.record(FieldMapSchema).default({}),
  retainDummies: z.array(z.string().min(1)).default([]),
  purgeDummies: z.boolean().default(true),
  continuity: z
    .object({
      types: z.array(z.string().min(1)).default([]),
      fallbackIds: z.record(z.string().min(1)).default({}),
      /** Equality filter used to discover a fallback record in the target */
      fallbackWhere: z.record(FieldMapSchema).default({}),
    })
    .default({}),
  stableNames: z.record(StableNameSchema).default({}),
  immutableFields: z.record(z.array(z.string().min(1))).default({}),
  excludedFields: z.record(z.array(z.string().min(1))).default({}),
  singleCreateTypes: z.array(z.string().min(1)).default([]),
  purgeTarget: z
    .object({
      enabled: z.boolean().default(false),
      protectedIds: z.record(z.array(z.string().min(1))).default({}),
    })
    .default({}),
  resume: z.boolean().default(false),
  maskEmails: z.boolean().default(false),
}).superRefine((plan, ctx) => {
  // Snapshots are found by run id
  if (plan.resume && plan.runId === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['runId'],
      message: 'resume requires the runId of the run to continue',
    });
  }
  if (plan.resume && plan.purgeTarget.enabled) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['purgeTarget'],
      message: 'a purged target cannot be resumed from its snapshots',
    });
  }
});

export type MigrationPlan = z.infer<typeof MigrationPlanSchema>;
export type MigrationPlanInput = z.input<typeof MigrationPlanSchema>;
export type RootSelection = z.infer<typeof RootSelectionSchema>;
export type RelatedSelection = z.infer<typeof RelatedSelectionSchema>;

/**
 * Validate a plan object
 *
 * @throws {MigrationConfigError} Listing every schema issue
 */
export function parseMigrationPlan(input: unknown): MigrationPlan {
  const result = MigrationPlanSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError('Migration plan validation failed', result.error);
  }

  const plan = result.data;
  const overlapping = plan.continuity.types.filter(type => type in plan.stableNames);
  if (overlapping.length > 0) {
    throw new MigrationConfigError(
      `Entity types cannot be both continuity and stable-name types: ${overlapping.join(', ')}`,
      overlapping
    );
  }

  return plan;
}

/**
 * Read and validate a plan file (JSON)
 */
export async function loadMigrationPlan(filePath: string): Promise<MigrationPlan> {
  const content = await fs.readFile(filePath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new MigrationConfigError(
      `Migration plan ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseMigrationPlan(parsed);
}
