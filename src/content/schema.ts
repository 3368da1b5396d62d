import { z } from 'zod';
import type { AchievementDefinition, UpgradeDefinition } from '../core/types.js';

// ─── Catalog schemas ───────────────────────────────────────────────────────

const idSchema = z
  .string()
  .regex(/^[a-z][a-z0-9_]*$/, { message: 'Ids must be lowercase snake_case.' });

const upgradeDefinitionSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string(),
    kind: z.enum(['passive', 'click']),
    baseCost: z.number().finite().positive(),
    costMultiplier: z.number().finite().gt(1, { message: 'Cost must grow with every unit owned.' }),
    baseProduction: z.number().finite().nonnegative(),
  })
  .strict();

const targetSchema = z.number().finite().positive();
const countTargetSchema = z.number().int().positive();

const achievementGoalSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('totalGold'), target: targetSchema }).strict(),
  z.object({ kind: z.literal('goldPerSecond'), target: targetSchema }).strict(),
  z.object({ kind: z.literal('totalClicks'), target: countTargetSchema }).strict(),
  z.object({ kind: z.literal('clickPower'), target: targetSchema }).strict(),
  z.object({ kind: z.literal('upgradesPurchased'), target: countTargetSchema }).strict(),
]);

const achievementDefinitionSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string(),
    goal: achievementGoalSchema,
  })
  .strict();

function uniqueIds<T extends { id: string }>(entries: T[], ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate id: ${entry.id}`,
      });
    }
    seen.add(entry.id);
  });
}

export const upgradeCatalogSchema = z.array(upgradeDefinitionSchema).superRefine(uniqueIds);
export const achievementCatalogSchema = z.array(achievementDefinitionSchema).superRefine(uniqueIds);

export function parseUpgradeCatalog(input: unknown): UpgradeDefinition[] {
  return upgradeCatalogSchema.parse(input);
}

export function parseAchievementCatalog(input: unknown): AchievementDefinition[] {
  return achievementCatalogSchema.parse(input);
}
