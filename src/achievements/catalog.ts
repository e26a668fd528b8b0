import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { AchievementCatalogError, UnknownAchievementError } from './errors.js';
import {
  ACHIEVEMENT_CATEGORIES,
  ACHIEVEMENT_IDS,
  ACHIEVEMENT_TIERS,
  type AchievementDefinition,
  type AchievementId,
  type AchievementTier,
} from './types.js';

export const TIER_POINTS: Readonly<Record<AchievementTier, number>> = {
  REGULAR: 10,
  BRONZE: 25,
  SILVER: 50,
  GOLD: 100,
  PLATINUM: 200,
};

export const tierRank = (tier: AchievementTier) => ACHIEVEMENT_TIERS.indexOf(tier) + 1;

const TierEntrySchema = z.object({
  tier: z.enum(ACHIEVEMENT_TIERS),
  value: z.number().int().min(1),
  description: z.string().min(1),
});

const DefinitionSchema = z.object({
  id: z.enum(ACHIEVEMENT_IDS),
  category: z.enum(ACHIEVEMENT_CATEGORIES),
  name: z.string().min(1),
  tiers: z.array(TierEntrySchema).min(1),
});

export const CatalogFileSchema = z.object({
  definitions: z.array(DefinitionSchema),
  specialPoints: z
    .array(z.object({ id: z.enum(ACHIEVEMENT_IDS), points: z.number().int().min(1) }))
    .default([]),
});

export type CatalogFile = z.input<typeof CatalogFileSchema>;

export interface AchievementCatalog {
  readonly definitions: ReadonlyMap<AchievementId, AchievementDefinition>;
  definitionFor(id: AchievementId): AchievementDefinition;
  /**
   * Points credited to a profile holding `tier` for `id`. The special-points
   * override applies once the highest defined tier is held; otherwise a
   * single-tier definition credits that tier and a multi-tier definition
   * credits every defined tier up to and including `tier`.
   */
  pointsFor(id: AchievementId, tier: AchievementTier): number;
}

const toDefinition = (entry: z.output<typeof DefinitionSchema>): AchievementDefinition => {
  const tiers = [...entry.tiers].sort((a, b) => tierRank(a.tier) - tierRank(b.tier));
  for (let idx = 1; idx < tiers.length; idx += 1) {
    if (tiers[idx].tier === tiers[idx - 1].tier) {
      throw new AchievementCatalogError(`${entry.id} defines tier ${tiers[idx].tier} twice`);
    }
    if (tiers[idx].value <= tiers[idx - 1].value) {
      throw new AchievementCatalogError(`${entry.id} thresholds must increase with tier rank`);
    }
  }
  return Object.freeze({
    id: entry.id,
    category: entry.category,
    name: entry.name,
    tiers: Object.freeze(
      tiers.map(({ tier, value, description }) => Object.freeze({ tier, requirement: { value, description } }))
    ),
  });
};

export function createCatalog(input: unknown): AchievementCatalog {
  const parsed = CatalogFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new AchievementCatalogError('invalid achievement catalog', parsed.error.flatten());
  }

  const definitions = new Map<AchievementId, AchievementDefinition>();
  for (const entry of parsed.data.definitions) {
    if (definitions.has(entry.id)) {
      throw new AchievementCatalogError(`duplicate achievement definition ${entry.id}`);
    }
    definitions.set(entry.id, toDefinition(entry));
  }

  const missing = ACHIEVEMENT_IDS.filter((id) => !definitions.has(id));
  if (missing.length) {
    throw new AchievementCatalogError(`achievement catalog is missing ${missing.join(', ')}`, { missing });
  }

  const specialPoints = new Map<AchievementId, number>(
    parsed.data.specialPoints.map((entry) => [entry.id, entry.points])
  );

  const definitionFor = (id: AchievementId): AchievementDefinition => {
    const definition = definitions.get(id);
    if (!definition) throw new UnknownAchievementError(id);
    return definition;
  };

  const pointsFor = (id: AchievementId, tier: AchievementTier) => {
    const { tiers } = definitionFor(id);
    const rank = tierRank(tier);
    const special = specialPoints.get(id);
    const topRank = tierRank(tiers[tiers.length - 1].tier);
    if (special !== undefined && rank >= topRank) return special;
    if (tiers.length === 1) return TIER_POINTS[tiers[0].tier];
    return tiers
      .filter((entry) => tierRank(entry.tier) <= rank)
      .reduce((sum, entry) => sum + TIER_POINTS[entry.tier], 0);
  };

  return { definitions, definitionFor, pointsFor };
}

export const DEFAULT_CATALOG_URL = new URL('../../data/achievements.json', import.meta.url);

export const loadCatalog = (location: URL | string = DEFAULT_CATALOG_URL): AchievementCatalog =>
  createCatalog(JSON.parse(readFileSync(location, 'utf8')));

export const defaultCatalog: AchievementCatalog = loadCatalog();

export const definitionFor = (id: AchievementId) => defaultCatalog.definitionFor(id);
