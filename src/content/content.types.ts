// 컨텐츠 시드 데이터 스키마 (content/combat_v1 JSON 대응)

import { z } from 'zod';
import {
  ABILITY_TARGET,
  AI_BEHAVIOR,
  STATUS_EFFECT_KIND,
} from '../engine/types/enums.js';

export const AbilityEffectSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('DAMAGE'), amount: z.number().int().positive() }),
  z.object({ type: z.literal('HEAL'), amount: z.number().int().positive() }),
  z.object({
    type: z.literal('STATUS'),
    kind: z.enum(STATUS_EFFECT_KIND),
    duration: z.number().int().positive(),
    intensity: z.number().positive(),
  }),
  z.object({ type: z.literal('CURE'), kind: z.enum(STATUS_EFFECT_KIND) }),
]);
export type AbilityEffect = z.infer<typeof AbilityEffectSchema>;

export const AbilityDefinitionSchema = z.object({
  abilityId: z.string().regex(/^[a-z][a-z0-9_]*$/),
  name: z.string().min(1),
  description: z.string().default(''),
  manaCost: z.number().int().min(0),
  cooldown: z.number().int().min(0),
  /** Manhattan 거리. SELF 대상은 0 */
  range: z.number().int().min(0),
  target: z.enum(ABILITY_TARGET),
  effect: AbilityEffectSchema,
});
export type AbilityDefinition = z.infer<typeof AbilityDefinitionSchema>;

export const AiProfileSchema = z.object({
  behavior: z.enum(AI_BEHAVIOR),
  aggression: z.number().min(0).max(1),
  caution: z.number().min(0).max(1),
});
export type AiProfile = z.infer<typeof AiProfileSchema>;

export const EnemyArchetypeSchema = z.object({
  archetypeId: z.string().min(1),
  name: z.string().min(1),
  maxHealth: z.number().int().positive(),
  maxMana: z.number().int().min(0).default(0),
  manaRegen: z.number().int().min(0).default(0),
  attackPower: z.number().int().min(0),
  attackRange: z.number().int().min(1),
  abilities: z.array(z.string()).default([]),
  ai: AiProfileSchema,
  reward: z.object({
    experience: z.number().int().min(0),
    goldMin: z.number().int().min(0),
    goldMax: z.number().int().min(0),
  }),
});
export type EnemyArchetype = z.infer<typeof EnemyArchetypeSchema>;

export const PlayerDefaultsSchema = z.object({
  name: z.string().min(1),
  maxHealth: z.number().int().positive(),
  maxMana: z.number().int().min(0),
  manaRegen: z.number().int().min(0),
  attackPower: z.number().int().min(0),
  attackRange: z.number().int().min(1),
  abilities: z.array(z.string()),
});
export type PlayerDefaults = z.infer<typeof PlayerDefaultsSchema>;
