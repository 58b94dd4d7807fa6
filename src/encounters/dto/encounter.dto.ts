import { z } from 'zod';
import { STATUS_EFFECT_KIND } from '../../engine/types/enums.js';

const GridPositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const CreateEncounterBodySchema = z.object({
  seed: z.string().min(1).max(100).optional(),
  playerName: z.string().min(1).max(40).optional(),
  position: GridPositionSchema.optional().default({ x: 0, y: 0 }),
});
export type CreateEncounterBody = z.infer<typeof CreateEncounterBodySchema>;

export const SpawnEnemiesBodySchema = z.object({
  enemies: z
    .array(
      z.object({
        archetypeId: z.string().min(1).max(50),
        id: z.string().min(1).max(50).optional(),
        position: GridPositionSchema,
      }),
    )
    .min(1)
    .max(10),
});
export type SpawnEnemiesBody = z.infer<typeof SpawnEnemiesBodySchema>;

export const MovePlayerBodySchema = z.object({
  destination: GridPositionSchema,
});
export type MovePlayerBody = z.infer<typeof MovePlayerBodySchema>;

const priority = z.number().int().default(0);

export const CombatActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ATTACK'), targetId: z.string().min(1), priority }),
  z.object({ type: z.literal('DEFEND'), priority }),
  z.object({
    type: z.literal('USE_ABILITY'),
    abilityId: z.string().min(1),
    targetId: z.string().min(1),
    priority,
  }),
  z.object({ type: z.literal('MOVE'), destination: GridPositionSchema, priority }),
  z.object({ type: z.literal('WAIT'), priority }),
  z.object({ type: z.literal('FLEE'), priority }),
]);

export const AdvanceBodySchema = z.object({
  action: CombatActionSchema.optional(),
});
export type AdvanceBody = z.infer<typeof AdvanceBodySchema>;

/** duration/intensity 생략 시 정책 기본값 */
export const ApplyEffectBodySchema = z.object({
  kind: z.enum(STATUS_EFFECT_KIND),
  duration: z.number().int().positive().max(99).optional(),
  intensity: z.number().positive().max(99).optional(),
});
export type ApplyEffectBody = z.infer<typeof ApplyEffectBodySchema>;
