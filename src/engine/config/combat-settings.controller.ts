// 전투 설정 API: 도주 확률, 기본 시드 런타임 변경

import { Body, Controller, Get, Patch } from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe.js';
import { CombatConfigService, type CombatConfigPatch } from './combat-config.service.js';

export const CombatSettingsPatchSchema = z
  .object({
    fleeChance: z.number().min(0).max(1).optional(),
    defaultSeed: z.string().min(1).max(100).optional(),
  })
  .strict();

@Controller('v1/settings/combat')
export class CombatSettingsController {
  constructor(private readonly configService: CombatConfigService) {}

  @Get()
  getSettings() {
    const { fleeChance, defaultSeed, defend } = this.configService.get();
    return { fleeChance, defaultSeed, defend };
  }

  /** 다음 행동 판정부터 반영 (진행 중인 조우 포함) */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(CombatSettingsPatchSchema)) body: CombatConfigPatch,
  ) {
    const { fleeChance, defaultSeed, defend } = this.configService.update(body);
    return {
      message: 'Combat settings updated.',
      fleeChance,
      defaultSeed,
      defend,
    };
  }
}
