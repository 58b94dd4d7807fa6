import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatusService } from './status/status.service.js';
import { ActionResolverService } from './combat/action-resolver.service.js';
import { EnemyAiService } from './combat/enemy-ai.service.js';
import { RewardsService } from './rewards/rewards.service.js';

// CombatConfigService 는 전역 CombatConfigModule 에서 주입
const providers = [
  // Layer 1
  RngService,
  // Layer 2: 상태이상 레지스트리
  StatusService,
  // Layer 3: 행동 적용 + AI
  ActionResolverService,
  EnemyAiService,
  // Layer 4
  RewardsService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
