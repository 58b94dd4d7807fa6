import { Global, Module } from '@nestjs/common';
import { CombatConfigService } from './combat-config.service.js';
import { CombatSettingsController } from './combat-settings.controller.js';

@Global()
@Module({
  controllers: [CombatSettingsController],
  providers: [CombatConfigService],
  exports: [CombatConfigService],
})
export class CombatConfigModule {}
