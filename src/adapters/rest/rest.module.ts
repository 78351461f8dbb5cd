import { Module } from '@nestjs/common';
import { BuildingsController } from './controllers/buildings.controller';
import { HealthController } from './controllers/health.controller';
import { ScanController } from './controllers/scan.controller';

@Module({
  controllers: [BuildingsController, ScanController, HealthController],
})
export class RestModule {}
