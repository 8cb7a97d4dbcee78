import { Module } from '@nestjs/common';

import { SimulationConfigLoaderService } from './simulation-config-loader.service';

@Module({
  providers: [SimulationConfigLoaderService],
  exports: [SimulationConfigLoaderService],
})
export class SimulationConfigModule {}
