import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { prospectMetricsProviders } from '../common/metrics.providers';
import { LlmModule } from '../llm/llm.module';
import { ProspectExportService } from './prospect-export';
import { ProspectGeneratorService } from './prospect-generator.service';
import { ProspectsController } from './prospects.controller';

@Module({
  imports: [ConfigModule, LlmModule],
  controllers: [ProspectsController],
  providers: [
    ProspectGeneratorService,
    ProspectExportService,
    ...prospectMetricsProviders,
  ],
  exports: [ProspectGeneratorService, ProspectExportService],
})
export class ProspectsModule {}
