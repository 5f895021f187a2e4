import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Env } from '../config/env.validation';
import { GenerateProspectsDto } from './dto/generate-prospects.dto';
import {
  GeneratedProspects,
  ProspectGeneratorService,
} from './prospect-generator.service';
import { ProspectExportService, rowsToCsv } from './prospect-export';
import { NoProvidersConfiguredError, RateLimitedError } from './prospect.errors';
import { rethrowLoadError } from './prospects-file.http';

@Controller('prospects')
export class ProspectsController {
  constructor(
    private readonly generator: ProspectGeneratorService,
    private readonly exportService: ProspectExportService,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  @Post('generate')
  @HttpCode(HttpStatus.OK)
  async generate(
    @Body() dto: GenerateProspectsDto,
  ): Promise<GeneratedProspects> {
    const count = dto.count ?? 10;
    const result = dto.fallbackOnly
      ? this.generator.generateFallback(dto.icp, count)
      : await this.runGenerator(dto.icp, count);

    await this.exportService.save(
      result.companies,
      this.configService.get('PROSPECTS_CSV_PATH', { infer: true }),
    );
    return result;
  }

  @Get('providers')
  providers(): { providers: string[] } {
    return { providers: this.generator.listProviders() };
  }

  @Get('export')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  async export(): Promise<string> {
    const path = this.configService.get('PROSPECTS_CSV_PATH', { infer: true });
    try {
      const rows = await this.exportService.load(path);
      return rowsToCsv(rows);
    } catch (error: unknown) {
      rethrowLoadError(error);
    }
  }

  private async runGenerator(
    icp: string,
    count: number,
  ): Promise<GeneratedProspects> {
    try {
      return await this.generator.generate(icp, count);
    } catch (error: unknown) {
      if (error instanceof RateLimitedError) {
        throw new HttpException(
          { statusCode: HttpStatus.TOO_MANY_REQUESTS, message: error.message },
          HttpStatus.TOO_MANY_REQUESTS,
        );
      }
      if (error instanceof NoProvidersConfiguredError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
