import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Env } from '../config/env.validation';
import {
  ProspectExportService,
  ProspectRow,
} from '../prospects/prospect-export';
import { rethrowLoadError } from '../prospects/prospects-file.http';
import { CampaignConfigurationError } from './campaign.errors';
import {
  CampaignResult,
  CampaignService,
  EmailPreview,
} from './campaign.service';
import { CampaignRequestDto, ProspectRowDto } from './dto/campaign-request.dto';

function toRow(dto: ProspectRowDto): ProspectRow {
  return {
    name: dto.name ?? '',
    title: dto.title ?? '',
    company: dto.company,
    website: dto.website ?? '',
    email: dto.email ?? '',
    country: dto.country ?? '',
    industry: dto.industry ?? '',
    description: dto.description ?? '',
  };
}

@Controller('campaigns')
export class CampaignController {
  constructor(
    private readonly campaignService: CampaignService,
    private readonly exportService: ProspectExportService,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  @Post('preview')
  @HttpCode(HttpStatus.OK)
  async preview(
    @Body() dto: CampaignRequestDto,
  ): Promise<{ total: number; previews: EmailPreview[] }> {
    const rows = await this.resolveRows(dto);
    return {
      total: rows.length,
      previews: this.campaignService.preview(rows, dto.limit),
    };
  }

  @Post('send')
  @HttpCode(HttpStatus.OK)
  async send(@Body() dto: CampaignRequestDto): Promise<CampaignResult> {
    const rows = await this.resolveRows(dto);
    try {
      return await this.campaignService.send(rows);
    } catch (error: unknown) {
      if (error instanceof CampaignConfigurationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  private async resolveRows(dto: CampaignRequestDto): Promise<ProspectRow[]> {
    if (dto.prospects) {
      return dto.prospects.map(toRow);
    }

    const path = this.configService.get('PROSPECTS_CSV_PATH', { infer: true });
    try {
      return await this.exportService.load(path);
    } catch (error: unknown) {
      rethrowLoadError(error);
    }
  }
}
