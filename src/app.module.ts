import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Env, validateEnv } from './config/env.validation';
import { LlmModule } from './llm/llm.module';
import { ProspectsModule } from './prospects/prospects.module';
import { CampaignModule } from './campaign/campaign.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>) => {
        const env = configService.get('NODE_ENV', { infer: true });
        return {
          pinoHttp: {
            level: env === 'test' ? 'silent' : 'info',
            transport:
              env === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
            redact: ['req.headers.authorization', 'req.headers.cookie'],
          },
        };
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    LlmModule,
    ProspectsModule,
    CampaignModule,
  ],
})
export class AppModule {}
