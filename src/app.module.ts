import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TenantScopeGuard } from './auth/tenant-scope.guard';
import { SessionCatalog } from './catalog/session-catalog';
import { TypeOrmSessionCatalog } from './catalog/typeorm-session-catalog';
import { PipelineErrorFilter } from './common/pipeline-error.filter';
import { CompletionDetector } from './completion/completion-detector.service';
import { AppEnv, validateEnv } from './config/env.validation';
import { REDIS_CLIENT, RedisService } from './db/redis.service';
import { Session } from './db/session.entity';
import { ChunkIntakeService } from './intake/chunk-intake.service';
import { SessionDeclarationService } from './intake/session-declaration.service';
import { ChunkUploadConsumer } from './mq/chunk-upload.consumer';
import { MessageBus } from './mq/message-bus';
import { RabbitService } from './mq/rabbit.service';
import { PipelineOrchestrator } from './pipeline/pipeline.orchestrator';
import { PIPELINE_SETTINGS, pipelineSettingsFactory } from './pipeline/pipeline.settings';
import { PipelineLauncher } from './pipeline/pipeline.types';
import { FinalizeCatalogStage } from './pipeline/stages/finalize-catalog.stage';
import { PollTranscribeStage } from './pipeline/stages/poll-transcribe.stage';
import { StartTranscodeStage } from './pipeline/stages/start-transcode.stage';
import { StartTranscribeStage } from './pipeline/stages/start-transcribe.stage';
import { SummarizeStage } from './pipeline/stages/summarize.stage';
import { ValidateInputStage } from './pipeline/stages/validate-input.stage';
import { RedisSegmentRegistry } from './registry/redis-segment-registry';
import { SegmentRegistry } from './registry/segment-registry';
import { NotificationsController } from './routes/notifications.controller';
import { SessionsController } from './routes/sessions.controller';
import { ObjectStore } from './s3/object-store';
import { S3Service } from './s3/s3.service';
import { BedrockSummaryModel, SummaryModel } from './summary/summary-model';
import { LambdaTranscoder, Transcoder } from './workers/transcoder';
import { AwsTranscriber, Transcriber } from './workers/transcriber';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppEnv, true>) => {
        const log = new Logger('TypeORM');
        const synchronize = cfg.get('PG_SYNCHRONIZE', { infer: true });
        log.log(
          `🗄️  Connecting to postgres ${cfg.get('PG_HOST', { infer: true })}:${cfg.get('PG_PORT', { infer: true })}/${cfg.get('PG_DB', { infer: true })} (synchronize=${synchronize})`,
        );

        return {
          type: 'postgres',
          host: cfg.get('PG_HOST', { infer: true }),
          port: cfg.get('PG_PORT', { infer: true }),
          username: cfg.get('PG_USER', { infer: true }),
          password: cfg.get('PG_PASS', { infer: true }),
          database: cfg.get('PG_DB', { infer: true }),
          entities: [Session],
          synchronize,
        };
      },
    }),
    TypeOrmModule.forFeature([Session]),
  ],
  controllers: [SessionsController, NotificationsController],
  providers: [
    S3Service,
    { provide: ObjectStore, useExisting: S3Service },
    RedisService,
    {
      provide: REDIS_CLIENT,
      inject: [RedisService],
      useFactory: (redis: RedisService) => redis.hashClient,
    },
    RabbitService,
    { provide: MessageBus, useExisting: RabbitService },
    { provide: SegmentRegistry, useClass: RedisSegmentRegistry },
    { provide: SessionCatalog, useClass: TypeOrmSessionCatalog },
    {
      provide: PIPELINE_SETTINGS,
      inject: [ConfigService],
      useFactory: pipelineSettingsFactory,
    },
    { provide: Transcoder, useClass: LambdaTranscoder },
    { provide: Transcriber, useClass: AwsTranscriber },
    { provide: SummaryModel, useClass: BedrockSummaryModel },
    ValidateInputStage,
    StartTranscodeStage,
    StartTranscribeStage,
    PollTranscribeStage,
    SummarizeStage,
    FinalizeCatalogStage,
    PipelineOrchestrator,
    { provide: PipelineLauncher, useExisting: PipelineOrchestrator },
    CompletionDetector,
    ChunkIntakeService,
    SessionDeclarationService,
    ChunkUploadConsumer,
    { provide: APP_GUARD, useClass: TenantScopeGuard },
    { provide: APP_FILTER, useClass: PipelineErrorFilter },
  ],
})
export class AppModule {}
