import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ServiceInfoQuery } from './application/system/service-info.query';
import { SOURCE_OBJECT_READER_PORT } from './application/variants/ports/source-object-reader.port';
import { VARIANT_IMAGE_ENCODER_PORT } from './application/variants/ports/variant-image-encoder.port';
import { VARIANT_OBJECT_STORAGE_PORT } from './application/variants/ports/variant-object-storage.port';
import { VARIANT_PIPELINE_CONFIG } from './application/variants/ports/variant-pipeline-config.port';
import { StoreUploadableVersionsUseCase } from './application/variants/store-uploadable-versions.use-case';
import { UploadCompleteSetUseCase } from './application/variants/upload-complete-set.use-case';
import { VariantsApplicationService } from './application/variants/variants.application.service';
import {
  VARIANT_SERVICE_ENV_FILE_PATHS,
  VariantServiceConfigService,
  validateVariantServiceEnvironment,
} from './infrastructure/config/variant-service-config.service';
import { SharpVariantImageEncoderAdapter } from './infrastructure/imaging/sharp-variant-image-encoder.adapter';
import { MinioVariantObjectStorageAdapter } from './infrastructure/storage/minio-variant-object-storage.adapter';
import { AppController } from './presentation/http/system/app.controller';
import { VariantsController } from './presentation/http/variants/variants.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: VARIANT_SERVICE_ENV_FILE_PATHS,
      validate: validateVariantServiceEnvironment,
    }),
  ],
  controllers: [AppController, VariantsController],
  providers: [
    VariantServiceConfigService,
    {
      provide: VARIANT_PIPELINE_CONFIG,
      inject: [VariantServiceConfigService],
      useFactory: (config: VariantServiceConfigService) => config.toPipelineConfig(),
    },
    ServiceInfoQuery,
    MinioVariantObjectStorageAdapter,
    {
      provide: VARIANT_OBJECT_STORAGE_PORT,
      useExisting: MinioVariantObjectStorageAdapter,
    },
    {
      provide: SOURCE_OBJECT_READER_PORT,
      useExisting: MinioVariantObjectStorageAdapter,
    },
    SharpVariantImageEncoderAdapter,
    {
      provide: VARIANT_IMAGE_ENCODER_PORT,
      useExisting: SharpVariantImageEncoderAdapter,
    },
    UploadCompleteSetUseCase,
    StoreUploadableVersionsUseCase,
    VariantsApplicationService,
  ],
  exports: [UploadCompleteSetUseCase, StoreUploadableVersionsUseCase],
})
export class AppModule {}
