import { Inject, Injectable } from '@nestjs/common';
import {
  VARIANT_PIPELINE_CONFIG,
  type VariantPipelineConfig,
} from '../variants/ports/variant-pipeline-config.port';

export const VARIANT_SERVICE_NAME = 'variant-service';

@Injectable()
export class ServiceInfoQuery {
  constructor(
    @Inject(VARIANT_PIPELINE_CONFIG)
    private readonly config: VariantPipelineConfig,
  ) {}

  getInfo() {
    return {
      service: VARIANT_SERVICE_NAME,
      kind: 'http-service',
      status: 'ok',
      outputFormat: this.config.encode.outputFormat,
      sizes: this.config.catalog.map((entry) => ({ name: entry.name, width: entry.width })),
      timestamp: new Date().toISOString(),
    };
  }
}
