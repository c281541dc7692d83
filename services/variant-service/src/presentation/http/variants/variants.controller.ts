import { Body, Controller, Headers, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { VariantsApplicationService } from '../../../application/variants/variants.application.service';
import type { CreateVariantSetRequestBody } from './variants.http-types';

@Controller()
export class VariantsController {
  constructor(private readonly variantsService: VariantsApplicationService) {}

  @Post('variants')
  @HttpCode(HttpStatus.CREATED)
  async createVariantSet(
    @Body() body: CreateVariantSetRequestBody,
    @Headers('x-correlation-id') correlationId?: string,
  ) {
    return this.variantsService.createFromStoredObject({
      sourceBucket: body?.sourceBucket,
      sourceObjectKey: body?.sourceObjectKey,
      prefix: body?.prefix,
      fileName: body?.fileName,
      keepSourceName: body?.keepSourceName,
      correlationId,
    });
  }
}
