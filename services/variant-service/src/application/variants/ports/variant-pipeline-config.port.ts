export const VARIANT_PIPELINE_CONFIG = Symbol('VARIANT_PIPELINE_CONFIG');

export type { VariantPipelineConfig } from '../../../domain/variants/pipeline-config';
