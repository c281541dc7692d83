import type {
  EncodeOptions,
  ImageSource,
  VariantPolicy,
} from '../../../domain/variants/variant-encoding';

export const VARIANT_IMAGE_ENCODER_PORT = Symbol('VARIANT_IMAGE_ENCODER_PORT');

export interface SourceImageInfo {
  width: number;
  height: number;
  format?: string;
}

export interface EncodeVariantInput {
  variantName: string;
  source: ImageSource;
  policy: VariantPolicy;
  options: EncodeOptions;
}

export interface EncodedVariant {
  variantName: string;
  buffer: Buffer;
  contentType: string;
  extension: string;
  width: number;
  height: number;
}

export interface VariantImageEncoderPort {
  /** Fails with DecodeError when the source is not a decodable image. */
  readSourceInfo(source: ImageSource): Promise<SourceImageInfo>;
  /** Fails with DecodeError or EncodeError; never retries. */
  encodeVariant(input: EncodeVariantInput): Promise<EncodedVariant>;
}
