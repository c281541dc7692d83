import test from 'node:test';
import assert from 'node:assert/strict';
import sharp from 'sharp';
import { SharpVariantImageEncoderAdapter, pngOutputOptions } from '../../../services/variant-service/src/infrastructure/imaging/sharp-variant-image-encoder.adapter';
import { DEFAULT_ENCODE_OPTIONS } from '../../../services/variant-service/src/domain/variants/variant-encoding';
import { DecodeError, EncodeError } from '../../../services/variant-service/src/domain/variants/variant-errors';

function createSourceImage(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } },
  })
    .png()
    .toBuffer();
}

test('SharpVariantImageEncoderAdapter resizes to the exact width and keeps the aspect ratio', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();
  const source = await createSourceImage(800, 400);

  const encoded = await encoder.encodeVariant({
    variantName: 'xs',
    source,
    policy: { kind: 'width', width: 320 },
    options: DEFAULT_ENCODE_OPTIONS,
  });

  assert.equal(encoded.width, 320);
  assert.equal(encoded.height, 160);
  assert.equal(encoded.contentType, 'image/webp');
  assert.equal(encoded.extension, 'webp');

  const metadata = await sharp(encoded.buffer).metadata();
  assert.equal(metadata.format, 'webp');
  assert.equal(metadata.width, 320);
});

test('SharpVariantImageEncoderAdapter upscales a narrow source to the requested width', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();
  const source = await createSourceImage(100, 50);

  const encoded = await encoder.encodeVariant({
    variantName: 'sm',
    source,
    policy: { kind: 'width', width: 200 },
    options: { ...DEFAULT_ENCODE_OPTIONS, outputFormat: 'jpeg' },
  });

  assert.equal(encoded.width, 200);
  assert.equal(encoded.height, 100);
  assert.equal(encoded.extension, 'jpg');
  assert.equal(encoded.contentType, 'image/jpeg');
});

test('SharpVariantImageEncoderAdapter fits thumbnails inside 320x320', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();
  const source = await createSourceImage(400, 800);

  const encoded = await encoder.encodeVariant({
    variantName: 'thumbnail',
    source,
    policy: { kind: 'thumbnail' },
    options: { ...DEFAULT_ENCODE_OPTIONS, outputFormat: 'png' },
  });

  assert.equal(encoded.width, 160);
  assert.equal(encoded.height, 320);
});

test('SharpVariantImageEncoderAdapter keeps the source size for the original version', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();
  const source = await createSourceImage(64, 48);

  const encoded = await encoder.encodeVariant({
    variantName: 'original',
    source,
    policy: { kind: 'original' },
    options: DEFAULT_ENCODE_OPTIONS,
  });

  assert.equal(encoded.width, 64);
  assert.equal(encoded.height, 48);
});

test('SharpVariantImageEncoderAdapter reports undecodable input as DecodeError', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();

  await assert.rejects(encoder.readSourceInfo(Buffer.from('definitely not an image')), DecodeError);
  await assert.rejects(
    encoder.encodeVariant({
      variantName: 'xs',
      source: Buffer.from('definitely not an image'),
      policy: { kind: 'width', width: 320 },
      options: DEFAULT_ENCODE_OPTIONS,
    }),
    (error: unknown) => error instanceof DecodeError && error.variantName === 'xs',
  );
});

test('SharpVariantImageEncoderAdapter reports codec failures as EncodeError', async () => {
  const encoder = new SharpVariantImageEncoderAdapter();
  const source = await createSourceImage(100, 1);

  await assert.rejects(
    encoder.encodeVariant({
      variantName: 'huge',
      source,
      // webp output is limited to 16383 pixels per side
      policy: { kind: 'width', width: 20000 },
      options: DEFAULT_ENCODE_OPTIONS,
    }),
    (error: unknown) => error instanceof EncodeError && error.variantName === 'huge',
  );
});

test('pngOutputOptions passes quality and effort through to the png encoder', () => {
  assert.deepEqual(pngOutputOptions({ ...DEFAULT_ENCODE_OPTIONS, outputFormat: 'png', quality: 60, effort: 4 }), {
    quality: 60,
    effort: 4,
    compressionLevel: 9,
    adaptiveFiltering: true,
  });
  assert.deepEqual(
    pngOutputOptions({ ...DEFAULT_ENCODE_OPTIONS, outputFormat: 'png', effort: 15, minimizeFileSize: false }),
    { quality: 75, effort: 10, compressionLevel: 6, adaptiveFiltering: false },
  );
});
