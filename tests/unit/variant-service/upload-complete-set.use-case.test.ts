import test from 'node:test';
import assert from 'node:assert/strict';
import { UploadCompleteSetUseCase } from '../../../services/variant-service/src/application/variants/upload-complete-set.use-case';
import { resolveSizeCatalog } from '../../../services/variant-service/src/domain/variants/size-catalog';
import {
  ConfigError,
  DecodeError,
  EncodeError,
  StorageError,
} from '../../../services/variant-service/src/domain/variants/variant-errors';
import { createPipelineConfig, FakeEncoder, FakeStorage } from './fakes';

const SOURCE = Buffer.from('source-image');

test('UploadCompleteSetUseCase stores one object per size and returns the URL map', async () => {
  const encoder = new FakeEncoder();
  const storage = new FakeStorage();
  const useCase = new UploadCompleteSetUseCase(encoder, storage, createPipelineConfig());

  const result = await useCase.execute({ source: SOURCE, fileName: 'cat.png', keepSourceName: true });

  assert.equal(result.uploadId, 'cat');
  assert.deepEqual(result.urls, {
    '320': 'http://storage.test/images/uploads/xs_cat.webp',
    '768': 'http://storage.test/images/uploads/sm_cat.webp',
    default: 'http://storage.test/images/uploads/sm_cat.webp',
    thumbnail: 'http://storage.test/images/uploads/xs_cat.webp',
  });
  assert.deepEqual(
    storage.puts.map((put) => put.key).sort(),
    ['uploads/sm_cat.webp', 'uploads/xs_cat.webp'],
  );
  assert.ok(storage.puts.every((put) => put.cacheControl === 'public, max-age=3600'));
  assert.ok(storage.puts.every((put) => put.contentType === 'image/webp'));
  assert.deepEqual(
    encoder.encoded.map((input) => input.policy),
    [{ kind: 'width', width: 320 }, { kind: 'width', width: 768 }],
  );
});

test('UploadCompleteSetUseCase shares one generated upload id across variants', async () => {
  const storage = new FakeStorage();
  const useCase = new UploadCompleteSetUseCase(new FakeEncoder(), storage, createPipelineConfig());

  const result = await useCase.execute({ source: SOURCE, fileName: 'cat.png', prefix: 'albums/7' });

  assert.match(result.uploadId, /^[0-9a-f-]{36}$/);
  assert.deepEqual(
    storage.puts.map((put) => put.key).sort(),
    [`albums/7/sm_${result.uploadId}.webp`, `albums/7/xs_${result.uploadId}.webp`],
  );
});

test('UploadCompleteSetUseCase uses the asset host for URLs when configured', async () => {
  const useCase = new UploadCompleteSetUseCase(
    new FakeEncoder(),
    new FakeStorage(),
    createPipelineConfig({ assetHost: 'https://assets.test' }),
  );

  const result = await useCase.execute({ source: SOURCE, fileName: 'dog.jpg', keepSourceName: true });

  assert.equal(result.urls.default, 'https://assets.test/uploads/sm_dog.webp');
  assert.equal(result.urls.thumbnail, 'https://assets.test/uploads/xs_dog.webp');
});

test('UploadCompleteSetUseCase fails with StorageError naming the variant and returns no map', async () => {
  const storage = new FakeStorage();
  storage.failingKeys.add('uploads/sm_cat.webp');
  const useCase = new UploadCompleteSetUseCase(new FakeEncoder(), storage, createPipelineConfig());

  await assert.rejects(
    useCase.execute({ source: SOURCE, fileName: 'cat.png', keepSourceName: true }),
    (error: unknown) => {
      assert.ok(error instanceof StorageError);
      assert.equal(error.variantName, 'sm');
      assert.equal(error.code, 'STORAGE_ERROR');
      return true;
    },
  );
});

test('UploadCompleteSetUseCase fails with ConfigError before any I/O when no bucket is set', async () => {
  const encoder = new FakeEncoder();
  const storage = new FakeStorage();
  const useCase = new UploadCompleteSetUseCase(encoder, storage, createPipelineConfig({ bucket: undefined }));

  await assert.rejects(useCase.execute({ source: SOURCE }), ConfigError);
  assert.equal(storage.puts.length, 0);
  assert.equal(encoder.encoded.length, 0);
});

test('UploadCompleteSetUseCase surfaces DecodeError before any upload', async () => {
  const encoder = new FakeEncoder();
  encoder.decodeFailure = new DecodeError('Source image cannot be decoded: bad header');
  const storage = new FakeStorage();
  const useCase = new UploadCompleteSetUseCase(encoder, storage, createPipelineConfig());

  await assert.rejects(useCase.execute({ source: Buffer.from('not an image') }), DecodeError);
  assert.equal(storage.puts.length, 0);
  assert.equal(encoder.encoded.length, 0);
});

test('UploadCompleteSetUseCase keeps dotted source names intact in object keys', async () => {
  const storage = new FakeStorage();
  const useCase = new UploadCompleteSetUseCase(new FakeEncoder(), storage, createPipelineConfig());

  const first = await useCase.execute({ source: SOURCE, fileName: 'hero.v1.png', keepSourceName: true });
  const second = await useCase.execute({ source: SOURCE, fileName: 'hero.v2.png', keepSourceName: true });

  assert.equal(first.uploadId, 'hero.v1');
  assert.equal(second.uploadId, 'hero.v2');
  assert.equal(first.urls.default, 'http://storage.test/images/uploads/sm_hero.v1.webp');
  assert.equal(second.urls.default, 'http://storage.test/images/uploads/sm_hero.v2.webp');
  assert.deepEqual(
    storage.puts.map((put) => put.key).sort(),
    ['uploads/sm_hero.v1.webp', 'uploads/sm_hero.v2.webp', 'uploads/xs_hero.v1.webp', 'uploads/xs_hero.v2.webp'],
  );
});

test('UploadCompleteSetUseCase aborts with EncodeError and starts no later variants', async () => {
  const encoder = new FakeEncoder();
  encoder.failingVariants.add('sm');
  const storage = new FakeStorage();
  const config = createPipelineConfig({
    catalog: resolveSizeCatalog([['xs', 320], ['sm', 768], ['md', 1024]]),
    uploadConcurrency: 1,
  });
  const useCase = new UploadCompleteSetUseCase(encoder, storage, config);

  let result: unknown;
  await assert.rejects(
    (async () => {
      result = await useCase.execute({ source: SOURCE, fileName: 'cat.png', keepSourceName: true });
    })(),
    (error: unknown) => {
      assert.ok(error instanceof EncodeError);
      assert.equal(error.variantName, 'sm');
      assert.equal(error.message, 'Failed to encode variant "sm": codec crashed on sm');
      return true;
    },
  );
  assert.equal(result, undefined);
  assert.deepEqual(encoder.encoded.map((input) => input.variantName), ['xs', 'sm']);
  assert.deepEqual(storage.puts.map((put) => put.key), ['uploads/xs_cat.webp']);
});
