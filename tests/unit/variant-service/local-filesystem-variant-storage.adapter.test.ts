import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LocalFilesystemVariantStorageAdapter } from '../../../services/variant-service/src/infrastructure/storage/local-filesystem-variant-storage.adapter';

test('LocalFilesystemVariantStorageAdapter writes below the root and reads back', async () => {
  const root = await mkdtemp(path.join(tmpdir(), 'variant-storage-'));
  try {
    const storage = new LocalFilesystemVariantStorageAdapter();

    const stored = await storage.putObject({
      bucket: root,
      key: 'uploads/xs_cat.webp',
      body: Buffer.from('bytes'),
      contentType: 'image/webp',
      cacheControl: 'public, max-age=60',
    });

    assert.deepEqual(stored, {
      kind: 'location',
      key: 'uploads/xs_cat.webp',
      location: path.join(path.resolve(root), 'uploads', 'xs_cat.webp'),
    });
    const read = await storage.readObject(root, 'uploads/xs_cat.webp');
    assert.equal(read.buffer.toString(), 'bytes');
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test('LocalFilesystemVariantStorageAdapter refuses keys that escape the root', async () => {
  const storage = new LocalFilesystemVariantStorageAdapter();

  await assert.rejects(
    storage.putObject({
      bucket: path.join(tmpdir(), 'variant-root'),
      key: '../outside.webp',
      body: Buffer.from('x'),
      contentType: 'image/webp',
      cacheControl: 'public, max-age=60',
    }),
    /escapes the storage root/,
  );
});
