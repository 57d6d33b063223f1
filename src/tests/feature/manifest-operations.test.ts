import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  closeDatabase,
  deleteImage,
  getImageByReference,
  getManifest,
  initializeDatabase,
  insertImage,
  insertManifest,
  listManifestsForImage,
  transaction,
  type DatabaseAdapter,
} from '../../database/index.js';
import {
  normalizeImageReference,
  parseImageReference,
} from '../../utils/image-reference.js';
import { DOCKER_MANIFEST_MEDIA_TYPE, MANIFEST_MEDIA_TYPE } from '../utils/test-helpers.js';

describe('image and manifest operations', () => {
  let adapter: DatabaseAdapter;

  beforeEach(async () => {
    adapter = await initializeDatabase({ type: 'sqlite', path: ':memory:' });
  });

  afterEach(async () => {
    await closeDatabase();
  });

  describe('images', () => {
    it('should store the normalised reference', async () => {
      const id = await insertImage(adapter, { reference: 'alpine', sizeBytes: 3623807 });

      assert.deepStrictEqual(await getImageByReference(adapter, 'docker.io/library/alpine:latest'), {
        id,
        reference: 'docker.io/library/alpine:latest',
        sizeBytes: 3623807,
        lastUsedAt: null,
      });
    });

    it('should return the existing id for the same image under another spelling', async () => {
      const first = await insertImage(adapter, { reference: 'index.docker.io/library/nginx:1.27', sizeBytes: 1 });
      const second = await insertImage(adapter, { reference: 'nginx:1.27', sizeBytes: 1 });

      assert.strictEqual(second, first);
      const [row] = await adapter.getKnex()('images').count({ count: '*' });
      assert.strictEqual(Number(row?.count), 1);
    });

    it('should return null for an unknown reference', async () => {
      assert.strictEqual(await getImageByReference(adapter, 'ghcr.io/example/missing:1.0'), null);
    });
  });

  describe('manifests', () => {
    let imageId: number;

    beforeEach(async () => {
      imageId = await insertImage(adapter, { reference: 'ghcr.io/example/tool:1.0', sizeBytes: 1024 });
    });

    it('should round-trip annotations', async () => {
      const id = await insertManifest(adapter, {
        imageId,
        schemaVersion: 2,
        mediaType: MANIFEST_MEDIA_TYPE,
        annotations: { 'org.opencontainers.image.title': 'tool' },
      });

      const manifest = await getManifest(adapter, id);
      assert.ok(manifest);
      assert.strictEqual(manifest.imageId, imageId);
      assert.strictEqual(manifest.schemaVersion, 2);
      assert.strictEqual(manifest.mediaType, MANIFEST_MEDIA_TYPE);
      assert.deepStrictEqual(manifest.annotations, { 'org.opencontainers.image.title': 'tool' });
      assert.match(manifest.createdAt, /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });

    it('should store a manifest without annotations as null', async () => {
      const id = await insertManifest(adapter, { imageId, schemaVersion: 2, mediaType: DOCKER_MANIFEST_MEDIA_TYPE });
      assert.strictEqual((await getManifest(adapter, id))?.annotations, null);
    });

    it('should list an image\'s manifests in insertion order', async () => {
      const a = await insertManifest(adapter, { imageId, schemaVersion: 2, mediaType: MANIFEST_MEDIA_TYPE });
      const b = await insertManifest(adapter, { imageId, schemaVersion: 1, mediaType: DOCKER_MANIFEST_MEDIA_TYPE });

      const manifests = await listManifestsForImage(adapter, imageId);
      assert.deepStrictEqual(manifests.map(m => m.id), [a, b]);
    });

    it('should reject a manifest for an image that does not exist', async () => {
      await assert.rejects(
        insertManifest(adapter, { imageId: 999, schemaVersion: 2, mediaType: MANIFEST_MEDIA_TYPE }),
        /FOREIGN KEY constraint failed/
      );
    });

    it('should delete manifests together with their image', async () => {
      await insertManifest(adapter, { imageId, schemaVersion: 2, mediaType: MANIFEST_MEDIA_TYPE });

      assert.strictEqual(await deleteImage(adapter, imageId), true);
      assert.deepStrictEqual(await listManifestsForImage(adapter, imageId), []);
      assert.strictEqual(await deleteImage(adapter, imageId), false);
    });

    it('should refuse annotations that are not a JSON object', async () => {
      const [row] = await adapter.getKnex()('manifests')
        .insert({ image_id: imageId, schema_version: 2, media_type: MANIFEST_MEDIA_TYPE, annotations_json: '[1]' })
        .returning('id');
      assert.ok(row);

      await assert.rejects(getManifest(adapter, Number(row.id)), /annotations_json must hold a JSON object/);
    });

    it('should undo every insert of a failed transaction', async () => {
      await assert.rejects(
        transaction(async trx => {
          await insertManifest(adapter, { imageId, schemaVersion: 2, mediaType: MANIFEST_MEDIA_TYPE }, trx);
          await insertManifest(adapter, { imageId: 999, schemaVersion: 2, mediaType: MANIFEST_MEDIA_TYPE }, trx);
        }),
        /FOREIGN KEY constraint failed/
      );

      assert.deepStrictEqual(await listManifestsForImage(adapter, imageId), []);
    });
  });
});

describe('image references', () => {
  it('should qualify short Docker Hub names', () => {
    assert.strictEqual(normalizeImageReference('alpine'), 'docker.io/library/alpine:latest');
    assert.strictEqual(normalizeImageReference('someuser/app'), 'docker.io/someuser/app:latest');
    assert.strictEqual(normalizeImageReference('registry-1.docker.io/library/redis:7'), 'docker.io/library/redis:7');
  });

  it('should keep other registries, ports and digests', () => {
    const digest = `sha256:${'a'.repeat(64)}`;

    assert.deepStrictEqual(parseImageReference('localhost:5000/team/app:v2'), {
      registry: 'localhost:5000',
      repository: 'team/app',
      tag: 'v2',
      digest: null,
    });
    assert.strictEqual(
      normalizeImageReference(`ghcr.io/example/tool@${digest}`),
      `ghcr.io/example/tool@${digest}`
    );
  });

  it('should reject malformed references', () => {
    assert.throws(() => parseImageReference(''), { message: 'Invalid image reference: ""' });
    assert.throws(() => parseImageReference('Alpine'), { message: 'Invalid repository in image reference: "Alpine"' });
    assert.throws(() => parseImageReference('alpine:-rc'), { message: 'Invalid tag in image reference: "alpine:-rc"' });
    assert.throws(
      () => parseImageReference('alpine@sha256:xyz'),
      { message: 'Invalid digest in image reference: "alpine@sha256:xyz"' }
    );
  });
});
