import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandRecords, IdentityGallery, JsonGallerySource, MongoGallerySource } from '../gallery.js';
import { silentLogger } from '../../testing/fakes.js';

describe('IdentityGallery', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gallery-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads one identity per stored embedding', async () => {
    const file = path.join(dir, 'gallery.json');
    await fs.writeFile(
      file,
      JSON.stringify([
        { name: 'Asha', relation: 'sister', embeddings: [[0.1, 0.2], [0.2, 0.1]] },
        { name: 'Ravi', embeddings: [[0.5, 0.5]] }
      ])
    );

    const gallery = new IdentityGallery(new JsonGallerySource(file), silentLogger());
    expect(await gallery.load()).toBe(3);
    expect(gallery.entries().map((entry) => entry.name)).toEqual(['Asha', 'Asha', 'Ravi']);
    expect(gallery.entries()[2]?.relation).toBeNull();
  });

  it('falls back to an empty gallery when the file is missing', async () => {
    const gallery = new IdentityGallery(new JsonGallerySource(path.join(dir, 'missing.json')), silentLogger());
    expect(await gallery.load()).toBe(0);
    expect(gallery.isEmpty()).toBe(true);
  });

  it('falls back to an empty gallery when records are malformed', async () => {
    const file = path.join(dir, 'gallery.json');
    await fs.writeFile(file, JSON.stringify([{ name: 'Asha', embeddings: 'nope' }]));
    const gallery = new IdentityGallery(new JsonGallerySource(file), silentLogger());
    expect(await gallery.load()).toBe(0);
  });

  it('picks up changes on reload', async () => {
    const file = path.join(dir, 'gallery.json');
    await fs.writeFile(file, JSON.stringify([]));
    const gallery = new IdentityGallery(new JsonGallerySource(file), silentLogger());
    await gallery.load();
    await fs.writeFile(file, JSON.stringify([{ name: 'Kim', relation: null, embeddings: [[1]] }]));
    expect(await gallery.reload()).toBe(1);
  });
});

describe('expandRecords', () => {
  it('keeps record order and defaults the relation to null', () => {
    expect(expandRecords([{ name: 'Kim', embeddings: [[1], [2]] }])).toEqual([
      { name: 'Kim', relation: null, embedding: [1] },
      { name: 'Kim', relation: null, embedding: [2] }
    ]);
  });
});

describe('MongoGallerySource', () => {
  it('skips stored documents that do not fit the record shape', async () => {
    const source = new MongoGallerySource({
      listIdentities: async () => [
        { name: 'Asha', relation: 'sister', embeddings: [[0.1, 0.2]], updatedAt: new Date(0) },
        { name: '', embeddings: [[0.3]] }
      ]
    });
    expect(await source.loadRecords()).toEqual([
      { name: 'Asha', relation: 'sister', embeddings: [[0.1, 0.2]] }
    ]);
  });
});
