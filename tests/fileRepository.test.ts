import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { fitToBox, ManifestFileRepository } from '../src/wiki/fileRepository';

vi.mock('../src/utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const urls = { baseUrl: '/images', thumbBaseUrl: '/images/thumb' };
const tmpDir = path.join(process.cwd(), 'tests', 'tmp', 'file-repository');

afterEach(async () => {
  await fs.remove(tmpDir);
});

describe('fitToBox', () => {
  it('should scale by the tighter dimension', () => {
    expect(fitToBox(1600, 1067, { width: 50, height: 50 })).toEqual({ width: 50, height: 33 });
    expect(fitToBox(240, 480, { width: 50, height: 50 })).toEqual({ width: 25, height: 50 });
  });

  it('should give up on files without dimensions', () => {
    expect(fitToBox(0, 100, { width: 50, height: 50 })).toBeNull();
  });
});

describe('ManifestFileRepository', () => {
  const repository = new ManifestFileRepository([
    { name: 'Harbour at dusk.jpg', width: 1600, height: 1067 },
    { name: 'Stub_icon.png', width: 40, height: 40, url: 'https://cdn.example.org/Stub_icon.png' },
  ], urls);

  it('should find files by any spelling of their name', async () => {
    expect((await repository.findFile('File:Harbour at dusk.jpg'))?.name).toBe('Harbour_at_dusk.jpg');
    expect((await repository.findFile('harbour_at_dusk.jpg'))?.url).toBe('/images/Harbour_at_dusk.jpg');
    expect(await repository.findFile('Missing.jpg')).toBeNull();
  });

  it('should link thumbnails smaller than the original', async () => {
    const file = await repository.findFile('Harbour_at_dusk.jpg');
    expect(file?.transform({ width: 120, height: 120 })).toEqual({
      url: '/images/thumb/Harbour_at_dusk.jpg/120px-Harbour_at_dusk.jpg',
      width: 120,
      height: 80,
    });
  });

  it('should serve the original when the box is larger', async () => {
    const file = await repository.findFile('Stub_icon.png');
    expect(file?.transform({ width: 50, height: 50 })).toEqual({
      url: 'https://cdn.example.org/Stub_icon.png',
      width: 50,
      height: 50,
    });
  });

  it('should load a manifest file', async () => {
    const manifest = path.join(tmpDir, 'files.json');
    await fs.outputJson(manifest, [{ name: 'Pier.jpg', width: 800, height: 600 }]);

    const loaded = ManifestFileRepository.fromFile(manifest, urls);
    expect((await loaded.findFile('Pier.jpg'))?.width).toBe(800);
  });

  it('should start empty from a malformed manifest', async () => {
    const manifest = path.join(tmpDir, 'files.json');
    await fs.outputJson(manifest, [{ name: 'Pier.jpg', width: 'wide' }]);

    expect(await ManifestFileRepository.fromFile(manifest, urls).findFile('Pier.jpg')).toBeNull();
  });
});
