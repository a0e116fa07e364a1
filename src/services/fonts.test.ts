import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { registerFontDirectory } from './fonts';

const registerFromPath = vi.hoisted(() => vi.fn((_path: string, _alias?: string) => true));

vi.mock('@napi-rs/canvas', () => ({
  GlobalFonts: { registerFromPath },
}));

let fontDir: string;

beforeEach(async () => {
  registerFromPath.mockClear();
  fontDir = await mkdtemp(path.join(tmpdir(), 'card-fonts-'));
});

afterEach(async () => {
  await rm(fontDir, { recursive: true, force: true });
});

describe('registerFontDirectory', () => {
  it('registers font files under their file stem', async () => {
    for (const name of ['Inter-Bold.ttf', 'Serif.OTF', 'README.md']) {
      await writeFile(path.join(fontDir, name), '');
    }

    const families = await registerFontDirectory(fontDir);

    expect(families).toEqual(['Inter-Bold', 'Serif']);
    expect(registerFromPath.mock.calls).toEqual([
      [path.join(fontDir, 'Inter-Bold.ttf'), 'Inter-Bold'],
      [path.join(fontDir, 'Serif.OTF'), 'Serif'],
    ]);
  });

  it('leaves out fonts the backend rejects', async () => {
    await writeFile(path.join(fontDir, 'Broken.ttf'), '');
    registerFromPath.mockReturnValueOnce(false);

    expect(await registerFontDirectory(fontDir)).toEqual([]);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await registerFontDirectory(path.join(fontDir, 'missing'))).toEqual([]);
    expect(registerFromPath).not.toHaveBeenCalled();
  });
});
