import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { fontDisplayName, FontRegistry } from '../../../main/services/fonts';

describe('fonts', () => {
  describe('fontDisplayName', () => {
    it('drops the Regular variant and splits camel case', () => {
      expect(fontDisplayName('Montserrat-Regular.ttf')).toBe('Montserrat');
      expect(fontDisplayName('BebasNeue-Regular.ttf')).toBe('Bebas Neue');
    });

    it('keeps other variants', () => {
      expect(fontDisplayName('Montserrat-Bold.ttf')).toBe('Montserrat Bold');
    });

    it('handles names without a variant', () => {
      expect(fontDisplayName('Roboto.otf')).toBe('Roboto');
    });
  });

  describe('FontRegistry', () => {
    let root: string;
    let source: string;
    let work: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'fonts-test-'));
      source = path.join(root, 'bundled');
      work = path.join(root, 'work');
      fs.mkdirSync(source);
      for (const file of ['Montserrat-Regular.ttf', 'Montserrat-Bold.ttf', 'BebasNeue-Regular.otf', 'readme.txt']) {
        fs.writeFileSync(path.join(source, file), file);
      }
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it('lists display names sorted and without duplicates', async () => {
      fs.writeFileSync(path.join(source, 'Montserrat-Regular.otf'), 'dup');
      expect(await new FontRegistry(source, work).listFonts()).toEqual(['Bebas Neue', 'Montserrat', 'Montserrat Bold']);
    });

    it('copies font files into <workDir>/fonts', async () => {
      const registry = new FontRegistry(source, work);
      expect(registry.fontsDir).toBeUndefined();

      const dir = await registry.initialize();

      expect(dir).toBe(path.join(work, 'fonts'));
      expect(registry.fontsDir).toBe(dir);
      expect(fs.readdirSync(dir).sort()).toEqual(['BebasNeue-Regular.otf', 'Montserrat-Bold.ttf', 'Montserrat-Regular.ttf']);
    });

    it('shares one initialization between concurrent callers', async () => {
      const registry = new FontRegistry(source, work);
      const first = registry.initialize();
      expect(registry.initialize()).toBe(first);
      await first;
    });

    it('leaves fonts that are already in place untouched', async () => {
      const target = path.join(work, 'fonts');
      fs.mkdirSync(target, { recursive: true });
      fs.writeFileSync(path.join(target, 'Montserrat-Bold.ttf'), 'custom');

      await new FontRegistry(source, work).initialize();

      expect(fs.readFileSync(path.join(target, 'Montserrat-Bold.ttf'), 'utf8')).toBe('custom');
    });

    it('can retry after a failed initialization', async () => {
      const missing = path.join(root, 'missing');
      const registry = new FontRegistry(missing, work);
      await expect(registry.initialize()).rejects.toThrow();

      fs.mkdirSync(missing);
      await expect(registry.initialize()).resolves.toBe(path.join(work, 'fonts'));
    });
  });
});
