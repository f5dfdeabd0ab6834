/**
 * Font Registry
 *
 * Bundled caption fonts are copied once into a working directory that the
 * subtitles filter can read through `fontsdir`. The registry is created and
 * owned by the caller; initialize() is idempotent and concurrent callers share
 * the same copy operation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './log';

const log = createLogger('FONTS');

const FONT_FILE_RE = /\.(ttf|otf)$/i;

/**
 * `Montserrat-Regular.ttf` -> `Montserrat`
 * `Montserrat-Bold.ttf`    -> `Montserrat Bold`
 * `BebasNeue-Regular.ttf`  -> `Bebas Neue`
 */
export function fontDisplayName(filename: string): string {
  const name = filename.replace(FONT_FILE_RE, '');
  const [rawBase, variant = ''] = name.split('-');
  const base = rawBase.replace(/([a-z])([A-Z])/g, '$1 $2');
  return variant && variant.toLowerCase() !== 'regular' ? `${base} ${variant}` : base;
}

export class FontRegistry {
  private initializing: Promise<string> | null = null;
  private dir: string | null = null;

  /**
   * @param sourceDir - directory holding the bundled .ttf/.otf files
   * @param workDir - writable directory; fonts land in `<workDir>/fonts`
   */
  constructor(
    private readonly sourceDir: string,
    private readonly workDir: string
  ) {}

  /** Directory to pass as fontsdir, or undefined before initialize() finished */
  get fontsDir(): string | undefined {
    return this.dir ?? undefined;
  }

  initialize(): Promise<string> {
    if (!this.initializing) {
      this.initializing = this.copyFonts().catch((err: unknown) => {
        this.initializing = null;
        throw err;
      });
    }
    return this.initializing;
  }

  private async copyFonts(): Promise<string> {
    const target = path.join(this.workDir, 'fonts');
    await fs.promises.mkdir(target, { recursive: true });

    const files = (await fs.promises.readdir(this.sourceDir)).filter((f) => FONT_FILE_RE.test(f));
    for (const file of files) {
      const dest = path.join(target, file);
      if (fs.existsSync(dest)) continue;
      await fs.promises.copyFile(path.join(this.sourceDir, file), dest);
      log.debug(`Copied ${fontDisplayName(file)} to ${dest}`);
    }

    log.info(`Bundled fonts ready in ${target} (${files.length} file(s))`);
    this.dir = target;
    return target;
  }

  /** Display names of the bundled fonts, sorted, without duplicates */
  async listFonts(): Promise<string[]> {
    const files = await fs.promises.readdir(this.sourceDir);
    const names = new Set(files.filter((f) => FONT_FILE_RE.test(f)).map(fontDisplayName));
    return [...names].sort();
  }
}
