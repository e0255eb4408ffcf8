/**
 * Optical Character Recognition
 *
 * One tesseract.js worker per parse, terminated when the parse ends.
 */

import fs from 'fs';
import { createWorker, type Worker } from 'tesseract.js';
import { config, logger, type OcrEngine } from '@statement-insight/shared';
import { resolveLanguageDataPath } from './language-data';

function ensureCacheDir(dir: string): void {
  if (dir && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export class TesseractOcrEngine implements OcrEngine {
  private constructor(private readonly worker: Worker) {}

  static async create(language: string = config.ocrLanguage): Promise<TesseractOcrEngine> {
    ensureCacheDir(config.tesseractCacheDir);

    const langPath = resolveLanguageDataPath(language);
    const worker = await createWorker(language, undefined, {
      langPath,
      cachePath: config.tesseractCacheDir || undefined,
    });

    logger.debug('Tesseract worker ready', { language, langPath });
    return new TesseractOcrEngine(worker);
  }

  async recognize(image: Buffer): Promise<string> {
    const { data } = await this.worker.recognize(image);
    return data.text ?? '';
  }

  async terminate(): Promise<void> {
    await this.worker.terminate();
  }
}
