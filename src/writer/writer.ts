import dayjs from 'dayjs';
import fs from 'fs-extra';
import path from 'path';
import type { SyncScript } from '../types/comparison.js';
import { renderSyncScript } from '../core/syncGenerator.js';
import { logger } from '../utils/logger.js';

export class SyncScriptWriter {
  private filePath: string;

  constructor(outputDir: string, fileName: string) {
    this.filePath = path.isAbsolute(fileName) ? fileName : path.join(outputDir, fileName);
  }

  renderHeader(masterLabel: string, targetLabel: string, date: Date = new Date()): string {
    return [
      `-- Sync script: bring ${targetLabel} in line with ${masterLabel}`,
      `-- Date: ${dayjs(date).format('YYYY-MM-DD HH:mm:ss')}`,
      `-- Review before running; nothing here has been executed.`,
      `-- --------------------------------------------------`,
      '',
      '',
    ].join('\n');
  }

  async write(script: SyncScript, masterLabel: string, targetLabel: string): Promise<string> {
    await fs.outputFile(this.filePath, this.renderHeader(masterLabel, targetLabel) + renderSyncScript(script), 'utf-8');
    logger.info(`Successfully generated SQL script: ${this.filePath}`);
    return this.filePath;
  }

  getFilePath() {
    return this.filePath;
  }
}
