/**
 * IMPORT Stage
 * Goal: load lead records (and their validation results) into the store
 */

import * as fs from 'fs';
import * as path from 'path';
import { BaseStage } from '../base-stage';
import { leadService } from '../../state/lead-service';
import { LeadResolverConfig } from '../../config';
import { logger } from '../../lib/logger';
import { parseLeadsCsv, parseLeadsJson, ParseResult } from './parse';

export class ImportStage extends BaseStage {
  private readonly filePath: string;

  constructor(filePath: string, config?: LeadResolverConfig) {
    super('import', config);
    this.filePath = filePath;
  }

  protected async execute(): Promise<void> {
    if (!fs.existsSync(this.filePath)) {
      throw new Error(`Lead file not found: ${this.filePath}`);
    }

    const content = fs.readFileSync(this.filePath, 'utf-8');
    const parsed: ParseResult =
      path.extname(this.filePath).toLowerCase() === '.json' ? parseLeadsJson(content) : parseLeadsCsv(content);

    for (const rejected of parsed.rejected) {
      this.errors.push(`row ${rejected.row}: ${rejected.reason}`);
      logger.warn(`Skipping row ${rejected.row}`, { reason: rejected.reason });
    }

    this.processed = parsed.leads.length + parsed.rejected.length;
    this.failed = parsed.rejected.length;

    if (parsed.leads.length === 0) {
      logger.info('No leads to import');
      return;
    }

    const result = leadService.importLeads(parsed.leads);
    this.passed = result.inserted + result.updated;

    logger.info('Import complete', {
      file: this.filePath,
      inserted: result.inserted,
      updated: result.updated,
      rejected: parsed.rejected.length,
    });
  }
}

export { ImportStage as default };
