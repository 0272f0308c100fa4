/**
 * Base stage class - all pipeline stages extend this
 * Provides common functionality for logging, run tracking, and error handling
 */

import { Run, StageName, RunMetadata } from '../state/types';
import { runService } from '../state/run-service';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { getConfig, LeadResolverConfig } from '../config';

export interface StageResult {
  success: boolean;
  processed: number;
  passed: number;
  failed: number;
  errors: string[];
}

export abstract class BaseStage {
  protected readonly stageName: StageName;
  protected config: LeadResolverConfig;
  protected run: Run | null = null;
  protected processed = 0;
  protected passed = 0;
  protected failed = 0;
  protected errors: string[] = [];

  constructor(stageName: StageName, config?: LeadResolverConfig) {
    this.stageName = stageName;
    this.config = config ?? getConfig();
  }

  // Template method - subclasses implement the actual logic
  protected abstract execute(): Promise<void>;

  // Stored on the run record when the stage completes
  protected completionMetadata(): RunMetadata | undefined {
    return undefined;
  }

  // Main entry point
  async runStage(metadata?: RunMetadata): Promise<StageResult> {
    // Start tracking run
    this.run = runService.start(this.stageName, metadata);
    logger.setContext(this.stageName, this.run.runId);

    try {
      logger.info(`Starting ${this.stageName} stage`);

      // Execute the stage logic
      await this.execute();

      // Mark run as complete
      const completion = this.completionMetadata();
      runService.complete(
        this.run.runId,
        this.processed,
        this.passed,
        this.failed,
        completion ? { ...metadata, ...completion } : undefined
      );

      logger.info(`Completed ${this.stageName} stage`, {
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
      });

      return {
        success: true,
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        errors: this.errors,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.errors.push(message);

      // Mark run as failed
      if (this.run) {
        runService.fail(this.run.runId, message, this.processed);
      }

      logger.error(`Stage ${this.stageName} failed`, { error: message });

      return {
        success: false,
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        errors: this.errors,
      };
    } finally {
      logger.setContext();
    }
  }

  // Get the current run ID
  protected getRunId(): string {
    return this.run?.runId || 'unknown';
  }
}
