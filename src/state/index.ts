export * from './types';
export { leadService, LeadService, funnelStageOf } from './lead-service';
export type { ImportResult, LeadStats } from './lead-service';
export { runService, RunService } from './run-service';
