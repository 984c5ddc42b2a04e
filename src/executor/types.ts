import { Capability } from '../types/index.js';
import { Diagnosis, FailureEvent } from '../diagnostics/types.js';

export interface ApplyRequest {
  stackName: string;
  templateBody: string;
  parameters: Record<string, string>;
  capabilities: Capability[];
  tags: Record<string, string>;
}

export interface StackSummary {
  stackName: string;
  stackId?: string;
  status: string;
  statusReason?: string;
  outputs: Record<string, string>;
  parameters: Record<string, string>;
}

export type ApplyOutcome = 'created' | 'updated' | 'unchanged' | 'rolled-back' | 'failed';

export interface ApplyResult {
  outcome: ApplyOutcome;
  stack: StackSummary;
  /** Failed resource events of this operation, newest first */
  failures: FailureEvent[];
  diagnosis?: Diagnosis;
}

export interface DeleteResult {
  outcome: 'deleted' | 'absent' | 'failed';
  /** Final stack status when the delete failed */
  status?: string;
  failures: FailureEvent[];
  diagnosis?: Diagnosis;
}

export type RemoteDriftStatus = 'IN_SYNC' | 'DRIFTED' | 'NOT_CHECKED' | 'UNKNOWN';

export interface DriftResult {
  status: RemoteDriftStatus | string;
  driftedResources: number;
}

/**
 * Stack operations the orchestrator needs from CloudFormation
 */
export interface StackOperations {
  describe(stackName: string): Promise<StackSummary | null>;
  apply(request: ApplyRequest): Promise<ApplyResult>;
  delete(stackName: string): Promise<DeleteResult>;
  detectDrift(stackName: string): Promise<DriftResult>;
  listExports(): Promise<Map<string, string>>;
}
