import { DeploymentRecord } from '../types/index.js';
import { LocalDrift } from '../state/state-tracker.js';
import { RemoteDriftStatus } from '../executor/types.js';

export type PlanAction = 'create' | 'update' | 'no-change';

export interface PlanEntry {
  stage: string;
  stackName: string;
  action: PlanAction;
  changedParameters: string[];
  templateChanged: boolean;
  /** Stages this one waits for, with the reason for each edge */
  after: Array<{ stage: string; reason: string }>;
  warnings: string[];
}

export interface SelectionOptions {
  /** Stage names to act on; all stages when omitted */
  stages?: string[];
  /** Accept imports of exports that already exist in the region outside the project */
  externalImports?: boolean;
}

export interface LintOptions {
  /** Accept imports of exports that already exist in the region outside the project */
  externalImports?: boolean;
}

export interface StatusOptions {
  /** Stage names to report; all stages when omitted */
  stages?: string[];
}

export interface DestroyOptions extends SelectionOptions {
  /** Tear down even when stages outside the selection still depend on it */
  force?: boolean;
}

export interface DriftOptions extends SelectionOptions {
  /** Run CloudFormation drift detection on applied stages */
  remote?: boolean;
}

export interface StageStatusReport {
  stage: string;
  stackName: string;
  record?: DeploymentRecord;
  /** Live CloudFormation status, null when the stack does not exist */
  liveStatus: string | null;
}

export interface DriftReport {
  stage: string;
  stackName: string;
  local: LocalDrift;
  remote: RemoteDriftStatus | string;
  driftedResources: number;
}
