// Core type definitions for stackctl

export type Capability = 'CAPABILITY_IAM' | 'CAPABILITY_NAMED_IAM' | 'CAPABILITY_AUTO_EXPAND';

export type BuiltinTemplateKind = 'network' | 'container' | 'service' | 'pipeline';

export interface ProjectInfo {
  name: string;
  environment?: string;
}

export interface AWSConfig {
  region: string;
  profile?: string;
}

export interface ProjectSettings {
  state_file: string;
  stack_prefix?: string;
  poll_interval_seconds: number;
  timeout_minutes: number;
  tags?: Record<string, string>;
}

export interface StageConfig {
  name: string;
  template: string;
  parameters?: Record<string, string>;
  capabilities?: Capability[];
  depends_on?: string[];
  imports?: string[];
  exports?: string[];
  tags?: Record<string, string>;
}

export interface ProjectConfig {
  project: ProjectInfo;
  aws: AWSConfig;
  settings: ProjectSettings;
  stages: StageConfig[];
}

/**
 * A resource entry of a stage's template, with the logical IDs it depends on
 * inside the same template.
 */
export interface ResourceDeclaration {
  logicalId: string;
  type: string;
  properties: Record<string, unknown>;
  dependsOn: string[];
}

/**
 * A stage after its template has been loaded and analyzed.
 */
export interface Stage {
  name: string;
  stackName: string;
  index: number;
  templateSource: string;
  templateBody: string;
  templateHash: string;
  /** Overrides sent with the stack operation, stack references resolved */
  parameters: Record<string, string>;
  /** Every declared template parameter with its override or default value */
  templateParameters: Record<string, string | undefined>;
  capabilities: Capability[];
  dependsOn: string[];
  imports: string[];
  exports: string[];
  resources: ResourceDeclaration[];
  tags: Record<string, string>;
  /** Reference problems between the template's resources */
  analysisErrors: string[];
  warnings: string[];
}

export type DeploymentStatus = 'pending' | 'applied' | 'failed' | 'rolled-back';

export interface DeploymentRecord {
  deploymentId: string;
  stage: string;
  stackName: string;
  stackId?: string;
  parameters: Record<string, string>;
  templateHash: string;
  status: DeploymentStatus;
  createdAt: string;
  updatedAt: string;
  outputs: Record<string, string>;
  error?: string;
}

export interface DeploymentError {
  code: string;
  message: string;
  stage?: string;
  details?: unknown;
  remediation?: string;
}

export type StageOutcome =
  | 'created'
  | 'updated'
  | 'unchanged'
  | 'failed'
  | 'rolled-back'
  | 'deleted'
  | 'absent'
  | 'skipped';

export interface StageResult {
  stage: string;
  stackName: string;
  outcome: StageOutcome;
  outputs: Record<string, string>;
  durationMs: number;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  duration?: number;
  region: string;
  project: string;
}

export interface DeploymentResult {
  success: boolean;
  stages: StageResult[];
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
