/**
 * A failed resource event reported by CloudFormation during a stack operation
 */
export interface FailureEvent {
  logicalId: string;
  resourceType: string;
  status: string;
  reason: string;
  timestamp: Date;
  physicalResourceId?: string;
}

export type FailureClass =
  | 'CIDR_CONFLICT'
  | 'AZ_MISMATCH'
  | 'SUBNET_MISCONFIGURED'
  | 'SECURITY_GROUP_MISCONFIGURED'
  | 'TASK_DEFINITION_INVALID'
  | 'HEALTH_CHECK_FAILED'
  | 'PIPELINE_AUTH_FAILED'
  | 'PERMISSION_DENIED'
  | 'STACK_LOCKED'
  | 'UNKNOWN';

export interface Diagnosis {
  failureClass: FailureClass;
  summary: string;
  /** The event the classification was made from */
  event?: FailureEvent;
  remediation: string;
  /** AWS CLI commands that show the state needed to diagnose the failure */
  verificationCommands: string[];
}
