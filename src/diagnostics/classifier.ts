/**
 * Failure classification for stack operations.
 *
 * CloudFormation reports failures as free-text reasons on stack events. The
 * rules below map those reasons to the failure modes an operator deals with
 * when standing up the network, container, service and pipeline stacks, and
 * attach the commands that show the state needed to fix them by hand.
 */

import { Diagnosis, FailureClass, FailureEvent } from './types.js';

interface ClassificationRule {
  failureClass: FailureClass;
  patterns: RegExp[];
  summary: string;
  remediation: string;
  verificationCommands: (stackName: string) => string[];
}

// Order matters: the first matching rule wins
const CLASSIFICATION_RULES: ClassificationRule[] = [
  {
    failureClass: 'STACK_LOCKED',
    patterns: [
      /is in \w*_IN_PROGRESS state/i,
      /is in \w*ROLLBACK\w* state and can ?not be updated/i,
      /another update is in progress/i
    ],
    summary: 'The stack is locked by another operation or a failed rollback',
    remediation: 'Wait for the running operation to finish. A stack in ROLLBACK_COMPLETE must be deleted before it can be created again.',
    verificationCommands: stackName => [
      `aws cloudformation describe-stacks --stack-name ${stackName}`,
      `aws cloudformation describe-stack-events --stack-name ${stackName}`
    ]
  },
  {
    failureClass: 'CIDR_CONFLICT',
    patterns: [
      /CIDR .* conflicts with another subnet/i,
      /InvalidSubnet\.Conflict/i,
      /InvalidSubnet\.Range/i,
      /CIDR .* is invalid/i,
      /InvalidVpc\.Range/i,
      /overlap/i
    ],
    summary: 'A VPC or subnet CIDR block is invalid or overlaps another one',
    remediation: 'Choose subnet CIDR blocks that lie inside the VPC CIDR and do not overlap each other or an existing subnet.',
    verificationCommands: () => [
      'aws ec2 describe-vpcs --query "Vpcs[].{Id:VpcId,Cidr:CidrBlock}"',
      'aws ec2 describe-subnets --query "Subnets[].{Id:SubnetId,Cidr:CidrBlock,Az:AvailabilityZone}"'
    ]
  },
  {
    failureClass: 'AZ_MISMATCH',
    patterns: [
      /availability zone/i,
      /InvalidParameterValue.*Value \([a-z0-9-]+\) for parameter availabilityZone/i,
      /at least two subnets in two different Availability Zones/i
    ],
    summary: 'The subnets do not cover the availability zones the resources need',
    remediation: 'Place the subnets in two different availability zones that exist in the target region.',
    verificationCommands: () => [
      'aws ec2 describe-availability-zones --query "AvailabilityZones[].ZoneName"',
      'aws ec2 describe-subnets --query "Subnets[].{Id:SubnetId,Az:AvailabilityZone}"'
    ]
  },
  {
    failureClass: 'SECURITY_GROUP_MISCONFIGURED',
    patterns: [
      /InvalidGroup\./i,
      /security group/i,
      /InvalidPermission\./i
    ],
    summary: 'A security group or one of its rules is invalid',
    remediation: 'Check that security groups belong to the VPC of the stack and that ingress rules reference existing groups.',
    verificationCommands: () => [
      'aws ec2 describe-security-groups --query "SecurityGroups[].{Id:GroupId,Vpc:VpcId,Name:GroupName}"'
    ]
  },
  {
    failureClass: 'SUBNET_MISCONFIGURED',
    patterns: [
      /InvalidSubnet/i,
      /subnet .* (does not exist|not found)/i,
      /subnets? .*(belong|same) .*VPC/i,
      /route table/i,
      /internet gateway/i
    ],
    summary: 'A subnet, route or gateway is missing or attached to the wrong VPC',
    remediation: 'Check that the imported subnet identifiers exist and belong to the imported VPC, and that the public route targets the internet gateway.',
    verificationCommands: () => [
      'aws ec2 describe-subnets --query "Subnets[].{Id:SubnetId,Vpc:VpcId,Public:MapPublicIpOnLaunch}"',
      'aws ec2 describe-route-tables --query "RouteTables[].{Id:RouteTableId,Vpc:VpcId,Routes:Routes}"'
    ]
  },
  {
    failureClass: 'HEALTH_CHECK_FAILED',
    patterns: [
      /health check/i,
      /failed to stabilize/i,
      /did not stabilize/i,
      /unhealthy/i,
      /Circuit Breaker/i
    ],
    summary: 'The service tasks did not become healthy behind the load balancer',
    remediation: 'Make sure the container listens on the container port and the health check path returns 200.',
    verificationCommands: stackName => [
      `aws ecs describe-services --cluster <cluster> --services <service> --query "services[].events[:5]"`,
      'aws elbv2 describe-target-health --target-group-arn <target-group-arn>',
      `aws cloudformation describe-stack-resources --stack-name ${stackName}`
    ]
  },
  {
    failureClass: 'TASK_DEFINITION_INVALID',
    patterns: [
      /task ?definition/i,
      /Invalid CPU or memory/i,
      /No Fargate configuration exists/i,
      /CannotPullContainerError/i,
      /container definition/i
    ],
    summary: 'The task definition is invalid or its image cannot be pulled',
    remediation: 'Check the CPU and memory combination is valid for Fargate and the image URL is reachable from the subnets.',
    verificationCommands: () => [
      'aws ecs describe-task-definition --task-definition <family>',
      'aws ecs list-task-definitions'
    ]
  },
  {
    failureClass: 'PIPELINE_AUTH_FAILED',
    patterns: [
      /OAuth/i,
      /GitHub/i,
      /Could not access the GitHub repository/i,
      /Webhook/i,
      /Bad credentials/i
    ],
    summary: 'The pipeline could not authenticate against the source repository',
    remediation: 'Create a new token with the repo and admin:repo_hook scopes and pass it as GitHubToken.',
    verificationCommands: () => [
      'aws codepipeline list-pipelines',
      'aws codepipeline get-pipeline-state --name <pipeline>'
    ]
  },
  {
    failureClass: 'PERMISSION_DENIED',
    patterns: [
      /AccessDenied/i,
      /not authorized to perform/i,
      /Requires capabilities/i,
      /UnauthorizedOperation/i,
      /iam:PassRole/i
    ],
    summary: 'The caller or a service role lacks a permission or capability',
    remediation: 'Add CAPABILITY_IAM to the stage when its template creates IAM roles, and check the permissions of the deploying identity.',
    verificationCommands: () => [
      'aws sts get-caller-identity',
      'aws iam list-roles --query "Roles[].RoleName"'
    ]
  }
];

const UNKNOWN_DIAGNOSIS = (stackName: string): Omit<Diagnosis, 'event'> => ({
  failureClass: 'UNKNOWN',
  summary: 'The stack operation failed',
  remediation: 'Read the failure events of the stack to find the resource that failed first.',
  verificationCommands: [`aws cloudformation describe-stack-events --stack-name ${stackName}`]
});

function matches(rule: ClassificationRule, text: string): boolean {
  return rule.patterns.some(pattern => pattern.test(text));
}

/**
 * Classifies a failed stack operation. Events are examined oldest first, since
 * the first failure usually causes the cancellations that follow it.
 */
export function classifyFailure(stackName: string, events: FailureEvent[]): Diagnosis {
  const ordered = [...events]
    .filter(event => !/Resource (creation|update) cancelled/i.test(event.reason))
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  for (const event of ordered) {
    const rule = CLASSIFICATION_RULES.find(candidate => matches(candidate, event.reason));
    if (rule) {
      return {
        failureClass: rule.failureClass,
        summary: `${rule.summary} (${event.logicalId}: ${event.reason})`,
        event,
        remediation: rule.remediation,
        verificationCommands: rule.verificationCommands(stackName)
      };
    }
  }

  const first = ordered[0];
  const unknown = UNKNOWN_DIAGNOSIS(stackName);
  return first
    ? { ...unknown, summary: `${unknown.summary} (${first.logicalId}: ${first.reason})`, event: first }
    : unknown;
}

/**
 * Classifies an error message returned directly by an API call (no events).
 */
export function classifyMessage(stackName: string, message: string): Diagnosis {
  const rule = CLASSIFICATION_RULES.find(candidate => matches(candidate, message));
  if (!rule) {
    return { ...UNKNOWN_DIAGNOSIS(stackName), summary: message };
  }
  return {
    failureClass: rule.failureClass,
    summary: `${rule.summary} (${message})`,
    remediation: rule.remediation,
    verificationCommands: rule.verificationCommands(stackName)
  };
}
