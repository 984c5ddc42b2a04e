import { Stage } from '../types/index.js';
import { isStackctlError, errorMessage } from '../errors/index.js';
import { DependencyResolver, StageEdge } from '../resolver/stage-resolver.js';
import { CidrBlock, contains, overlaps, parseCidr } from './cidr.js';

export type LintRule =
  | 'STAGE_ORDER'
  | 'STACK_NAME_REFERENCE'
  | 'TEARDOWN_ORDER'
  | 'CIDR_LAYOUT'
  | 'RESOURCE_GRAPH'
  | 'CAPABILITIES';

export type LintSeverity = 'error' | 'warning';

export interface LintIssue {
  rule: LintRule;
  severity: LintSeverity;
  stage?: string;
  message: string;
}

export interface LintOptions {
  externalExports?: Set<string>;
  /** Teardown order to check; defaults to the one the resolver derives */
  teardownOrder?: string[];
}

const STACK_NAME_PARAMETER = /StackName$/;
const SUBNET_CIDR_PARAMETER = /Subnet\d*Cidr$/;
const IAM_RESOURCE = /^AWS::IAM::/;
const MIN_VPC_PREFIX = 16;
const MAX_VPC_PREFIX = 28;

/**
 * Every `*StackName` parameter must name the stack of a stage deployed earlier
 */
export function checkStackNameReferences(stages: Stage[], order: string[]): LintIssue[] {
  const issues: LintIssue[] = [];
  const byName = new Map(stages.map(stage => [stage.name, stage]));

  order.forEach((stageName, position) => {
    const stage = byName.get(stageName);
    if (!stage) {
      return;
    }
    const earlier = new Map(
      order.slice(0, position).flatMap(name => {
        const candidate = byName.get(name);
        return candidate ? [[candidate.stackName, candidate.name] as const] : [];
      })
    );
    const laterOrSelf = new Set(
      order.slice(position).flatMap(name => byName.get(name)?.stackName ?? [])
    );

    for (const [parameter, value] of Object.entries(stage.templateParameters)) {
      if (!STACK_NAME_PARAMETER.test(parameter)) {
        continue;
      }
      if (value === undefined || value === '') {
        issues.push({
          rule: 'STACK_NAME_REFERENCE',
          severity: 'error',
          stage: stage.name,
          message: `Parameter ${parameter} has no value`,
        });
      } else if (laterOrSelf.has(value)) {
        issues.push({
          rule: 'STACK_NAME_REFERENCE',
          severity: 'error',
          stage: stage.name,
          message: `Parameter ${parameter} names stack ${value}, which is not deployed before ${stage.name}`,
        });
      } else if (!earlier.has(value)) {
        issues.push({
          rule: 'STACK_NAME_REFERENCE',
          severity: 'error',
          stage: stage.name,
          message: `Parameter ${parameter} names stack ${value}, which no earlier stage deploys (earlier stacks: ${
            [...earlier.keys()].join(', ') || 'none'
          })`,
        });
      }
    }
  });

  return issues;
}

/**
 * The teardown order must be the exact reverse of the deployment order, so
 * that no stack is deleted while a stack importing from it still exists.
 */
export function checkTeardownOrder(order: string[], teardownOrder: string[], edges: StageEdge[]): LintIssue[] {
  const expected = [...order].reverse();
  if (expected.length === teardownOrder.length && expected.every((name, index) => teardownOrder[index] === name)) {
    return [];
  }

  const issues: LintIssue[] = [{
    rule: 'TEARDOWN_ORDER',
    severity: 'error',
    message: `Teardown order ${teardownOrder.join(' -> ')} is not the reverse of deployment order ${order.join(' -> ')}`,
  }];

  const position = new Map(teardownOrder.map((name, index) => [name, index]));
  for (const edge of edges) {
    const producer = position.get(edge.from);
    const consumer = position.get(edge.to);
    if (producer !== undefined && consumer !== undefined && producer < consumer) {
      issues.push({
        rule: 'TEARDOWN_ORDER',
        severity: 'error',
        stage: edge.from,
        message: `${edge.from} is torn down before ${edge.to}, which still needs it (${edge.reason})`,
      });
    }
  }

  return issues;
}

/**
 * Subnets of a stage with a `VpcCidr` parameter must lie inside the VPC and must not overlap
 */
export function checkCidrLayout(stage: Stage): LintIssue[] {
  const vpcValue = stage.templateParameters.VpcCidr;
  if (vpcValue === undefined) {
    return [];
  }

  const issue = (message: string): LintIssue => ({ rule: 'CIDR_LAYOUT', severity: 'error', stage: stage.name, message });
  const vpc = parseCidr(vpcValue);
  if (!vpc) {
    return [issue(`VpcCidr ${vpcValue} is not a valid IPv4 CIDR block`)];
  }

  const issues: LintIssue[] = [];
  if (vpc.prefixLength < MIN_VPC_PREFIX || vpc.prefixLength > MAX_VPC_PREFIX) {
    issues.push(issue(`VpcCidr ${vpcValue} must have a prefix length between /${MIN_VPC_PREFIX} and /${MAX_VPC_PREFIX}`));
  }

  const subnets: Array<{ parameter: string; block: CidrBlock }> = [];
  for (const [parameter, value] of Object.entries(stage.templateParameters)) {
    if (!SUBNET_CIDR_PARAMETER.test(parameter) || value === undefined) {
      continue;
    }
    const block = parseCidr(value);
    if (!block) {
      issues.push(issue(`${parameter} ${value} is not a valid IPv4 CIDR block`));
      continue;
    }
    if (!contains(vpc, block)) {
      issues.push(issue(`${parameter} ${value} is outside VpcCidr ${vpcValue}`));
    }
    for (const other of subnets) {
      if (overlaps(other.block, block)) {
        issues.push(issue(`${parameter} ${value} overlaps ${other.parameter} ${other.block.cidr}`));
      }
    }
    subnets.push({ parameter, block });
  }

  return issues;
}

export function checkResourceGraph(stage: Stage): LintIssue[] {
  return stage.analysisErrors.map((message): LintIssue => ({
    rule: 'RESOURCE_GRAPH',
    severity: 'error',
    stage: stage.name,
    message,
  }));
}

export function checkCapabilities(stage: Stage): LintIssue[] {
  const iamResources = stage.resources.filter(resource => IAM_RESOURCE.test(resource.type));
  const acknowledged = stage.capabilities.includes('CAPABILITY_IAM') || stage.capabilities.includes('CAPABILITY_NAMED_IAM');
  if (iamResources.length === 0 || acknowledged) {
    return [];
  }
  return [{
    rule: 'CAPABILITIES',
    severity: 'warning',
    stage: stage.name,
    message: `Template declares IAM resources (${iamResources.map(resource => resource.logicalId).join(', ')}) but the stage does not list CAPABILITY_IAM`,
  }];
}

/**
 * Run every check over the stages of a project
 */
export function lintProject(stages: Stage[], options: LintOptions = {}): LintIssue[] {
  const issues: LintIssue[] = [];

  for (const stage of stages) {
    issues.push(...checkResourceGraph(stage), ...checkCidrLayout(stage), ...checkCapabilities(stage));
  }

  let resolver: DependencyResolver;
  try {
    resolver = new DependencyResolver(stages, { externalExports: options.externalExports });
  } catch (error) {
    issues.push({
      rule: 'STAGE_ORDER',
      severity: 'error',
      stage: isStackctlError(error) ? error.stage : undefined,
      message: errorMessage(error),
    });
    return issues;
  }

  const { order, teardownOrder, edges } = resolver.resolve();
  issues.push(...checkStackNameReferences(stages, order));
  issues.push(...checkTeardownOrder(order, options.teardownOrder ?? teardownOrder, edges));

  return issues;
}

export function hasErrors(issues: LintIssue[]): boolean {
  return issues.some(issue => issue.severity === 'error');
}
