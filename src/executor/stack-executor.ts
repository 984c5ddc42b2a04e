import {
  CloudFormationClient,
  CreateStackCommand,
  UpdateStackCommand,
  DeleteStackCommand,
  DescribeStacksCommand,
  DescribeStackEventsCommand,
  DetectStackDriftCommand,
  DescribeStackDriftDetectionStatusCommand,
  ListExportsCommand,
  Stack,
  StackEvent,
} from '@aws-sdk/client-cloudformation';
import { v4 as uuidv4 } from 'uuid';
import { Capability } from '../types/index.js';
import { StackctlError, errorMessage } from '../errors/index.js';
import { Logger, silentLogger } from '../logging/index.js';
import { classifyFailure, classifyMessage } from '../diagnostics/classifier.js';
import { FailureEvent } from '../diagnostics/types.js';
import {
  ApplyRequest,
  ApplyResult,
  DeleteResult,
  DriftResult,
  StackOperations,
  StackSummary,
} from './types.js';

export interface StackExecutorOptions {
  region: string;
  profile?: string;
  client?: CloudFormationClient;
  pollIntervalMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  maxEvents?: number;
}

const DEFAULT_POLL_INTERVAL_MS = 10_000;
const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

// Events without a request token were started outside stackctl; local and AWS clocks may differ by this much
const CLOCK_SKEW_MS = 5 * 60 * 1000;

interface StackOperationRef {
  token: string;
  startedAt: Date;
}

const requestToken = () => `stackctl-${uuidv4()}`;

function belongsTo(event: StackEvent, operation: StackOperationRef): boolean {
  if (event.ClientRequestToken) {
    return event.ClientRequestToken === operation.token;
  }
  return !event.Timestamp || event.Timestamp.getTime() >= operation.startedAt.getTime() - CLOCK_SKEW_MS;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function isMissingStackError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ValidationError' && error.message.includes('does not exist');
}

function isNoUpdatesError(error: unknown): boolean {
  return error instanceof Error && error.message.includes('No updates are to be performed');
}

function toSummary(stack: Stack): StackSummary {
  const outputs: Record<string, string> = {};
  for (const output of stack.Outputs ?? []) {
    if (output.OutputKey && output.OutputValue !== undefined) {
      outputs[output.OutputKey] = output.OutputValue;
    }
  }

  return {
    stackName: stack.StackName ?? '',
    stackId: stack.StackId,
    status: stack.StackStatus ?? 'UNKNOWN',
    statusReason: stack.StackStatusReason,
    outputs,
    parameters: Object.fromEntries(
      (stack.Parameters ?? [])
        .filter(parameter => parameter.ParameterKey !== undefined)
        .map(parameter => [parameter.ParameterKey ?? '', parameter.ParameterValue ?? ''])
    ),
  };
}

function toFailureEvent(event: StackEvent): FailureEvent | null {
  const status = event.ResourceStatus ?? '';
  if (!status.includes('FAILED') || !event.ResourceStatusReason) {
    return null;
  }
  return {
    logicalId: event.LogicalResourceId ?? 'Unknown',
    resourceType: event.ResourceType ?? 'Unknown',
    status,
    reason: event.ResourceStatusReason,
    timestamp: event.Timestamp ?? new Date(0),
    physicalResourceId: event.PhysicalResourceId,
  };
}

/**
 * Applies and deletes single stacks through CloudFormation and waits for
 * them to settle.
 */
export class StackExecutor implements StackOperations {
  private readonly client: CloudFormationClient;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly maxEvents: number;

  constructor(options: StackExecutorOptions) {
    this.client = options.client ?? new CloudFormationClient({
      region: options.region,
      ...(options.profile && { profile: options.profile }),
    });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.maxEvents = options.maxEvents ?? 50;
  }

  async describe(stackName: string): Promise<StackSummary | null> {
    const stack = await this.getStackIfExists(stackName);
    return stack ? toSummary(stack) : null;
  }

  /**
   * Create the stack, or update it when it exists. Re-applying an unchanged
   * template and parameters is a no-op reported as `unchanged`.
   */
  async apply(request: ApplyRequest): Promise<ApplyResult> {
    const { stackName } = request;
    const operation = { token: requestToken(), startedAt: new Date() };
    let existing = await this.getStackIfExists(stackName);

    if (existing?.StackStatus?.endsWith('_IN_PROGRESS')) {
      throw new StackctlError(
        'STACK_OPERATION_FAILED',
        `Stack ${stackName} is in ${existing.StackStatus} state and cannot be updated`,
        { remediation: 'Wait for the running operation to finish, then apply again' }
      );
    }

    // A stack whose creation rolled back cannot be updated, only replaced
    if (existing?.StackStatus === 'ROLLBACK_COMPLETE') {
      this.logger.warn(`Stack ${stackName} is in ROLLBACK_COMPLETE; deleting it before creating it again`);
      await this.call('delete', stackName, () => this.client.send(new DeleteStackCommand({
        StackName: stackName,
        ClientRequestToken: requestToken(),
      })));
      await this.waitForStackOperation(stackName);
      existing = null;
    }

    const parameters = Object.entries(request.parameters).map(([ParameterKey, ParameterValue]) => ({
      ParameterKey,
      ParameterValue,
    }));
    const tags = Object.entries(request.tags).map(([Key, Value]) => ({ Key, Value }));
    const capabilities: Capability[] = request.capabilities;

    if (existing) {
      try {
        await this.client.send(new UpdateStackCommand({
          StackName: stackName,
          TemplateBody: request.templateBody,
          Parameters: parameters,
          Capabilities: capabilities,
          Tags: tags,
          ClientRequestToken: operation.token,
        }));
        this.logger.info(`Updating CloudFormation stack: ${stackName}`);
      } catch (error) {
        if (isNoUpdatesError(error)) {
          this.logger.info(`No changes detected in CloudFormation stack ${stackName}`);
          return { outcome: 'unchanged', stack: toSummary(existing), failures: [] };
        }
        throw this.wrapApiError('update', stackName, error);
      }
    } else {
      await this.call('create', stackName, () => this.client.send(new CreateStackCommand({
        StackName: stackName,
        TemplateBody: request.templateBody,
        Parameters: parameters,
        Capabilities: capabilities,
        Tags: tags,
        ClientRequestToken: operation.token,
      })));
      this.logger.info(`Creating CloudFormation stack: ${stackName}`);
    }

    const stack = await this.waitForStackOperation(stackName);
    if (!stack) {
      throw new StackctlError('STACK_OPERATION_FAILED', `Stack ${stackName} not found`);
    }

    const summary = toSummary(stack);
    switch (summary.status) {
      case 'CREATE_COMPLETE':
        return { outcome: 'created', stack: summary, failures: [] };
      case 'UPDATE_COMPLETE':
        return { outcome: 'updated', stack: summary, failures: [] };
      default: {
        const failures = await this.collectFailureEvents(stackName, operation);
        return {
          outcome: summary.status.includes('ROLLBACK') && summary.status.endsWith('_COMPLETE') ? 'rolled-back' : 'failed',
          stack: summary,
          failures,
          diagnosis: classifyFailure(stackName, failures),
        };
      }
    }
  }

  async delete(stackName: string): Promise<DeleteResult> {
    const operation = { token: requestToken(), startedAt: new Date() };
    const existing = await this.getStackIfExists(stackName);
    if (!existing || existing.StackStatus === 'DELETE_COMPLETE') {
      return { outcome: 'absent', failures: [] };
    }

    await this.call('delete', stackName, () =>
      this.client.send(new DeleteStackCommand({ StackName: existing.StackId ?? stackName, ClientRequestToken: operation.token }))
    );
    this.logger.info(`Deleting CloudFormation stack: ${stackName}`);

    // Polling by stack id keeps DELETE_FAILED visible; by name the stack vanishes once deleted
    const stack = await this.waitForStackOperation(existing.StackId ?? stackName);
    if (!stack || stack.StackStatus === 'DELETE_COMPLETE') {
      return { outcome: 'deleted', failures: [] };
    }

    const failures = await this.collectFailureEvents(existing.StackId ?? stackName, operation);
    return {
      outcome: 'failed',
      status: stack.StackStatus,
      failures,
      diagnosis: classifyFailure(stackName, failures),
    };
  }

  /**
   * Run CloudFormation drift detection and wait for its result
   */
  async detectDrift(stackName: string): Promise<DriftResult> {
    const { StackDriftDetectionId } = await this.call('detect drift on', stackName, () =>
      this.client.send(new DetectStackDriftCommand({ StackName: stackName }))
    );
    if (!StackDriftDetectionId) {
      throw new StackctlError('STACK_OPERATION_FAILED', `Drift detection for ${stackName} returned no detection id`);
    }

    const startTime = Date.now();
    while (Date.now() - startTime < this.timeoutMs) {
      const status = await this.call('detect drift on', stackName, () =>
        this.client.send(new DescribeStackDriftDetectionStatusCommand({ StackDriftDetectionId }))
      );

      if (status.DetectionStatus === 'DETECTION_COMPLETE') {
        return {
          status: status.StackDriftStatus ?? 'UNKNOWN',
          driftedResources: status.DriftedStackResourceCount ?? 0,
        };
      }
      if (status.DetectionStatus === 'DETECTION_FAILED') {
        throw new StackctlError(
          'STACK_OPERATION_FAILED',
          `Drift detection for ${stackName} failed: ${status.DetectionStatusReason ?? 'no reason given'}`
        );
      }

      await sleep(this.pollIntervalMs);
    }

    throw new StackctlError('STACK_TIMEOUT', `Drift detection for ${stackName} timed out after ${this.timeoutMs / 1000} seconds`);
  }

  /**
   * All exports in the region, by export name
   */
  async listExports(): Promise<Map<string, string>> {
    const exports = new Map<string, string>();
    let nextToken: string | undefined;

    do {
      const token = nextToken;
      const page = await this.call('list exports of', '(exports)', () =>
        this.client.send(new ListExportsCommand({ NextToken: token }))
      );
      for (const entry of page.Exports ?? []) {
        if (entry.Name && entry.Value !== undefined) {
          exports.set(entry.Name, entry.Value);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return exports;
  }

  private async getStackIfExists(stackName: string): Promise<Stack | null> {
    try {
      const result = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      return result.Stacks?.[0] ?? null;
    } catch (error) {
      if (isMissingStackError(error)) {
        return null;
      }
      throw this.wrapApiError('describe', stackName, error);
    }
  }

  /**
   * Poll until the stack leaves every *_IN_PROGRESS status. Null means the stack no longer exists.
   */
  private async waitForStackOperation(stackName: string): Promise<Stack | null> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.timeoutMs) {
      const stack = await this.getStackIfExists(stackName);
      if (!stack) {
        return null;
      }

      const status = stack.StackStatus ?? '';
      if (!status.endsWith('_IN_PROGRESS')) {
        return stack;
      }

      this.logger.debug(`${stackName}: ${status}`);
      await sleep(this.pollIntervalMs);
    }

    throw new StackctlError('STACK_TIMEOUT', `Stack operation timed out after ${this.timeoutMs / 1000} seconds`, {
      remediation: `Check progress with: aws cloudformation describe-stack-events --stack-name ${stackName}`,
    });
  }

  private async collectFailureEvents(stackName: string, operation: StackOperationRef): Promise<FailureEvent[]> {
    try {
      const result = await this.client.send(new DescribeStackEventsCommand({ StackName: stackName }));
      return (result.StackEvents ?? [])
        .slice(0, this.maxEvents)
        .filter(event => belongsTo(event, operation))
        .map(toFailureEvent)
        .filter((event): event is FailureEvent => event !== null);
    } catch (error) {
      this.logger.warn(`Could not read events of ${stackName}: ${errorMessage(error)}`);
      return [];
    }
  }

  private async call<T>(action: string, stackName: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.wrapApiError(action, stackName, error);
    }
  }

  private wrapApiError(action: string, stackName: string, error: unknown): StackctlError {
    const message = errorMessage(error);
    const diagnosis = classifyMessage(stackName, message);
    return new StackctlError('STACK_OPERATION_FAILED', `Failed to ${action} stack ${stackName}: ${message}`, {
      remediation: diagnosis.failureClass === 'UNKNOWN' ? undefined : diagnosis.remediation,
      cause: error,
    });
  }
}
