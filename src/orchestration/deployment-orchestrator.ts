import { resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  BuiltinTemplateKind,
  Capability,
  DeploymentError,
  DeploymentMetadata,
  DeploymentResult,
  ProjectConfig,
  Stage,
  StageOutcome,
  StageResult,
} from '../types/index.js';
import { StackctlError, errorMessage, isStackctlError } from '../errors/index.js';
import { Logger, createConsoleLogger } from '../logging/index.js';
import { StackNamingService } from '../config/naming.js';
import { TemplateStore } from '../templates/template-store.js';
import { TemplateEngine, TemplateFormat } from '../templates/template-engine.js';
import { analyzeTemplate } from '../templates/template-analyzer.js';
import { isBuiltinKind } from '../templates/cloudformation-generator.js';
import { GeneratorContext } from '../templates/types.js';
import { DependencyResolver } from '../resolver/stage-resolver.js';
import { StackExecutor } from '../executor/stack-executor.js';
import { ApplyResult, StackOperations } from '../executor/types.js';
import { StateTracker } from '../state/state-tracker.js';
import { LintIssue, lintProject } from '../lint/project-linter.js';
import {
  DestroyOptions,
  DriftOptions,
  DriftReport,
  LintOptions,
  PlanEntry,
  SelectionOptions,
  StageStatusReport,
  StatusOptions,
} from './types.js';

export const MANAGED_BY = 'stackctl';

const BUILTIN_PREFIX = 'builtin:';
const IAM_RESOURCE = /^AWS::IAM::/;

export interface OrchestratorOptions {
  /** Directory of the project file; template and state paths are relative to it */
  baseDir: string;
  logger?: Logger;
  executor?: StackOperations;
  state?: StateTracker;
  templateStore?: TemplateStore;
  naming?: StackNamingService;
}

interface PreparedProject {
  stages: Map<string, Stage>;
  resolver: DependencyResolver;
}

interface StageApplication {
  outcome: StageOutcome;
  outputs: Record<string, string>;
  error?: DeploymentError;
}

function builtinKindOf(template: string): BuiltinTemplateKind | undefined {
  if (!template.startsWith(BUILTIN_PREFIX)) {
    return undefined;
  }
  const kind = template.slice(BUILTIN_PREFIX.length);
  return isBuiltinKind(kind) ? kind : undefined;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function toDeploymentError(error: unknown, stage?: string): DeploymentError {
  if (isStackctlError(error)) {
    return {
      code: error.code,
      message: error.message,
      stage: error.stage ?? stage,
      ...(error.remediation && { remediation: error.remediation }),
    };
  }
  return {
    code: 'DEPLOYMENT_FAILED',
    message: errorMessage(error),
    ...(stage && { stage }),
    details: error,
    remediation: 'Check the CloudFormation console for detailed error information',
  };
}

/**
 * Runs the stages of a project against CloudFormation, one stack at a time,
 * in dependency order.
 */
export class DeploymentOrchestrator {
  private readonly logger: Logger;
  private readonly executor: StackOperations;
  private readonly state: StateTracker;
  private readonly templateStore: TemplateStore;
  private readonly naming: StackNamingService;
  private readonly engine = new TemplateEngine();

  constructor(private readonly config: ProjectConfig, options: OrchestratorOptions) {
    this.logger = options.logger ?? createConsoleLogger();
    this.executor = options.executor ?? new StackExecutor({
      region: config.aws.region,
      profile: config.aws.profile,
      pollIntervalMs: config.settings.poll_interval_seconds * 1000,
      timeoutMs: config.settings.timeout_minutes * 60 * 1000,
      logger: this.logger,
    });
    this.state = options.state ?? new StateTracker(resolve(options.baseDir, config.settings.state_file), config.project.name);
    this.templateStore = options.templateStore ?? new TemplateStore({ baseDir: options.baseDir, engine: this.engine });
    this.naming = options.naming ?? new StackNamingService();
  }

  /**
   * Load, evaluate and analyze the template of every stage, in declaration order
   */
  async buildStages(): Promise<Stage[]> {
    const stackNames = this.naming.generateStackNames(this.config);
    const context = this.generatorContext(stackNames);
    const stages: Stage[] = [];

    for (const [index, stageConfig] of this.config.stages.entries()) {
      const stackName = this.stackNameOf(stageConfig.name, stackNames);
      const template = await this.templateStore.load(stageConfig, context);
      const overrides = this.naming.resolveStackReferences(stageConfig, stackNames);

      const declared = new Set(Object.keys(template.document.Parameters ?? {}));
      const parameters: Record<string, string> = {};
      const warnings: string[] = [];
      for (const [key, value] of Object.entries(overrides)) {
        if (declared.has(key)) {
          parameters[key] = value;
        } else {
          warnings.push(`Parameter ${key} is not declared by ${template.source} and is ignored`);
        }
      }

      const analysis = analyzeTemplate(template.document, {
        stackName,
        region: this.config.aws.region,
        parameters,
      });

      const capabilities: Capability[] = [...(stageConfig.capabilities ?? [])];
      const needsIam = analysis.resources.some(resource => IAM_RESOURCE.test(resource.type));
      const hasIam = capabilities.includes('CAPABILITY_IAM') || capabilities.includes('CAPABILITY_NAMED_IAM');
      if (builtinKindOf(stageConfig.template) && needsIam && !hasIam) {
        capabilities.push('CAPABILITY_IAM');
      }

      stages.push({
        name: stageConfig.name,
        stackName,
        index,
        templateSource: template.source,
        templateBody: template.body,
        templateHash: template.hash,
        parameters,
        templateParameters: analysis.parameters,
        capabilities,
        dependsOn: stageConfig.depends_on ?? [],
        imports: unique([...analysis.imports, ...(stageConfig.imports ?? [])]),
        exports: unique([...analysis.exports, ...(stageConfig.exports ?? [])]),
        resources: analysis.resources,
        tags: { ...this.config.settings.tags, ...stageConfig.tags },
        analysisErrors: analysis.errors,
        warnings: [...warnings, ...analysis.warnings],
      });
    }

    return stages;
  }

  async plan(options: SelectionOptions = {}): Promise<PlanEntry[]> {
    const { stages, resolver } = await this.prepare(options);
    const { edges } = resolver.resolve();

    return this.selection(resolver, options).map(name => {
      const stage = this.requireStage(stages, name);
      const record = this.state.get(name);
      const drift = this.state.localDrift(name, stage.parameters, stage.templateHash);

      let action: PlanEntry['action'] = 'update';
      if (!record) {
        action = 'create';
      } else if (record.status === 'applied' && !drift.drifted) {
        action = 'no-change';
      }

      return {
        stage: name,
        stackName: stage.stackName,
        action,
        changedParameters: drift.changedParameters,
        templateChanged: drift.templateChanged,
        after: edges.filter(edge => edge.to === name).map(edge => ({ stage: edge.from, reason: edge.reason })),
        warnings: stage.warnings,
      };
    });
  }

  /**
   * Apply the selected stages in deployment order. The first failure stops the
   * run and the remaining stages are reported as skipped.
   */
  async deploy(options: SelectionOptions = {}): Promise<DeploymentResult> {
    const startTime = Date.now();
    const metadata = this.createMetadata();
    const results: StageResult[] = [];
    const errors: DeploymentError[] = [];

    try {
      const { stages, resolver } = await this.prepare(options, true);
      const { producers } = resolver.resolve();
      const order = this.selection(resolver, options);

      for (const [position, name] of order.entries()) {
        const stage = this.requireStage(stages, name);
        const stageStart = Date.now();
        this.logger.info(`Deploying stage ${name} (${stage.stackName})`);

        let application: StageApplication;
        try {
          this.assertImportsApplied(stage, producers);
          application = await this.applyStage(stage);
        } catch (error) {
          application = { outcome: 'failed', outputs: {}, error: toDeploymentError(error, name) };
        }

        results.push({
          stage: name,
          stackName: stage.stackName,
          outcome: application.outcome,
          outputs: application.outputs,
          durationMs: Date.now() - stageStart,
        });

        if (application.error) {
          errors.push(application.error);
          results.push(...this.skipped(order.slice(position + 1), stages));
          break;
        }
        this.logger.info(`Stage ${name}: ${application.outcome}`);
      }
    } catch (error) {
      errors.push(toDeploymentError(error));
    }

    metadata.duration = Date.now() - startTime;
    return {
      success: errors.length === 0,
      stages: results,
      ...(errors.length > 0 && { errors }),
      metadata,
    };
  }

  /**
   * Delete the selected stages in teardown order, the exact reverse of deployment order
   */
  async destroy(options: DestroyOptions = {}): Promise<DeploymentResult> {
    const startTime = Date.now();
    const metadata = this.createMetadata();
    const results: StageResult[] = [];
    const errors: DeploymentError[] = [];

    try {
      const { stages, resolver } = await this.prepare(options);
      const { teardownOrder } = resolver.resolve();
      const selected = new Set(this.selection(resolver, options));

      if (!options.force) {
        const remaining = unique(
          [...selected]
            .flatMap(name => resolver.dependentsOf(name))
            .filter(name => !selected.has(name) && this.state.get(name) !== undefined)
        );
        if (remaining.length > 0) {
          throw new StackctlError(
            'DEPENDENTS_REMAIN',
            `Cannot destroy ${[...selected].join(', ')}: ${remaining.join(', ')} still depend on it`,
            { remediation: 'Destroy the dependent stages first, include them in the selection, or pass --force' }
          );
        }
      }

      const order = teardownOrder.filter(name => selected.has(name));
      for (const [position, name] of order.entries()) {
        const stage = this.requireStage(stages, name);
        const stackName = this.state.get(name)?.stackName ?? stage.stackName;
        const stageStart = Date.now();
        this.logger.info(`Destroying stage ${name} (${stackName})`);

        let outcome: StageOutcome;
        let error: DeploymentError | undefined;
        try {
          const result = await this.executor.delete(stackName);
          outcome = result.outcome;
          if (result.outcome === 'failed') {
            error = {
              code: 'STACK_OPERATION_FAILED',
              message: `Stack ${stackName} of stage ${name} ended in ${result.status ?? 'DELETE_FAILED'}`
                + (result.diagnosis ? `: ${result.diagnosis.summary}` : ''),
              stage: name,
              details: { failures: result.failures, diagnosis: result.diagnosis },
              ...(result.diagnosis && { remediation: result.diagnosis.remediation }),
            };
          } else {
            await this.state.remove(name);
          }
        } catch (caught) {
          outcome = 'failed';
          error = toDeploymentError(caught, name);
        }

        results.push({ stage: name, stackName, outcome, outputs: {}, durationMs: Date.now() - stageStart });
        if (error) {
          errors.push(error);
          results.push(...this.skipped(order.slice(position + 1), stages));
          break;
        }
      }
    } catch (error) {
      errors.push(toDeploymentError(error));
    }

    metadata.duration = Date.now() - startTime;
    return {
      success: errors.length === 0,
      stages: results,
      ...(errors.length > 0 && { errors }),
      metadata,
    };
  }

  /**
   * Deployment records joined with the live status of each stack, in declaration order
   */
  async status(options: StatusOptions = {}): Promise<StageStatusReport[]> {
    const selected = options.stages ?? [];
    const unknown = selected.find(name => !this.config.stages.some(stage => stage.name === name));
    if (unknown !== undefined) {
      throw new StackctlError('UNKNOWN_STAGE', `Unknown stage: ${unknown}`);
    }

    await this.state.load();
    const stackNames = this.naming.generateStackNames(this.config);
    const reports: StageStatusReport[] = [];

    for (const stageConfig of this.config.stages) {
      if (selected.length > 0 && !selected.includes(stageConfig.name)) {
        continue;
      }
      const record = this.state.get(stageConfig.name);
      const stackName = record?.stackName ?? this.stackNameOf(stageConfig.name, stackNames);
      const live = await this.executor.describe(stackName);
      reports.push({
        stage: stageConfig.name,
        stackName,
        ...(record && { record }),
        liveStatus: live?.status ?? null,
      });
    }

    return reports;
  }

  async drift(options: DriftOptions = {}): Promise<DriftReport[]> {
    const { stages, resolver } = await this.prepare(options);
    const reports: DriftReport[] = [];

    for (const name of this.selection(resolver, options)) {
      const stage = this.requireStage(stages, name);
      const record = this.state.get(name);
      const local = this.state.localDrift(name, stage.parameters, stage.templateHash);

      if (options.remote !== false && record?.status === 'applied') {
        const remote = await this.executor.detectDrift(record.stackName);
        reports.push({ stage: name, stackName: record.stackName, local, remote: remote.status, driftedResources: remote.driftedResources });
      } else {
        reports.push({ stage: name, stackName: stage.stackName, local, remote: 'NOT_CHECKED', driftedResources: 0 });
      }
    }

    return reports;
  }

  async lint(options: LintOptions = {}): Promise<LintIssue[]> {
    const stages = await this.buildStages();
    const externalExports = options.externalImports ? await this.loadExternalExports() : undefined;
    return lintProject(stages, { externalExports });
  }

  /**
   * The template body of a stage, as sent to CloudFormation or re-rendered
   */
  async synth(stageName: string, format?: TemplateFormat): Promise<string> {
    const stageConfig = this.config.stages.find(stage => stage.name === stageName);
    if (!stageConfig) {
      throw new StackctlError('UNKNOWN_STAGE', `Unknown stage: ${stageName}`);
    }
    const stackNames = this.naming.generateStackNames(this.config);
    const template = await this.templateStore.load(stageConfig, this.generatorContext(stackNames));
    return format ? this.engine.render(template.raw, { format }) : template.body;
  }

  private async prepare(options: SelectionOptions, strict = false): Promise<PreparedProject> {
    const stages = await this.buildStages();

    for (const stage of stages) {
      stage.warnings.forEach(warning => this.logger.warn(`${stage.name}: ${warning}`));
      if (strict && stage.analysisErrors.length > 0) {
        throw new StackctlError(
          'TEMPLATE_INVALID',
          `Template of stage ${stage.name} has invalid resource references:\n${stage.analysisErrors.join('\n')}`,
          { stage: stage.name }
        );
      }
    }

    const externalExports = options.externalImports ? await this.loadExternalExports() : undefined;
    const resolver = new DependencyResolver(stages, { externalExports });
    await this.state.load();

    return { stages: new Map(stages.map(stage => [stage.name, stage])), resolver };
  }

  private async loadExternalExports(): Promise<Set<string>> {
    const exports = await this.executor.listExports();
    return new Set(exports.keys());
  }

  private selection(resolver: DependencyResolver, options: SelectionOptions): string[] {
    return options.stages && options.stages.length > 0
      ? resolver.selectStages(options.stages)
      : resolver.resolve().order;
  }

  /**
   * Every import produced inside the project must come from a stage that is already applied
   */
  private assertImportsApplied(stage: Stage, producers: Map<string, string>): void {
    for (const importName of stage.imports) {
      const producer = producers.get(importName);
      if (producer === undefined) {
        continue;
      }
      const status = this.state.get(producer)?.status;
      if (status !== 'applied') {
        throw new StackctlError(
          'IMPORT_NOT_APPLIED',
          `Stage ${stage.name} imports ${importName} from ${producer}, which is ${status ?? 'not deployed'}`,
          { stage: stage.name, remediation: `Deploy ${producer} first, or include it in the selection` }
        );
      }
    }
  }

  private async applyStage(stage: Stage): Promise<StageApplication> {
    await this.state.begin(stage.name, stage.stackName, stage.parameters, stage.templateHash);

    let result: ApplyResult;
    try {
      result = await this.executor.apply({
        stackName: stage.stackName,
        templateBody: stage.templateBody,
        parameters: stage.parameters,
        capabilities: stage.capabilities,
        tags: this.stackTags(stage),
      });
    } catch (error) {
      await this.state.transition(stage.name, 'failed', { error: errorMessage(error) });
      throw error;
    }

    const { stack, diagnosis } = result;
    switch (result.outcome) {
      case 'created':
      case 'updated':
      case 'unchanged':
        await this.state.transition(stage.name, 'applied', {
          ...(stack.stackId && { stackId: stack.stackId }),
          outputs: stack.outputs,
        });
        return { outcome: result.outcome, outputs: stack.outputs };
      case 'rolled-back':
      case 'failed': {
        const summary = diagnosis?.summary ?? stack.statusReason ?? 'no failure events were reported';
        await this.state.transition(stage.name, result.outcome, {
          ...(stack.stackId && { stackId: stack.stackId }),
          error: summary,
        });
        return {
          outcome: result.outcome,
          outputs: {},
          error: {
            code: 'STACK_OPERATION_FAILED',
            message: `Stack ${stage.stackName} of stage ${stage.name} ended in ${stack.status}: ${summary}`,
            stage: stage.name,
            details: { failures: result.failures, diagnosis },
            ...(diagnosis && { remediation: diagnosis.remediation }),
          },
        };
      }
    }
  }

  private stackTags(stage: Stage): Record<string, string> {
    return {
      ...stage.tags,
      ManagedBy: MANAGED_BY,
      Project: this.config.project.name,
      Stage: stage.name,
      ...(this.config.project.environment && { Environment: this.config.project.environment }),
    };
  }

  private skipped(names: string[], stages: Map<string, Stage>): StageResult[] {
    return names.map((name): StageResult => ({
      stage: name,
      stackName: stages.get(name)?.stackName ?? name,
      outcome: 'skipped',
      outputs: {},
      durationMs: 0,
    }));
  }

  private createMetadata(): DeploymentMetadata {
    return {
      deploymentId: uuidv4(),
      timestamp: new Date(),
      region: this.config.aws.region,
      project: this.config.project.name,
    };
  }

  private generatorContext(stackNames: Map<string, string>): GeneratorContext {
    const context: GeneratorContext = { stackNames: {} };
    for (const stageConfig of this.config.stages) {
      const kind = builtinKindOf(stageConfig.template);
      if (kind && context.stackNames[kind] === undefined) {
        context.stackNames[kind] = this.stackNameOf(stageConfig.name, stackNames);
      }
    }
    return context;
  }

  private stackNameOf(stage: string, stackNames: Map<string, string>): string {
    const stackName = stackNames.get(stage);
    if (!stackName) {
      throw new StackctlError('UNKNOWN_STAGE', `Unknown stage: ${stage}`);
    }
    return stackName;
  }

  private requireStage(stages: Map<string, Stage>, name: string): Stage {
    const stage = stages.get(name);
    if (!stage) {
      throw new StackctlError('UNKNOWN_STAGE', `Unknown stage: ${name}`);
    }
    return stage;
  }
}
