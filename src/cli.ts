#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, existsSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { ProjectConfigLoader, loadDefaultConfig } from './config/loader.js';
import { renderInitConfig } from './config/init-template.js';
import { DeploymentOrchestrator } from './orchestration/deployment-orchestrator.js';
import { createConsoleLogger } from './logging/index.js';
import { errorMessage, isStackctlError } from './errors/index.js';
import { verifyCompanionFiles } from './companion/verifier.js';
import { hasErrors } from './lint/project-linter.js';
import { DeploymentResult, StageOutcome } from './types/index.js';
import { PlanEntry } from './orchestration/types.js';
import { TemplateFormat } from './templates/template-engine.js';

interface ProjectOptions {
  config?: string;
  verbose?: boolean;
}

interface CommonOptions extends ProjectOptions {
  stage?: string[];
  externalImports?: boolean;
}

interface StatusCommandOptions extends ProjectOptions {
  stage?: string[];
}

interface LintCommandOptions extends ProjectOptions {
  externalImports?: boolean;
}

interface DeployOptions extends CommonOptions {
  dryRun?: boolean;
}

interface DestroyCommandOptions extends CommonOptions {
  force?: boolean;
}

interface DriftCommandOptions extends CommonOptions {
  remote: boolean;
}

interface SynthOptions {
  config?: string;
  format?: TemplateFormat;
}

interface InitCommandOptions {
  name: string;
  region: string;
  environment: string;
  githubOwner?: string;
  githubRepo?: string;
  output: string;
  force?: boolean;
}

function readPackageVersion(): string {
  const packagePath = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

const OUTCOME_COLORS: Record<StageOutcome, (text: string) => string> = {
  created: chalk.green,
  updated: chalk.green,
  unchanged: chalk.gray,
  deleted: chalk.green,
  absent: chalk.gray,
  skipped: chalk.yellow,
  failed: chalk.red,
  'rolled-back': chalk.red,
};

async function createOrchestrator(options: ProjectOptions): Promise<DeploymentOrchestrator> {
  const { path, config } = options.config
    ? { path: options.config, config: await new ProjectConfigLoader().load(resolve(process.cwd(), options.config)) }
    : await loadDefaultConfig();
  return new DeploymentOrchestrator(config, {
    baseDir: dirname(resolve(process.cwd(), path)),
    logger: createConsoleLogger({ verbose: options.verbose }),
  });
}

function fail(spinnerText: string, error: unknown, verbose?: boolean): never {
  console.error(chalk.red(`❌ ${spinnerText}:`), errorMessage(error));
  if (isStackctlError(error) && error.remediation) {
    console.error(chalk.yellow(`💡 ${error.remediation}`));
  }
  if (verbose) {
    console.error(error);
  }
  process.exit(1);
}

function printPlan(entries: PlanEntry[]): void {
  console.log(chalk.blue('\n📋 Deployment plan:'));
  entries.forEach((entry, index) => {
    const action = entry.action === 'no-change' ? chalk.gray(entry.action) : chalk.cyan(entry.action);
    console.log(`  ${index + 1}. ${entry.stage} (${entry.stackName}): ${action}`);
    if (entry.after.length > 0) {
      console.log(chalk.gray(`     after ${entry.after.map(edge => `${edge.stage} [${edge.reason}]`).join(', ')}`));
    }
    if (entry.changedParameters.length > 0) {
      console.log(`     changed parameters: ${entry.changedParameters.join(', ')}`);
    }
    if (entry.templateChanged) {
      console.log('     template changed');
    }
  });
}

function printResult(result: DeploymentResult): void {
  result.stages.forEach(stage => {
    const color = OUTCOME_COLORS[stage.outcome];
    console.log(`  ${stage.stage} (${stage.stackName}): ${color(stage.outcome)} ${chalk.gray(`${stage.durationMs}ms`)}`);
    Object.entries(stage.outputs).forEach(([key, value]) => {
      console.log(chalk.gray(`     ${key} = ${value}`));
    });
  });

  if (result.errors) {
    console.log(chalk.red('\n❌ Errors:'));
    result.errors.forEach(error => {
      console.log(`  ${error.code}: ${error.message}`);
      if (error.remediation) {
        console.log(chalk.yellow(`  💡 ${error.remediation}`));
      }
    });
  }

  console.log(chalk.gray(`\n⏱️  Took ${result.metadata.duration ?? 0}ms`));
  console.log(chalk.gray(`🆔 Deployment ID: ${result.metadata.deploymentId}`));
}

function withProjectOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to project file (default: stacks.yml, stacks.yaml or stacks.json)')
    .option('-v, --verbose', 'Enable verbose logging');
}

function withStageOption(command: Command): Command {
  return command.option('--stage <names...>', 'Only act on these stages');
}

function withExternalImportsOption(command: Command): Command {
  return command.option('--external-imports', 'Accept imports of exports that already exist outside the project');
}

function withCommonOptions(command: Command): Command {
  return withExternalImportsOption(withStageOption(withProjectOptions(command)));
}

const program = new Command();

program
  .name('stackctl')
  .description('Deploy network, container, service and pipeline stacks to CloudFormation in dependency order')
  .version(readPackageVersion());

program
  .command('init')
  .description('Create a project file with the network, container, service and pipeline stages')
  .option('-n, --name <name>', 'Project name', 'my-app')
  .option('-r, --region <region>', 'AWS region', 'us-east-1')
  .option('-e, --environment <env>', 'Environment tag', 'production')
  .option('--github-owner <owner>', 'Owner of the application repository')
  .option('--github-repo <repo>', 'Name of the application repository')
  .option('-o, --output <path>', 'Output project file path', 'stacks.yml')
  .option('-f, --force', 'Overwrite an existing project file')
  .action((options: InitCommandOptions) => {
    const spinner = ora('Initializing project configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists; pass --force to overwrite it`);
      }

      writeFileSync(options.output, renderInitConfig({
        name: options.name,
        region: options.region,
        environment: options.environment,
        githubOwner: options.githubOwner,
        githubRepo: options.githubRepo,
      }));

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review the CIDR blocks and parameters of each stage');
      console.log('2. Export GITHUB_TOKEN and make sure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('stackctl lint')} and ${chalk.cyan('stackctl deploy')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail('Error', error);
    }
  });

withCommonOptions(program.command('plan'))
  .description('Show the deployment order and what each stage would do')
  .action(async (options: CommonOptions) => {
    try {
      const orchestrator = await createOrchestrator(options);
      printPlan(await orchestrator.plan({ stages: options.stage, externalImports: options.externalImports }));
    } catch (error) {
      fail('Plan failed', error, options.verbose);
    }
  });

withCommonOptions(program.command('deploy'))
  .description('Deploy stages in dependency order')
  .option('--dry-run', 'Show the plan without making changes')
  .action(async (options: DeployOptions) => {
    const spinner = ora('Preparing deployment...').start();

    try {
      const orchestrator = await createOrchestrator(options);
      const selection = { stages: options.stage, externalImports: options.externalImports };

      if (options.dryRun) {
        const entries = await orchestrator.plan(selection);
        spinner.succeed('Dry run completed - nothing was changed');
        printPlan(entries);
        return;
      }

      spinner.text = 'Deploying stacks...';
      spinner.stopAndPersist({ symbol: '🚀' });
      const result = await orchestrator.deploy(selection);

      if (result.success) {
        console.log(chalk.green('\n✅ Deployment completed successfully!'));
        printResult(result);
      } else {
        console.log(chalk.red('\n❌ Deployment failed'));
        printResult(result);
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Deployment failed');
      fail('Error', error, options.verbose);
    }
  });

withCommonOptions(program.command('destroy'))
  .description('Delete stages in the reverse of deployment order')
  .option('-f, --force', 'Destroy even when stages outside the selection still depend on it')
  .action(async (options: DestroyCommandOptions) => {
    try {
      const orchestrator = await createOrchestrator(options);
      const result = await orchestrator.destroy({
        stages: options.stage,
        externalImports: options.externalImports,
        force: options.force,
      });

      console.log(result.success ? chalk.green('\n✅ Teardown completed') : chalk.red('\n❌ Teardown failed'));
      printResult(result);
      if (!result.success) {
        process.exit(1);
      }
    } catch (error) {
      fail('Teardown failed', error, options.verbose);
    }
  });

withStageOption(withProjectOptions(program.command('status')))
  .description('Show recorded deployments and live stack status')
  .action(async (options: StatusCommandOptions) => {
    const spinner = ora('Checking deployment status...').start();

    try {
      const orchestrator = await createOrchestrator(options);
      const reports = await orchestrator.status({ stages: options.stage });
      spinner.succeed('Status check completed');

      reports.forEach(report => {
        const recorded = report.record ? `${report.record.status} (${report.record.updatedAt})` : 'not deployed';
        const live = report.liveStatus ?? 'absent';
        console.log(`  ${report.stage} (${report.stackName}): ${recorded}, live ${live}`);
        if (report.record?.error) {
          console.log(chalk.red(`     ${report.record.error}`));
        }
      });
    } catch (error) {
      spinner.fail('Status check failed');
      fail('Error', error, options.verbose);
    }
  });

withCommonOptions(program.command('drift'))
  .description('Compare stages with their last deployment and with the live stacks')
  .option('--no-remote', 'Skip CloudFormation drift detection')
  .action(async (options: DriftCommandOptions) => {
    const spinner = ora('Detecting drift...').start();

    try {
      const orchestrator = await createOrchestrator(options);
      const reports = await orchestrator.drift({
        stages: options.stage,
        externalImports: options.externalImports,
        remote: options.remote,
      });
      spinner.succeed('Drift detection completed');

      reports.forEach(report => {
        const local = report.local.drifted
          ? chalk.yellow([
            ...(report.local.templateChanged ? ['template changed'] : []),
            ...report.local.changedParameters.map(key => `parameter ${key} changed`),
          ].join(', '))
          : chalk.green('in sync');
        console.log(`  ${report.stage} (${report.stackName}): local ${local}, remote ${report.remote}`
          + (report.driftedResources > 0 ? ` (${report.driftedResources} resources drifted)` : ''));
      });
    } catch (error) {
      spinner.fail('Drift detection failed');
      fail('Error', error, options.verbose);
    }
  });

withExternalImportsOption(withProjectOptions(program.command('lint')))
  .description('Check stack-name parameters, teardown order, CIDR layout and resource references')
  .action(async (options: LintCommandOptions) => {
    try {
      const orchestrator = await createOrchestrator(options);
      const issues = await orchestrator.lint({ externalImports: options.externalImports });

      if (issues.length === 0) {
        console.log(chalk.green('✅ No issues found'));
        return;
      }

      issues.forEach(issue => {
        const label = issue.severity === 'error' ? chalk.red('error') : chalk.yellow('warning');
        console.log(`  ${label} ${issue.rule}${issue.stage ? ` [${issue.stage}]` : ''}: ${issue.message}`);
      });
      if (hasErrors(issues)) {
        process.exit(1);
      }
    } catch (error) {
      fail('Lint failed', error, options.verbose);
    }
  });

program
  .command('synth <stage>')
  .description('Print the template of a stage')
  .option('-c, --config <path>', 'Path to project file (default: stacks.yml, stacks.yaml or stacks.json)')
  .addOption(new Option('-f, --format <format>', 'Re-render the template').choices(['json', 'yaml']))
  .action(async (stage: string, options: SynthOptions) => {
    try {
      const orchestrator = await createOrchestrator(options);
      console.log(await orchestrator.synth(stage, options.format));
    } catch (error) {
      fail('Synth failed', error);
    }
  });

program
  .command('check-app [dir]')
  .description('Check the Dockerfile, buildspec.yml and appspec.yaml of the application repository')
  .action(async (dir: string | undefined) => {
    try {
      const findings = await verifyCompanionFiles(resolve(process.cwd(), dir ?? '.'));
      if (findings.length === 0) {
        console.log(chalk.green('✅ Companion files look complete'));
        return;
      }

      findings.forEach(finding => {
        const label = finding.severity === 'error' ? chalk.red('error') : chalk.yellow('warning');
        console.log(`  ${label} ${finding.file}: ${finding.message}`);
      });
      if (findings.some(finding => finding.severity === 'error')) {
        process.exit(1);
      }
    } catch (error) {
      fail('Check failed', error);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync();
}
