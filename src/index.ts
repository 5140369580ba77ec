#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { QualityGatePipeline } from './core/pipeline-controller.js';
import { generateDefaultPipeline, validatePipelineFile, type GateDefinition } from './parsers/index.js';
import { FileBaselineStore } from './storage/file-adapter.js';
import { FilePhaseState } from './storage/phase-state.js';
import { loadConfig, generateDefaultConfig, getConfigFilePath, type Config, type ConfigOverrides } from './utils/config.js';
import { ConfigError, QgateError, ValidationError, errorMessage } from './utils/errors.js';
import { CliGitClient } from './utils/git.js';
import { setLogLevel } from './utils/logger.js';
import { buildCompactResult, renderTextReport, type IGateResult } from './validation/index.js';

const EXIT_FAILED = 1;
const EXIT_FATAL = 2;

const program = new Command();

type GlobalOptions = {
  config?: string;
  workspace?: string;
  verbose?: boolean;
};

interface RunOptions {
  scope?: string;
  json?: boolean;
  compact?: boolean;
}

function resolveConfig(globalOpts: GlobalOptions): Config {
  const overrides: ConfigOverrides = {
    configFile: globalOpts.config,
    workspaceRoot: globalOpts.workspace,
    verbose: globalOpts.verbose,
  };
  const config = loadConfig(overrides);
  if (config.verbose) setLogLevel('debug');
  return config;
}

function fail(error: unknown): never {
  const label = error instanceof ConfigError
    ? 'Configuration error'
    : error instanceof ValidationError ? 'Invalid input' : 'Error';
  console.error(chalk.red(`${label}: ${errorMessage(error)}`));
  process.exit(error instanceof QgateError ? EXIT_FATAL : EXIT_FAILED);
}

program
  .name('qgate')
  .description('Run config-driven quality gates against changed, failing or explicit files')
  .version('1.0.0')
  .option('--config <path>', 'Path to config file (default: .qgaterc.json)')
  .option('-w, --workspace <path>', 'Workspace root (default: current directory)')
  .option('-v, --verbose', 'Enable verbose logging');

program
  .command('init')
  .description('Write a starter quality gate pipeline')
  .option('-f, --force', 'Overwrite existing files')
  .option('--rc', 'Also write a .qgaterc.json runtime config')
  .action((options: { force?: boolean; rc?: boolean }, cmd: Command) => {
    let config: Config;
    try {
      config = resolveConfig(cmd.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      fail(error);
    }

    const targets: Array<[string, () => string]> = [[config.pipelineFile, generateDefaultPipeline]];
    if (options.rc) targets.push([getConfigFilePath(), generateDefaultConfig]);

    for (const [path, render] of targets) {
      if (existsSync(path) && !options.force) {
        console.error(chalk.red(`File already exists: ${path}`));
        console.error(chalk.gray('Use --force to overwrite'));
        process.exit(EXIT_FAILED);
      }
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, render(), 'utf-8');
      console.log(chalk.green(`✓ Created ${path}`));
    }
    console.log(chalk.gray('\nEdit the pipeline to match the tools your project uses.'));
  });

program
  .command('config')
  .description('Show resolved configuration (merges config file, env vars, and defaults)')
  .action((_: unknown, cmd: Command) => {
    let config: Config;
    try {
      config = resolveConfig(cmd.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      fail(error);
    }

    console.log(chalk.blue('\n📋 Resolved Configuration:\n'));
    for (const [key, value] of Object.entries(config)) {
      console.log(chalk.gray(`   ${key.padEnd(16)}`) + chalk.white(String(value)));
    }
    console.log();
  });

program
  .command('validate')
  .description('Validate the quality gate pipeline without running it')
  .argument('[pipeline]', 'Path to pipeline file (default: configured pipelineFile)')
  .action((pipelinePath: string | undefined, _: unknown, cmd: Command) => {
    let config: Config;
    try {
      config = resolveConfig(cmd.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      fail(error);
    }

    const path = pipelinePath ?? config.pipelineFile;
    const result = validatePipelineFile(path);

    if (result.valid) {
      console.log(chalk.green(`✓ Pipeline is valid: ${path}`));
      return;
    }

    console.error(chalk.red('✗ Pipeline validation failed:'));
    result.errors.forEach(e => console.error(chalk.red(`  - ${e}`)));
    process.exit(EXIT_FATAL);
  });

program
  .command('baseline')
  .description('Show the recorded quality baseline')
  .action(async (_: unknown, cmd: Command) => {
    try {
      const config = resolveConfig(cmd.optsWithGlobals<GlobalOptions>());
      const baseline = await new FileBaselineStore(config.stateFile).load();

      console.log(chalk.blue('\n📊 Quality baseline:\n'));
      console.log(chalk.gray('   sha           ') + chalk.white(baseline.baseline_sha || '(none, next auto run scans the project)'));
      console.log(chalk.gray('   failed files  ') + chalk.white(String(baseline.failed_files.length)));
      baseline.failed_files.forEach(f => console.log(chalk.red(`     - ${f}`)));
      console.log();
    } catch (error) {
      fail(error);
    }
  });

program
  .command('run')
  .description('Run the active quality gates')
  .argument('[files...]', 'Files or directories to check (implies --scope files)')
  .option('-s, --scope <scope>', 'auto | branch | project | files')
  .option('--json', 'Print the full run summary as JSON on stdout')
  .option('--compact', 'Print only gate ids and outcomes as JSON on stdout')
  .action(async (files: string[], options: RunOptions, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    const scope = options.scope ?? (files.length > 0 ? 'files' : 'auto');

    let config: Config;
    try {
      config = resolveConfig(globalOpts);
    } catch (error) {
      fail(error);
    }
    if (!config.verbose && !process.env.QGATE_LOG_LEVEL) setLogLevel('warn');

    const pipeline = new QualityGatePipeline({
      workspaceRoot: config.workspaceRoot,
      pipelineFile: config.pipelineFile,
      baselineStore: new FileBaselineStore(config.stateFile),
      git: new CliGitClient(config.workspaceRoot),
      phaseState: new FilePhaseState(config.stateFile),
    });

    const spinner = ora({ text: 'Resolving scope...', stream: process.stderr }).start();
    pipeline.on('gateStarted', (gate: GateDefinition) => {
      spinner.text = `Running ${gate.name}...`;
    });
    pipeline.on('gatePassed', (result: IGateResult) => {
      spinner.succeed(`${result.name} (${result.duration_ms}ms)`).start();
    });
    pipeline.on('gateFailed', (result: IGateResult) => {
      spinner.fail(`${result.name}: ${result.score}`).start();
    });
    pipeline.on('gateSkipped', (result: IGateResult) => {
      spinner.info(`${result.name}: ${result.skip_reason ?? 'skipped'}`).start();
    });

    try {
      const summary = await pipeline.run({ scope, ...(files.length > 0 ? { files } : {}) });
      spinner.stop();

      if (options.compact) {
        console.log(JSON.stringify(buildCompactResult(summary), null, 2));
      } else if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        const [headline, ...rest] = renderTextReport(summary).split('\n');
        console.log([summary.overall_pass ? chalk.green(headline) : chalk.red(headline), ...rest].join('\n'));
      }

      process.exitCode = summary.overall_pass ? 0 : EXIT_FAILED;
    } catch (error) {
      spinner.stop();
      fail(error);
    }
  });

program.parseAsync().catch(fail);
