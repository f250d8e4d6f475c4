/**
 * Generate Command
 *
 * Loads schema files and a generator configuration, runs the pipeline and
 * writes the artifacts under the output directory.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import {
  ConfigurationError,
  SchemaSmithError,
  ValidationError,
  createChildLogger,
  formatDiagnostic,
  getConfig,
  wrapError,
} from '@schemasmith/shared';
import {
  FileManager,
  GenerationOrchestrator,
  parseGeneratorConfig,
  resolveGeneratorConfig,
  type GeneratorConfig,
} from '@schemasmith/core';
import { loadSchemaSources } from '../sources.js';

const logger = createChildLogger({ component: 'GenerateCommand' });

export interface GenerateOptions {
  /** Generator configuration file (YAML or JSON) */
  config?: string;
  /** Output directory */
  out?: string;
  /** List artifacts without writing them */
  dryRun?: boolean;
}

export interface CommandOutput {
  info(line: string): void;
  error(line: string): void;
}

const consoleOutput: CommandOutput = {
  info: (line) => console.log(line),
  error: (line) => console.error(line),
};

async function loadGeneratorConfig(path: string | undefined): Promise<GeneratorConfig> {
  if (path === undefined) {
    return resolveGeneratorConfig();
  }

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read generator configuration ${path}: ${reason}`, { path });
  }
  return parseGeneratorConfig(text, path);
}

function reportError(error: unknown, output: CommandOutput): void {
  const wrapped = wrapError(error);
  output.error(`error: ${wrapped.message}`);
  if (wrapped instanceof ValidationError) {
    for (const issue of wrapped.issues) {
      output.error(`  ${issue}`);
    }
  }
  logger.debug({ error: wrapped.toJSON() }, 'Generate command failed');
}

/**
 * Run a generation and report to `output`. Resolves to the process exit code.
 */
export async function runGenerate(
  paths: readonly string[],
  options: GenerateOptions = {},
  output: CommandOutput = consoleOutput
): Promise<number> {
  try {
    const env = getConfig();
    const config = await loadGeneratorConfig(options.config ?? env.generator.configPath);
    const sources = await loadSchemaSources(paths);
    if (sources.length === 0) {
      output.error('error: no schema files found');
      return 1;
    }

    const result = await new GenerationOrchestrator(config).run(sources);

    for (const diagnostic of result.diagnostics) {
      output.error(`${diagnostic.severity}: ${formatDiagnostic(diagnostic)}`);
    }

    if (!result.success) {
      const fatal = result.diagnostics.filter((d) => d.severity === 'error').length;
      output.error(`generation failed in the ${result.failedPhase ?? 'unknown'} phase with ${fatal} error(s)`);
      return 1;
    }

    if (options.dryRun) {
      for (const name of result.artifacts.keys()) {
        output.info(name);
      }
      return 0;
    }

    const fileManager = new FileManager(options.out ?? env.generator.outputDir);
    await fileManager.initialize();
    const written = await fileManager.writeArtifacts(
      [...result.artifacts].map(([name, content]) => ({ name, content }))
    );

    for (const failure of written.failed) {
      output.error(`error: cannot write ${failure.path}: ${failure.error}`);
    }
    output.info(`wrote ${written.written.length} file(s) to ${fileManager.getBaseDir()}`);

    return written.success ? 0 : 1;
  } catch (error) {
    if (!(error instanceof SchemaSmithError)) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unexpected failure');
    }
    reportError(error, output);
    return 1;
  }
}

export function createGenerateCommand(output: CommandOutput = consoleOutput): Command {
  return new Command('generate')
    .description('Generate TypeScript modules from SQL schema files')
    .argument('<paths...>', 'schema files or directories to search for *.sql')
    .option('-c, --config <path>', 'generator configuration file (YAML or JSON)')
    .option('-o, --out <dir>', 'output directory')
    .option('--dry-run', 'list the artifacts without writing them', false)
    .action(async (paths: string[], options: GenerateOptions) => {
      process.exitCode = await runGenerate(paths, options, output);
    });
}
