import { Command, CommanderError } from 'commander';
import { DossierSetupError, createJsonLogger, errorMessage, type LineSink } from '@dossier/common';
import { loadEnv, resolveRunOptions, type CliRunOptions } from '@dossier/config';
import { processDossierBatch } from './dossier.processor.js';
import { loadAgentRoster } from './record-loader.js';
import { exitCodeFor, formatBatchSummary } from './summary.js';
import { DEFAULT_TEMPLATE_PATH, loadTemplate } from './template-loader.js';

export const SETUP_ERROR_EXIT_CODE = 2;

export interface CliDeps {
  env?: Record<string, string | undefined>;
  stdout?: LineSink;
  stderr?: LineSink;
}

interface CommandOptions {
  template?: string;
  photos?: string;
  output?: string;
  escapeHtml?: boolean;
}

export const runDossierCommand = async (cli: CliRunOptions, deps: CliDeps = {}): Promise<number> => {
  const { env = process.env, stdout = process.stdout, stderr = process.stderr } = deps;

  try {
    const options = resolveRunOptions(cli, loadEnv(env), DEFAULT_TEMPLATE_PATH);
    // stdout carries the summary; structured logs go to stderr.
    const logger = createJsonLogger({ level: options.logLevel, sink: stderr });

    const template = await loadTemplate(options.templatePath, logger);
    const roster = await loadAgentRoster(options.inputPath, logger);
    const summary = await processDossierBatch({
      rows: roster.rows,
      template,
      config: options,
      logger
    });

    stdout.write(formatBatchSummary(summary));
    return exitCodeFor(summary);
  } catch (error) {
    if (error instanceof DossierSetupError) {
      stderr.write(`Error: ${error.message}\n`);
      return SETUP_ERROR_EXIT_CODE;
    }
    throw error;
  }
};

export const createProgram = (deps: CliDeps, onExitCode: (code: number) => void): Command => {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  return new Command()
    .name('dossier')
    .description('Render one HTML dossier per agent from a CSV, XLSX, XLS or ODS roster')
    .argument('<input>', 'roster file, one row per agent')
    .option('-t, --template <path>', 'HTML template file (default: the bundled dossier template)')
    .option('-p, --photos <dir>', 'directory of <Agent_Name>.jpg photos (default: photos)')
    .option('-o, --output <dir>', 'output directory (default: dossiers)')
    .option('--escape-html', 'HTML-escape field values before substitution')
    .configureOutput({
      writeOut: (text) => {
        stdout.write(text);
      },
      writeErr: (text) => {
        stderr.write(text);
      }
    })
    .exitOverride()
    .action(async (input: string, options: CommandOptions) => {
      onExitCode(await runDossierCommand({ input, ...options }, deps));
    });
};

/** Parses `argv` (arguments only, no node/script prefix) and resolves to the process exit code. */
export const runCli = async (argv: readonly string[], deps: CliDeps = {}): Promise<number> => {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.version'
        ? 0
        : SETUP_ERROR_EXIT_CODE;
    }
    (deps.stderr ?? process.stderr).write(`Error: ${errorMessage(error)}\n`);
    return 1;
  }

  return exitCode;
};
