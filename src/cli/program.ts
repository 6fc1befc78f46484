/**
 * Command-line surface.
 *
 * Usage:
 *   cloud-audit collect --project-id <id> [--use-mock] [--output-dir <dir>]
 *   cloud-audit explain --project-id <id> [--use-mock] [--output-dir <dir>]
 *   cloud-audit report  --project-id <id> [--output-dir <dir>]
 *   cloud-audit audit   --project-id <id> [--use-mock] [--output-dir <dir>]
 *
 * Every command accepts --concurrency, --max-attempts, --timeout-ms and
 * --verbose. Exit status: 0 success, 1 stage failure, 2 invalid input.
 */

import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { Settings, loadSettings } from '../config/settings';
import { ConfigurationError, ExitCode, PipelineError, exitCodeFor } from '../domain/errors';
import { ARTIFACT_SLOTS } from '../domain/artifact';
import { StageName } from '../domain/run';
import { PipelineController } from '../engine/controller';
import { LiveAdapterOptions, createLiveAdapter } from '../invocation/live';
import { LogLevel, logger, parseLogLevel, setLogLevel } from '../logger';
import { ExecutionModeManager } from '../mode/mode-manager';
import { createDefaultStages } from '../stages';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Aborts the run at the next stage or sub-task boundary. */
  signal?: AbortSignal;
  /** Directory of mock fixtures; defaults to the packaged ones. */
  fixturesDir?: string;
  /** Overrides for the live adapter (transports, clock). */
  live?: Omit<LiveAdapterOptions, 'settings' | 'projectId' | 'config'>;
}

const CommandOptionsSchema = z.object({
  projectId: z.string().trim().min(1, 'must not be empty'),
  useMock: z.boolean().default(false),
  outputDir: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(32).optional(),
  maxAttempts: z.coerce.number().int().min(1).max(10).optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
});
type CommandOptions = z.infer<typeof CommandOptionsSchema>;

interface CommandSpec {
  name: string;
  description: string;
  stages: StageName[];
}

const COMMANDS: CommandSpec[] = [
  { name: 'collect', description: 'Collect resource configuration into collected.json', stages: ['collect'] },
  { name: 'explain', description: 'Derive findings from collected.json into explained.json', stages: ['explain'] },
  { name: 'report', description: 'Render explained.json as audit.md and audit.html', stages: ['report'] },
  { name: 'audit', description: 'Run collect, explain and report in sequence', stages: ['collect', 'explain', 'report'] },
];

/** Parse argv (without the node and script entries) and run; resolves to the exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  let exitCode = ExitCode.Success;

  const program = new Command()
    .name('cloud-audit')
    .description('Cloud security audit pipeline: collect, explain, report')
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  for (const definition of COMMANDS) {
    program
      .command(definition.name)
      .description(definition.description)
      .requiredOption('--project-id <id>', 'project to audit')
      .option('--use-mock', 'answer external calls from bundled fixtures', false)
      .option('--output-dir <dir>', 'artifact directory (default: $DATA_DIR or ./data)')
      .option('--concurrency <n>', 'parallel sub-tasks within a stage')
      .option('--max-attempts <n>', 'attempts per external call')
      .option('--timeout-ms <ms>', 'timeout per external call attempt')
      .option('--verbose', 'debug logging', false)
      .action(async (_options: unknown, command: Command) => {
        exitCode = await execute(definition, command.opts(), deps, stdout, stderr);
      });
  }

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? ExitCode.Success : ExitCode.InvalidInput;
    }
    throw err;
  }
  return exitCode;
}

async function execute(
  definition: CommandSpec,
  rawOptions: Record<string, unknown>,
  deps: CliDependencies,
  stdout: (text: string) => void,
  stderr: (text: string) => void,
): Promise<ExitCode> {
  try {
    const options = parseOptions(rawOptions);
    const settings = loadSettings(deps.env ?? process.env);
    setLogLevel(options.verbose ? LogLevel.Debug : parseLogLevel(settings.logLevel) ?? LogLevel.Info);

    const controller = new PipelineController(
      {
        modeManager: createModeManager(settings, options, deps),
        stages: createDefaultStages({ organizationId: settings.organizationId }),
        logger,
      },
      { concurrency: options.concurrency ?? settings.concurrency },
    );
    const result = await controller.run({
      projectId: options.projectId,
      mode: options.useMock ? 'mock' : 'live',
      outputDir: options.outputDir ?? settings.dataDir,
      stages: definition.stages,
      signal: deps.signal,
    });

    if (result.failure) {
      const { result: stageResult, error } = result.failure;
      stderr(`${stageResult.stage} stage failed: ${error.name}: ${error.message}\n`);
      return error.exitCode;
    }

    for (const slot of ARTIFACT_SLOTS) {
      const location = result.artifacts[slot];
      if (location) stdout(`${slot}: ${location}\n`);
    }
    return ExitCode.Success;
  } catch (err) {
    if (!(err instanceof PipelineError)) throw err;
    stderr(`${definition.name} failed: ${err.name}: ${err.message}\n`);
    return exitCodeFor(err);
  }
}

function parseOptions(raw: Record<string, unknown>): CommandOptions {
  const result = CommandOptionsSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `--${toFlag(issue.path.join('.'))}: ${issue.message}`);
    throw new ConfigurationError(`Invalid option ${problems.join('; ')}`, { issues: problems });
  }
  return result.data;
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

function createModeManager(settings: Settings, options: CommandOptions, deps: CliDependencies): ExecutionModeManager {
  return new ExecutionModeManager({
    fixtures: deps.fixturesDir,
    live: ({ projectId }) =>
      createLiveAdapter({
        ...deps.live,
        settings,
        projectId,
        config: {
          maxAttempts: options.maxAttempts ?? settings.maxAttempts,
          timeoutMs: options.timeoutMs ?? settings.timeoutMs,
        },
        logger,
      }),
  });
}
