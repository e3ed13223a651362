#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { Readable, Writable } from 'node:stream';
import { ConfigurationError, describeError } from '../common/errors';
import {
  LogFormat,
  LogLevel,
  Logger,
  configureLogger,
  getLogger,
  parseLogFormat,
  parseLogLevel,
} from '../common/logger';
import { PiiVeilConfig, loadConfig } from '../config';
import { detectorRegistry } from '../detectors/registry';
import { deanonymize } from '../engine/deanonymizer';
import { Mapping, OVERLAP_STRATEGIES, isOverlapStrategy } from '../engine/types';
import { CreateGuardOptions, PiiGuard, createGuard } from '../guard/guard';
import { withSpan } from '../observability';
import { listPolicies, loadPolicyFile } from '../policy/loader';
import { buildDetectionReport, renderDetectionReportText } from '../reports';
import { scanDirectory } from '../scan';
import { createServer } from '../api/server';

export interface CliIo {
  stdout: Writable;
  stdin: Readable & { isTTY?: boolean };
}

export interface GuardFlags {
  config?: string;
  profile?: string;
  policy?: string;
  policyPath?: string;
  detectors?: string[];
  overlap?: string;
}

interface InputFlags {
  file?: string;
}

/** Logging settings given on the command line; they win over the config file. */
interface LoggingFlags {
  level?: LogLevel;
  format?: LogFormat;
}

function buildSampleConfig(): string {
  return `guard:
  detectors:
    - regex
  policy: default_pii
  overlapStrategy: longest-match
  validateMatches: false
  customPatterns: []
server:
  host: 127.0.0.1
  port: 4000
  bodyLimit: 1048576
logging:
  level: info
  format: text
profiles:
  strict:
    guard:
      detectors:
        - regex
        - enhanced_regex
      policy: gdpr_strict
`;
}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

/** Text from the argument, else `--file`, else piped stdin. Blank input is rejected. */
export async function readInput(text: string | undefined, flags: InputFlags, stdin: CliIo['stdin']): Promise<string> {
  let input: string | undefined = text;
  if (input === undefined && flags.file) {
    input = await readFile(resolve(flags.file), 'utf8');
  }
  if (input === undefined && !stdin.isTTY) {
    const buffers: Buffer[] = [];
    for await (const chunk of stdin) {
      buffers.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    input = Buffer.concat(buffers).toString('utf8');
  }
  if (input === undefined || input.trim() === '') {
    throw new ConfigurationError('No input text: pass it as an argument, with --file, or on stdin');
  }
  return input;
}

/** Config file values first, command-line flags on top. */
export function resolveGuardOptions(flags: GuardFlags, config?: PiiVeilConfig): CreateGuardOptions {
  const options: CreateGuardOptions = { ...config?.guard };
  if (flags.detectors && flags.detectors.length > 0) {
    options.detectors = flags.detectors;
  }
  if (flags.policy) {
    options.policy = flags.policy;
    delete options.policyPath;
  }
  if (flags.policyPath) {
    options.policyPath = resolve(flags.policyPath);
  }
  if (flags.overlap) {
    if (!isOverlapStrategy(flags.overlap)) {
      throw new ConfigurationError(
        `Unknown overlap strategy "${flags.overlap}". Use one of ${OVERLAP_STRATEGIES.join(', ')}`,
      );
    }
    options.overlapStrategy = flags.overlap;
  }
  return options;
}

async function loadOptionalConfig(flags: GuardFlags, logging: LoggingFlags): Promise<PiiVeilConfig | undefined> {
  if (!flags.config) {
    if (flags.profile) {
      throw new ConfigurationError('--profile needs --config');
    }
    return undefined;
  }
  const config = await loadConfig(flags.config, flags.profile);
  if (config.logging) {
    configureLogger({
      level: logging.level ? undefined : config.logging.level,
      format: logging.format ? undefined : config.logging.format,
    });
  }
  return config;
}

async function buildGuard(
  flags: GuardFlags,
  logging: LoggingFlags,
): Promise<{ guard: PiiGuard; config?: PiiVeilConfig }> {
  const config = await loadOptionalConfig(flags, logging);
  const guard = await createGuard(resolveGuardOptions(flags, config));
  return { guard, config };
}

async function runAction(log: Logger, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    log.error(describeError(error));
    process.exitCode = 1;
  }
}

function withGuardOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--policy <name>', 'Built-in policy name')
    .option('--policy-path <path>', 'Policy file (YAML, TOML or JSON)')
    .option('--detectors <ids...>', 'Detector ids, in run order')
    .option('--overlap <strategy>', `Overlap strategy (${OVERLAP_STRATEGIES.join('|')})`);
}

function writeJson(stream: Writable, value: unknown) {
  stream.write(`${JSON.stringify(value, null, 2)}\n`);
}

export async function runCli(argv = process.argv, io: CliIo = { stdout: process.stdout, stdin: process.stdin }) {
  const program = new Command();
  program.name('pii-veil').description('Reversible PII anonymization for text sent to language models');
  const out = io.stdout;
  const logging: LoggingFlags = {};

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)')
    .option('--log-format <format>', 'Log format (text|json)')
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<{ logLevel?: string; logFormat?: string }>();
      try {
        logging.level = parseLogLevel(opts.logLevel);
        logging.format = parseLogFormat(opts.logFormat);
        configureLogger({ level: logging.level, format: logging.format, destination: process.stderr });
      } catch (error) {
        console.error(describeError(error));
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', 'pii-veil.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      await runAction(log, async () => {
        const target = resolve(options.config);
        await ensureDir(target);
        try {
          await writeFile(target, buildSampleConfig(), { flag: 'wx' });
        } catch (error) {
          if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
            throw new ConfigurationError(`Config file already exists at ${target}`, { cause: error });
          }
          throw error;
        }
        log.info(`Created config at ${target}`);
      });
    });

  withGuardOptions(
    program
      .command('detect')
      .description('List detected entities')
      .argument('[text]', 'Text to inspect')
      .option('--file <path>', 'Read text from file')
      .option('--report', 'Print a risk and coverage report')
      .option('--json', 'Emit JSON'),
  ).action(async (text: string | undefined, options: GuardFlags & InputFlags & { report?: boolean; json?: boolean }) => {
    const log = getLogger('cli:detect');
    await runAction(log, async () => {
      const input = await readInput(text, options, io.stdin);
      const { guard } = await buildGuard(options, logging);
      const matches = await withSpan(
        'cli.detect',
        { 'text.length': input.length },
        async () => guard.detect(input),
        (found) => ({ 'pii.entities': found.length }),
      );
      const report = options.report ? buildDetectionReport(input, matches, { includePreview: true }) : undefined;
      if (options.json) {
        writeJson(out, report ? { matches, report } : { matches });
        return;
      }
      for (const match of matches) {
        const confidence = match.confidence !== undefined ? match.confidence.toFixed(2) : '-';
        out.write(`${match.entityType}\t${match.start}-${match.end}\t${confidence}\n`);
      }
      if (report) {
        out.write(renderDetectionReportText(report));
      }
    });
  });

  withGuardOptions(
    program
      .command('anonymize')
      .description('Replace detected entities with placeholders')
      .argument('[text]', 'Text to anonymize')
      .option('--file <path>', 'Read text from file')
      .option('--mapping-out <path>', 'Write the placeholder mapping to a JSON file')
      .option('--json', 'Emit anonymized text and mapping as JSON'),
  ).action(async (text: string | undefined, options: GuardFlags & InputFlags & { mappingOut?: string; json?: boolean }) => {
    const log = getLogger('cli:anonymize');
    await runAction(log, async () => {
      const input = await readInput(text, options, io.stdin);
      const { guard } = await buildGuard(options, logging);
      const result = await withSpan(
        'cli.anonymize',
        { 'text.length': input.length, policy: guard.policy.name },
        async () => guard.anonymize(input),
        (anonymized) => ({ 'pii.placeholders': Object.keys(anonymized.mapping).length }),
      );
      if (options.mappingOut) {
        const target = resolve(options.mappingOut);
        await ensureDir(target);
        await writeFile(target, `${JSON.stringify(result.mapping, null, 2)}\n`, { mode: 0o600 });
        log.info(`Mapping written to ${target}`, { placeholders: Object.keys(result.mapping).length });
      }
      if (options.json) {
        writeJson(out, result);
        return;
      }
      out.write(result.anonymized.endsWith('\n') ? result.anonymized : `${result.anonymized}\n`);
    });
  });

  program
    .command('deanonymize')
    .description('Restore original values from a mapping file')
    .argument('[text]', 'Text containing placeholders')
    .option('--file <path>', 'Read text from file')
    .requiredOption('--mapping <path>', 'Mapping JSON produced by anonymize')
    .action(async (text: string | undefined, options: InputFlags & { mapping: string }) => {
      const log = getLogger('cli:deanonymize');
      await runAction(log, async () => {
        const input = await readInput(text, options, io.stdin);
        const mapping = await readMappingFile(options.mapping);
        const restored = deanonymize(input, mapping);
        out.write(restored.endsWith('\n') ? restored : `${restored}\n`);
      });
    });

  withGuardOptions(
    program
      .command('scan')
      .description('Report entities found in the files of a directory')
      .argument('<dir>', 'Directory to scan')
      .option('--pattern <glob>', 'File glob relative to the directory', '**/*')
      .option('--no-recursive', 'Do not descend into subdirectories')
      .option('--json', 'Emit JSON'),
  ).action(async (dir: string, options: GuardFlags & { pattern: string; recursive: boolean; json?: boolean }) => {
    const log = getLogger('cli:scan');
    await runAction(log, async () => {
      const { guard } = await buildGuard(options, logging);
      const root = resolve(dir);
      const result = await withSpan(
        'cli.scan',
        { root },
        () => scanDirectory(root, guard, { pattern: options.pattern, recursive: options.recursive }),
        (scan) => ({ 'scan.files': scan.totals.files, 'pii.entities': scan.totals.entities }),
      );
      if (options.json) {
        writeJson(out, result);
        return;
      }
      for (const file of result.files.filter((entry) => entry.entities > 0)) {
        const types = Object.entries(file.byType)
          .map(([type, count]) => `${type}:${count}`)
          .join(' ');
        out.write(`${file.path}\t${file.entities}\t${types}\n`);
      }
      out.write(
        `${result.totals.filesWithPii}/${result.totals.files} files contain PII (${result.totals.entities} entities)\n`,
      );
    });
  });

  program
    .command('validate-policy')
    .description('Check a policy file')
    .argument('<path>', 'Policy file')
    .action(async (path: string) => {
      const log = getLogger('cli:validate-policy');
      await runAction(log, async () => {
        const policy = await loadPolicyFile(path);
        const types = Object.keys(policy.entities);
        out.write(`Policy ${policy.name} is valid (${types.length} entity types: ${types.join(', ')})\n`);
      });
    });

  program
    .command('policies')
    .description('List built-in policies')
    .action(async () => {
      const log = getLogger('cli:policies');
      await runAction(log, async () => {
        for (const name of await listPolicies()) {
          out.write(`${name}\n`);
        }
      });
    });

  program
    .command('detectors')
    .description('List registered detectors')
    .action(() => {
      for (const detector of detectorRegistry.list()) {
        out.write(`${detector.id}\t${detector.description}\n`);
      }
    });

  withGuardOptions(
    program
      .command('serve')
      .description('Start HTTP server')
      .option('--port <port>', 'Port override')
      .option('--host <host>', 'Host override'),
  ).action(async (options: GuardFlags & { port?: string; host?: string }) => {
    const log = getLogger('cli:serve');
    await runAction(log, async () => {
      const { guard, config } = await buildGuard(options, logging);
      const port = options.port ? Number(options.port) : config?.server?.port ?? 4000;
      const host = options.host ?? config?.server?.host ?? '127.0.0.1';
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigurationError(`Invalid port "${options.port}"`);
      }
      const server = createServer(guard, { bodyLimit: config?.server?.bodyLimit });
      await server.listen({ port, host });
      log.info(`Server listening on http://${host}:${port}`);
      const shutdown = (signal: string) => {
        log.info('Shutting down', { signal });
        server.close().then(
          () => log.info('Server stopped'),
          (error: unknown) => {
            log.error(`Failed to stop server: ${describeError(error)}`);
            process.exitCode = 1;
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  });

  await program.parseAsync(argv);
}

async function readMappingFile(path: string): Promise<Mapping> {
  const absolute = resolve(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(absolute, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read mapping ${absolute}: ${describeError(error)}`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Mapping ${absolute} must be a JSON object`);
  }
  const mapping: Mapping = {};
  for (const [placeholder, original] of Object.entries(parsed)) {
    if (typeof original !== 'string') {
      throw new ConfigurationError(`Mapping ${absolute} has a non-string value for ${placeholder}`);
    }
    mapping[placeholder] = original;
  }
  return mapping;
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}
