/**
 * Command-line interface
 *
 * fixture-advisor [options] <profile.json>...
 *
 * Each file holds one raw profile ({ context, data }) or an array of them.
 */

import { readFile } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { analyzeBatch } from '../pipeline';
import type { RawProfileInput } from '../pipeline';
import { loadConfig } from '../config';
import type { AdvisorConfigInput } from '../config';
import { isAdvisorError, AdvisorErrorFactory } from '../errors/types';
import { formatRecommendation, toJsonObject } from '../output/formatter';
import { SpecFileGuard } from '../safety/specFileGuard';
import { contextLocation } from '../normalizer/profileNormalizer';
import { AdvisorLogger } from '../logging/logger';
import { toError } from '../../shared/errors/types';
import { AGENT_CONCERNS } from '../types';
import type { AgentConcern } from '../types';

export const USAGE = `Usage: fixture-advisor [options] <profile.json>...

Options:
  --json                       Print recommendations as JSON
  --enforce                    Exit 1 when a high-confidence recommendation is found
  --fail-on-high-confidence    Mark enforcement as CI gating
  --enable-agent <name>        Enable an agent (database, factory, intent, risk)
  --disable-agent <name>       Disable an agent
  --version                    Print the version
  --help                       Print this help`;

export interface CliOptions {
  files: string[];
  json: boolean;
  enforce: boolean;
  failOnHighConfidence: boolean;
  enable: AgentConcern[];
  disable: AgentConcern[];
  help: boolean;
  version: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  env: NodeJS.ProcessEnv;
}

const RawProfileEntrySchema = z.object({
  data: z.unknown().refine(value => value !== undefined, 'data is required'),
  context: z.unknown().optional()
});

const RawProfileFileSchema = z.union([RawProfileEntrySchema, z.array(RawProfileEntrySchema)]);

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
  readFile: path => readFile(path, 'utf8'),
  env: process.env
};

function parseConcern(flag: string, value: string | undefined): AgentConcern {
  const match = AGENT_CONCERNS.find(c => c === value);
  if (!match) {
    throw AdvisorErrorFactory.invalidInput(
      flag,
      `Expected one of ${AGENT_CONCERNS.join(', ')}, got ${value === undefined ? 'nothing' : `"${value}"`}`
    );
  }
  return match;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    files: [],
    json: false,
    enforce: false,
    failOnHighConfidence: false,
    enable: [],
    disable: [],
    help: false,
    version: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '--enforce':
        options.enforce = true;
        break;
      case '--fail-on-high-confidence':
        options.failOnHighConfidence = true;
        break;
      case '--enable-agent':
        options.enable.push(parseConcern(arg, argv[++i]));
        break;
      case '--disable-agent':
        options.disable.push(parseConcern(arg, argv[++i]));
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--version':
      case '-v':
        options.version = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw AdvisorErrorFactory.invalidInput(arg, 'Unknown option');
        }
        options.files.push(arg);
    }
  }

  return options;
}

export function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', '..', 'package.json'), 'utf8'));
    const version = z.object({ version: z.string() }).safeParse(pkg);
    return version.success ? version.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

/**
 * Spec file of a location such as spec/models/user_spec.rb:12
 */
export function specFileOf(location: string): string | undefined {
  const file = location.replace(/:\d+$/, '');
  return file.length > 0 ? file : undefined;
}

async function readProfiles(files: readonly string[], io: CliIO): Promise<RawProfileInput[]> {
  const inputs: RawProfileInput[] = [];
  for (const file of files) {
    let content: unknown;
    try {
      content = JSON.parse(await io.readFile(file));
    } catch (error) {
      throw AdvisorErrorFactory.invalidInput(file, `Could not read profile: ${toError(error).message}`);
    }
    const parsed = RawProfileFileSchema.safeParse(content);
    if (!parsed.success) {
      throw AdvisorErrorFactory.invalidInput(file, 'Expected { "data": ..., "context": ... } or an array of them');
    }
    inputs.push(...(Array.isArray(parsed.data) ? parsed.data : [parsed.data]));
  }
  return inputs;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const options = parseArgs(argv);

    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (options.version) {
      io.stdout(readVersion());
      return 0;
    }
    if (options.files.length === 0) {
      io.stderr(USAGE);
      return 1;
    }

    const base = loadConfig(undefined, io.env);
    AdvisorLogger.setMaxLogs(base.logging.maxLogs);
    const enabledAgents = AGENT_CONCERNS.filter(concern =>
      (base.enabledAgents.includes(concern) || options.enable.includes(concern)) &&
      !options.disable.includes(concern)
    );

    const config: AdvisorConfigInput = {
      enabledAgents,
      ...(options.enforce ? { enforcementMode: true } : {}),
      ...(options.failOnHighConfidence ? { failOnHighConfidence: true } : {}),
      ...(options.json ? { outputFormat: 'json' as const } : {})
    };

    const inputs = await readProfiles(options.files, io);
    const specFiles = inputs.flatMap(input => {
      const file = specFileOf(contextLocation(input.context));
      return file === undefined ? [] : [file];
    });
    const guard = await SpecFileGuard.capture(specFiles);

    const batch = await analyzeBatch(inputs, { config, env: io.env });
    await guard.verify();

    for (const warning of batch.status.warnings) {
      io.stderr(`Warning: ${warning}`);
    }

    if (batch.config.outputFormat === 'json') {
      io.stdout(JSON.stringify(batch.results.map(r => toJsonObject(r.recommendation, r.profile)), null, 2));
    } else {
      io.stdout(batch.results
        .map(r => formatRecommendation(r.recommendation, 'console', r.profile))
        .join('\n\n'));
    }

    if (batch.config.enforcementMode) {
      io.stderr(batch.enforcement.message);
    }

    return batch.enforcement.exitCode;
  } catch (error) {
    if (isAdvisorError(error)) {
      io.stderr(`Error: ${error.userMessage}: ${error.technicalDetails}`);
    } else {
      io.stderr(`Error: ${toError(error).message}`);
    }
    return 1;
  }
}
