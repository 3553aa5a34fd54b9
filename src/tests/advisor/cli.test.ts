/**
 * Tests for the command-line interface
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { runCli, parseArgs, specFileOf, USAGE } from '../../advisor/cli';
import type { CliIO } from '../../advisor/cli';
import { AdvisorLogger } from '../../advisor/logging/logger';
import { rawPersistedUser } from './fixtures';

interface FakeIO extends CliIO {
  out: string[];
  err: string[];
}

function fakeIO(files: Record<string, string>, env: NodeJS.ProcessEnv = {}): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => out.push(text),
    stderr: text => err.push(text),
    readFile: async path => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return content;
    },
    env
  };
}

const commitCallbackRaw = {
  context: { location: 'spec/models/order_spec.rb:8' },
  data: {
    factory_prof: { factories: { order: { strategy: 'create', count: 1 } } },
    db_queries: { total_queries: 2, inserts: 1, selects: 1 },
    event_prof: { events: { 'after_commit.active_record': { count: 1, time: 0.4 } } }
  }
};

const profiles = {
  'user.json': JSON.stringify(rawPersistedUser),
  'order.json': JSON.stringify([commitCallbackRaw]),
  'broken.json': '{ "data": ',
  'shape.json': JSON.stringify({ context: {} })
};

function parseJsonOutput(io: FakeIO): Array<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(io.out.join('\n'));
  if (!Array.isArray(parsed)) throw new Error('Expected a JSON array');
  return parsed;
}

beforeEach(() => {
  AdvisorLogger.clearLogs();
});

// ============================================================================
// Argument parsing
// ============================================================================

describe('parseArgs', () => {
  it('should collect flags and files', () => {
    expect(parseArgs(['--json', '--enforce', '--disable-agent', 'risk', 'a.json', 'b.json'])).toEqual({
      files: ['a.json', 'b.json'],
      json: true,
      enforce: true,
      failOnHighConfidence: false,
      enable: [],
      disable: ['risk'],
      help: false,
      version: false
    });
  });

  it('should strip line numbers from spec locations', () => {
    expect(specFileOf('spec/models/user_spec.rb:12')).toBe('spec/models/user_spec.rb');
    expect(specFileOf('spec/models/user_spec.rb')).toBe('spec/models/user_spec.rb');
    expect(specFileOf('')).toBeUndefined();
  });
});

// ============================================================================
// Runs
// ============================================================================

describe('runCli', () => {
  it('should print usage for --help', async () => {
    const io = fakeIO({});

    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.out).toEqual([USAGE]);
  });

  it('should print the package version', async () => {
    const io = fakeIO({});

    expect(await runCli(['--version'], io)).toBe(0);
    expect(io.out).toEqual(['0.1.0']);
  });

  it('should fail without profile files', async () => {
    const io = fakeIO({});

    expect(await runCli([], io)).toBe(1);
    expect(io.err).toEqual([USAGE]);
  });

  it('should reject unknown options', async () => {
    const io = fakeIO({});

    expect(await runCli(['--bogus'], io)).toBe(1);
    expect(io.err).toEqual(['Error: Invalid input: --bogus: Unknown option']);
  });

  it('should reject unknown agents', async () => {
    const io = fakeIO({});

    expect(await runCli(['--enable-agent', 'cache', 'user.json'], io)).toBe(1);
    expect(io.err).toEqual([
      'Error: Invalid input: --enable-agent: Expected one of database, factory, intent, risk, got "cache"'
    ]);
  });

  it('should print console output for each profile', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['user.json', 'order.json'], io)).toBe(0);
    expect(io.out).toHaveLength(1);

    const [first, second] = io.out[0].split('\n\n? Fixture Advisor Recommendation\n');
    expect(first.startsWith('✔ Fixture Advisor Recommendation\nspec/models/user_spec.rb:4\n')).toBe(true);
    expect(second.startsWith('spec/models/order_spec.rb:8\n')).toBe(true);
    expect(io.err).toEqual([]);
  });

  it('should print a JSON array', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['--json', 'user.json', 'order.json'], io)).toBe(0);

    const output = parseJsonOutput(io);
    expect(output.map(r => r.spec_location)).toEqual(['spec/models/user_spec.rb:4', 'spec/models/order_spec.rb:8']);
    expect(output.map(r => r.action)).toEqual(['replace_factory_strategy', 'no_action']);
    expect(output[0].to_value).toBe('build_stubbed(:user)');
  });

  it('should read output format from the environment', async () => {
    const io = fakeIO(profiles, { ADVISOR_OUTPUT_FORMAT: 'json' });

    expect(await runCli(['user.json'], io)).toBe(0);
    expect(parseJsonOutput(io)).toHaveLength(1);
  });

  it('should combine enabled agents from the environment and flags', async () => {
    const io = fakeIO(profiles, { ADVISOR_ENABLED_AGENTS: 'risk,intent' });

    expect(await runCli(['--json', '--enable-agent', 'factory', '--disable-agent', 'intent', 'user.json'], io)).toBe(0);

    const [result] = parseJsonOutput(io);
    expect(result.agent_results).toMatchObject([{ agent_name: 'factory' }, { agent_name: 'risk' }]);
    expect(result.action).toBe('replace_factory_strategy');
  });

  it('should not recommend a change without the factory agent', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['--json', '--disable-agent', 'factory', 'user.json'], io)).toBe(0);

    const [result] = parseJsonOutput(io);
    expect(result.action).toBe('no_action');
    expect(result.explanation).toEqual([
      'model spec tests a unit in isolation',
      'No commit callbacks or callback chains detected',
      '2 agents agree but none proposes a concrete factory change'
    ]);
  });

  // ==========================================================================
  // Enforcement
  // ==========================================================================

  it('should exit 1 when enforcement finds a high-confidence recommendation', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['--enforce', '--fail-on-high-confidence', '--json', 'user.json'], io)).toBe(1);
    expect(io.err).toEqual([
      'Enforcement failed: 1 high-confidence recommendation(s): spec/models/user_spec.rb:4'
    ]);
  });

  it('should warn when enforcing without fail-on-high-confidence', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['--enforce', '--json', 'order.json'], io)).toBe(0);
    expect(io.err).toEqual([
      'Warning: Enforcement mode is enabled without fail-on-high-confidence; CI results may be surprising',
      'Enforcement passed: no high-confidence recommendations'
    ]);
  });

  it('should refuse an unsafe configuration', async () => {
    const io = fakeIO(profiles, { ADVISOR_AUTO_APPLY: 'true' });

    expect(await runCli(['--enforce', 'user.json'], io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      'Error: Unsafe configuration: Auto-apply cannot be enabled together with enforcement mode'
    ]);
  });

  // ==========================================================================
  // Bad input files
  // ==========================================================================

  it('should report unreadable files', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['missing.json'], io)).toBe(1);
    expect(io.err).toEqual([
      "Error: Invalid input: missing.json: Could not read profile: ENOENT: no such file, open 'missing.json'"
    ]);
  });

  it('should report invalid JSON', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['broken.json'], io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0].startsWith('Error: Invalid input: broken.json: Could not read profile: ')).toBe(true);
  });

  it('should report files with the wrong shape', async () => {
    const io = fakeIO(profiles);

    expect(await runCli(['shape.json'], io)).toBe(1);
    expect(io.err).toEqual([
      'Error: Invalid input: shape.json: Expected { "data": ..., "context": ... } or an array of them'
    ]);
  });
});
