import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { command, flag, list, map, option, positional, rest, subcommand } from '../schema/fields.js';
import { integer, string } from '../schema/values.js';
import { Logger } from '../utils/logger.js';
import type { ParseSources } from '../config/types.js';
import { createParser, type ArgumentParser } from './parser.js';

const spec = command({
  workers: option(integer(), { env: 'WORKERS', default: 1 }),
  dataset: option(string(), { env: true }),
  token: option(string(), { env: 'API_TOKEN', required: true }),
  tags: list(string(), { env: 'TAGS', separate: true, default: ['base'] }),
  labels: map(integer(), { env: 'LABELS' }),
  verbose: flag({ env: 'VERBOSE' }),
  input: positional(string(), { env: 'INPUT', default: 'stdin' }),
  deploy: subcommand(
    command({
      region: option(string(), { env: 'REGION', default: 'local' }),
      replicas: option(integer()),
    })
  ),
});

function capturingParser(): { parser: ArgumentParser<typeof spec.fields>; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    component: 'PrecedenceTest',
    debugMode: true,
    write: (line) => {
      lines.push(line);
    },
  });
  return { parser: createParser(spec, { name: 'app', logger }), lines };
}

const parser = createParser(spec, { name: 'app', logger: new Logger({ component: 'Test', write: () => undefined }) });

function parsed(args: readonly string[], sources: ParseSources) {
  const outcome = parser.parse(args, sources);
  if (outcome.kind !== 'parsed') {
    throw new Error(
      `Expected a parsed value, got ${outcome.kind}${outcome.kind === 'failed' ? `: ${outcome.error.message}` : ''}`
    );
  }
  return outcome.value;
}

function failure(args: readonly string[], sources: ParseSources): string {
  const outcome = parser.parse(args, sources);
  if (outcome.kind !== 'failed') {
    throw new Error(`Expected a failure, got ${outcome.kind}`);
  }
  return outcome.error.message;
}

const withToken = { API_TOKEN: 'test-secret' };

describe('precedence', () => {
  it('should fall back to defaults when no source supplies a value', () => {
    const { values } = parsed([], { env: withToken });
    expect(values.workers).toBe(1);
    expect(values.dataset).toBeUndefined();
    expect(values.tags).toEqual(['base']);
    expect(values.labels).toEqual(new Map());
    expect(values.verbose).toBe(false);
    expect(values.input).toBe('stdin');
  });

  it('should read environment variables for unbound fields', () => {
    const { values } = parsed([], {
      env: { ...withToken, WORKERS: '8', DATASET: 'train', VERBOSE: 'yes', INPUT: 'data.csv' },
    });
    expect(values.token).toBe('test-secret');
    expect(values.workers).toBe(8);
    expect(values.dataset).toBe('train');
    expect(values.verbose).toBe(true);
    expect(values.input).toBe('data.csv');
  });

  it('should split multi-value environment variables on commas', () => {
    const { values } = parsed([], { env: { ...withToken, TAGS: 'a, "b,c"', LABELS: 'x=1,y=2' } });
    expect(values.tags).toEqual(['a', 'b,c']);
    expect(values.labels).toEqual(
      new Map([
        ['x', 1],
        ['y', 2],
      ])
    );
  });

  it('should bind environment variables that are set to an empty value', () => {
    const { values } = parsed([], { env: { ...withToken, TAGS: '', DATASET: '' } });
    expect(values.tags).toEqual([]);
    expect(values.dataset).toBe('');
    expect(failure([], { env: { ...withToken, WORKERS: '' } })).toBe(
      'error processing environment variable WORKERS: cannot parse "" as integer'
    );
  });

  it('should let the command line win over the environment', () => {
    const { values } = parsed(['--workers', '4', '--tags', 'cli'], {
      env: { ...withToken, WORKERS: '8', TAGS: 'env' },
    });
    expect(values.workers).toBe(4);
    expect(values.tags).toEqual(['cli']);
  });

  it('should let the environment win over the config file', () => {
    const { values } = parsed([], {
      env: { ...withToken, WORKERS: '8' },
      config: { workers: 16, dataset: 'from-config' },
    });
    expect(values.workers).toBe(8);
    expect(values.dataset).toBe('from-config');
  });

  it('should read config values of every shape', () => {
    const { values } = parsed([], {
      config: {
        token: 'test-secret',
        tags: ['x', 'y'],
        labels: { a: 1 },
        verbose: true,
        input: 'from-config.csv',
      },
    });
    expect(values.token).toBe('test-secret');
    expect(values.tags).toEqual(['x', 'y']);
    expect(values.labels).toEqual(new Map([['a', 1]]));
    expect(values.verbose).toBe(true);
    expect(values.input).toBe('from-config.csv');
  });

  it('should read subcommand settings from a nested table', () => {
    const value = parsed(['deploy'], {
      env: withToken,
      config: { deploy: { region: 'eu', replicas: 3 } },
    });
    expect(value.subcommand?.name).toBe('deploy');
    expect(value.subcommand?.values).toEqual({ region: 'eu', replicas: 3 });
  });

  it('should name the variable when an environment value does not convert', () => {
    expect(failure([], { env: { ...withToken, WORKERS: 'many' } })).toBe(
      'error processing environment variable WORKERS: cannot parse "many" as integer'
    );
  });

  it('should name the key when a config value does not convert', () => {
    expect(failure(['deploy'], { env: withToken, config: { deploy: { replicas: 'three' } } })).toBe(
      'error processing config key "deploy.replicas": cannot parse "three" as integer'
    );
    expect(failure([], { env: withToken, config: { workers: [1, 2] } })).toBe(
      'error processing config key "workers": expected a single value'
    );
  });

  it('should report a missing required field with its variable', () => {
    expect(failure([], {})).toBe('--token is required (or environment variable API_TOKEN)');
  });

  it('should report a missing positional by placeholder', () => {
    const positionalParser = createParser(command({ item: positional(string()) }), { name: 'app' });
    const outcome = positionalParser.parse([]);
    expect(outcome.kind === 'failed' ? outcome.error.message : outcome.kind).toBe('ITEM is required');
  });

  it('should require at least one value for a required multi-value positional', () => {
    const restParser = createParser(command({ files: rest(string(), { required: true }) }), { name: 'app' });
    const outcome = restParser.parse([]);
    expect(outcome.kind === 'failed' ? outcome.error.message : outcome.kind).toBe('FILES is required');
  });

  it('should log applied sources and unknown config keys', () => {
    const { parser: logged, lines } = capturingParser();
    logged.parse([], { env: withToken, config: { wokers: 2 } });

    const events = lines.map((line) => {
      const entry = JSON.parse(line) as { component: string; event: string; level: string };
      return `${entry.component}:${entry.level}:${entry.event}`;
    });
    expect(events).toContain('PrecedenceResolver:debug:env_applied');
    expect(events).toContain('PrecedenceResolver:warn:config_key_unknown');
  });

  it('should rank command line > env > config > default for any combination (property-based)', () => {
    const source = fc.option(fc.integer({ min: 0, max: 1000 }), { nil: undefined });
    fc.assert(
      fc.property(source, source, source, (cli, env, config) => {
        const args = cli === undefined ? [] : ['--workers', String(cli)];
        const { values } = parsed(args, {
          env: env === undefined ? withToken : { ...withToken, WORKERS: String(env) },
          config: config === undefined ? {} : { workers: config },
        });
        expect(values.workers).toBe(cli ?? env ?? config ?? 1);
      })
    );
  });
});
