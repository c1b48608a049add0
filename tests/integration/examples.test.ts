/**
 * End-to-end walkthroughs of typical programs: declare a shape, run it
 * through the command-line shim with in-memory sinks, check what the user
 * would see.
 */

import { describe, it, expect } from 'vitest';
import {
  CommandLine,
  command,
  createParser,
  flag,
  integer,
  list,
  Logger,
  option,
  parseConfigFile,
  positional,
  rest,
  string,
  subcommand,
  type CommandSpec,
  type FieldMap,
  type OutputSink,
  type ParsedCommand,
} from '../../src/index.js';

class ExitSignal extends Error {
  public readonly code: number;

  constructor(code: number) {
    super(`exit ${String(code)}`);
    this.name = 'ExitSignal';
    this.code = code;
  }
}

class MemorySink implements OutputSink {
  public text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

interface Run<F extends FieldMap> {
  readonly value: ParsedCommand<F> | undefined;
  readonly output: string;
  readonly code: number | undefined;
}

/** Runs a program with stdout and stderr captured into one buffer. */
function run<F extends FieldMap>(
  spec: CommandSpec<F>,
  line: string
): Run<F> {
  const parser = createParser(spec, {
    name: 'example',
    logger: new Logger({ component: 'Example', write: () => undefined }),
  });
  const output = new MemorySink();
  const cli = new CommandLine(parser, {
    stdout: output,
    stderr: output,
    env: {},
    exit: (code) => {
      throw new ExitSignal(code);
    },
  });
  try {
    return { value: cli.mustParse(line === '' ? [] : line.split(' ')), output: output.text, code: undefined };
  } catch (error) {
    if (error instanceof ExitSignal) {
      return { value: undefined, output: output.text, code: error.code };
    }
    throw error;
  }
}

const helpShape = command({
  input: positional(string()),
  output: rest(string()),
  verbose: flag({ short: 'v', help: 'verbosity level' }),
  dataset: option(string(), { help: 'dataset to use' }),
  optimize: option(integer(), { short: 'O', help: 'optimization level' }),
});

const itemShape = command({
  verbose: flag(),
  get: subcommand(command({ item: positional(string(), { help: 'item to fetch' }) }), {
    help: 'fetch an item and print it',
  }),
  list: subcommand(command({ format: option(string(), { help: 'output format' }), limit: option(integer()) }), {
    help: 'list available items',
  }),
});

const gitShape = command({
  checkout: subcommand(command({ branch: positional(string()), track: flag({ short: 't' }) })),
  commit: subcommand(command({ all: flag({ short: 'a' }), message: option(string(), { short: 'm' }) })),
  push: subcommand(
    command({
      remote: positional(string()),
      branch: positional(string()),
      setUpstream: flag({ short: 'u' }),
    })
  ),
  quiet: flag({ short: 'q' }),
});

describe('example programs', () => {
  it('should parse inline values and boolean flags', () => {
    const { value } = run(command({ foo: option(string()), bar: flag() }), '--foo=hello --bar');
    expect(value?.values).toEqual({ foo: 'hello', bar: true });
  });

  it('should keep defaults for options that are not given', () => {
    const { value } = run(command({ foo: option(string(), { default: 'default value' }) }), '');
    expect(value?.values.foo).toBe('default value');
  });

  it('should accept required options when they are given', () => {
    const { value } = run(command({ foo: option(string(), { required: true }), bar: flag() }), '--foo=abc --bar');
    expect(value?.values).toEqual({ foo: 'abc', bar: true });
  });

  it('should distribute positionals', () => {
    const { value } = run(
      command({ input: positional(string()), output: rest(string()) }),
      'in out1 out2 out3'
    );
    expect(value?.values).toEqual({ input: 'in', output: ['out1', 'out2', 'out3'] });
  });

  it('should collect multiple values for one flag', () => {
    const { value } = run(
      command({ database: option(string()), ids: list(integer()) }),
      '--database localhost --ids 1 2 3'
    );
    expect(value?.values).toEqual({ database: 'localhost', ids: [1, 2, 3] });
  });

  it('should mix separate flags with positionals', () => {
    const { value } = run(
      command({
        commands: list(string(), { short: 'c', separate: true }),
        files: list(string(), { short: 'f', separate: true }),
        databases: rest(string()),
      }),
      '-c cmd1 db1 -f file1 db2 -c cmd2 -f file2 -f file3 db3 -c cmd3'
    );
    expect(value?.values).toEqual({
      commands: ['cmd1', 'cmd2', 'cmd3'],
      files: ['file1', 'file2', 'file3'],
      databases: ['db1', 'db2', 'db3'],
    });
  });

  it('should print generated help and exit 0', () => {
    const { output, code } = run(helpShape, '--help');
    expect(code).toBe(0);
    expect(output).toBe(
      [
        'Usage: example [--verbose] [--dataset DATASET] [--optimize OPTIMIZE] INPUT [OUTPUT [OUTPUT ...]]',
        '',
        'Positional arguments:',
        '  INPUT',
        '  OUTPUT',
        '',
        'Options:',
        '  --verbose, -v          verbosity level',
        '  --dataset DATASET      dataset to use',
        '  --optimize OPTIMIZE, -O OPTIMIZE',
        '                         optimization level',
        '  --help, -h             display this help and exit',
        '',
      ].join('\n')
    );
  });

  it('should print help listing the subcommands', () => {
    const { output, code } = run(itemShape, '--help');
    expect(code).toBe(0);
    expect(output).toBe(
      [
        'Usage: example [--verbose]',
        '',
        'Options:',
        '  --verbose',
        '  --help, -h             display this help and exit',
        '',
        'Commands:',
        '  get                    fetch an item and print it',
        '  list                   list available items',
        '',
      ].join('\n')
    );
  });

  it('should print help for the requested subcommand', () => {
    const { output, code } = run(itemShape, 'get --help');
    expect(code).toBe(0);
    expect(output).toBe(
      [
        'Usage: example get ITEM',
        '',
        'Positional arguments:',
        '  ITEM                   item to fetch',
        '',
        'Options:',
        '  --help, -h             display this help and exit',
        '',
      ].join('\n')
    );
  });

  it('should print the usage line and the error, then exit 1', () => {
    const { output, code } = run(helpShape, '--optimize INVALID');
    expect(code).toBe(1);
    expect(output).toBe(
      'Usage: example [--verbose] [--dataset DATASET] [--optimize OPTIMIZE] INPUT [OUTPUT [OUTPUT ...]]\n' +
        'error: error processing --optimize: cannot parse "INVALID" as integer\n'
    );
  });

  it('should print subcommand usage with subcommand errors', () => {
    const { output, code } = run(command({ get: subcommand(command({ count: option(integer()) })) }), 'get --count INVALID');
    expect(code).toBe(1);
    expect(output).toBe(
      'Usage: example get [--count COUNT]\nerror: error processing --count: cannot parse "INVALID" as integer\n'
    );
  });

  it('should dispatch to the selected subcommand with global flags', () => {
    const { value } = run(gitShape, 'commit -a -m what-this-commit-is-about');

    const selected = value?.subcommand;
    expect(selected?.name).toBe('commit');
    if (selected?.name === 'commit') {
      expect(selected.values.message).toBe('what-this-commit-is-about');
      expect(selected.values.all).toBe(true);
    }
    expect(value?.values.quiet).toBe(false);

    const { value: pushed } = run(gitShape, 'push -q origin main');
    expect(pushed?.values.quiet).toBe(true);
    expect(pushed?.subcommand).toEqual({
      name: 'push',
      values: { remote: 'origin', branch: 'main', setUpstream: false },
      subcommand: undefined,
    });
  });

  it('should suggest close names for typos', () => {
    expect(run(gitShape, 'comit').output).toBe(
      'Usage: example [--quiet]\nerror: invalid subcommand: comit (did you mean commit?)\n'
    );
    expect(run(gitShape, 'commit --mesage hi').output).toBe(
      'Usage: example commit [--all] [--message MESSAGE]\n' +
        'error: unknown argument --mesage (did you mean --message?)\n'
    );
  });

  it('should combine environment and config file values below the command line', () => {
    const config = parseConfigFile(['workers = 2', 'dataset = "from-config"', '[deploy]', 'region = "eu"'].join('\n'));
    const shape = command({
      workers: option(integer(), { env: true, default: 1 }),
      dataset: option(string()),
      deploy: subcommand(command({ region: option(string(), { default: 'local' }) })),
    });
    const parser = createParser(shape, {
      name: 'example',
      envPrefix: 'EXAMPLE_',
      logger: new Logger({ component: 'Example', write: () => undefined }),
    });

    const outcome = parser.parse(['deploy'], { env: { EXAMPLE_WORKERS: '6' }, config });

    expect(outcome).toEqual({
      kind: 'parsed',
      chain: ['deploy'],
      value: {
        values: { workers: 6, dataset: 'from-config' },
        subcommand: { name: 'deploy', values: { region: 'eu' }, subcommand: undefined },
      },
    });
  });
});
