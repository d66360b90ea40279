import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { silentLogger } from '../logging/logger.js';
import { COMMANDS, COMMAND_NAMES, isCommandName } from './commands.js';
import { runCli, usage, type RunCliOptions } from './runCli.js';

describe('runCli', () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = join(tmpdir(), `partition-cli-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    out = [];
    err = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function csv(name: string, rows: string[]): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, ['entity_id,record_id', ...rows].join('\n') + '\n', 'utf-8');
    return path;
  }

  function run(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<number> {
    const options: RunCliOptions = {
      env,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      createLogger: () => silentLogger,
      searchPaths: [],
    };
    return runCli(argv, options);
  }

  describe('inspect', () => {
    it('prints each group with a running count', async () => {
      const path = await csv('entities.csv', ['1,r1', '1,r2', '2,r3']);

      const code = await run(['inspect', '--csv-file', path]);

      expect(code).toBe(0);
      expect(out).toEqual(['Group 1: r1, r2', 'Group 2: r3', 'Groups: 2']);
      expect(err).toEqual([]);
    });

    it('fails when no file is configured', async () => {
      const code = await run(['inspect']);

      expect(code).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual([
        "Error: Missing required option 'csvFile' (--csv-file or PARTITION_DISTANCE_CSV_FILE)",
      ]);
    });

    it('fails when the file cannot be read', async () => {
      const path = join(dir, 'missing.csv');
      const code = await run(['inspect', '--csv-file', path]);

      expect(code).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(new RegExp(`^Error: Cannot read ${path}: ENOENT`));
    });
  });

  describe('compare', () => {
    it('prints the distance', async () => {
      const prior = await csv('prior.csv', ['1,a', '1,b', '1,c', '1,d']);
      const current = await csv('current.csv', ['1,a', '1,b', '2,c', '2,d']);

      const code = await run(['compare', '--prior-csv-file', prior, '--current-csv-file', current]);

      expect(code).toBe(0);
      expect(out).toEqual(['Distance: 2']);
    });

    it('uses the configured cost functions', async () => {
      const prior = await csv('prior.csv', ['1,a', '1,b', '2,c', '2,d']);
      const current = await csv('current.csv', ['1,a', '1,b', '1,c', '1,d']);

      const code = await run([
        'compare',
        '--prior-csv-file',
        prior,
        '--current-csv-file',
        current,
        '--merge-cost',
        'product',
      ]);

      expect(code).toBe(0);
      expect(out).toEqual(['Distance: 4']);
    });

    it('prints the full report as JSON', async () => {
      const prior = await csv('prior.csv', ['1,a', '1,b']);
      const current = await csv('current.csv', ['1,a', '1,b', '1,x']);

      const code = await run(['compare', '--json', '--prior-csv-file', prior, '--current-csv-file', current]);

      expect(code).toBe(0);
      expect(out).toHaveLength(1);
      expect(JSON.parse(out[0] ?? '')).toEqual({
        cost: 2,
        splitCost: 0,
        mergeCost: 2,
        priorGroupCount: 1,
        currentGroupCount: 1,
        priorMemberCount: 2,
        unknownMemberCount: 1,
        reassignedMemberCount: 0,
      });
    });

    it('reads paths and the command from the environment', async () => {
      const prior = await csv('prior.csv', ['1,a', '2,b']);
      const current = await csv('current.csv', ['1,a', '1,b']);

      const code = await run([], {
        PARTITION_DISTANCE_COMMAND: 'compare',
        PARTITION_DISTANCE_PRIOR_CSV_FILE: prior,
        PARTITION_DISTANCE_CURRENT_CSV_FILE: current,
      });

      expect(code).toBe(0);
      expect(out).toEqual(['Distance: 1']);
    });

    it('reads options from a settings file', async () => {
      const prior = await csv('prior.csv', ['1,a', '2,b']);
      const current = await csv('current.csv', ['1,a', '1,b']);
      const settings = join(dir, 'settings.yaml');
      await writeFile(
        settings,
        `priorCsvFile: ${prior}\ncurrentCsvFile: ${current}\nmergeCost: sum\n`,
        'utf-8',
      );

      const code = await run(['compare', '--config', settings]);

      expect(code).toBe(0);
      expect(out).toEqual(['Distance: 2']);
    });

    it('requires both partitionings', async () => {
      const prior = await csv('prior.csv', ['1,a']);
      const code = await run(['compare', '--prior-csv-file', prior]);

      expect(code).toBe(1);
      expect(err).toEqual([
        "Error: Missing required option 'currentCsvFile' (--current-csv-file or PARTITION_DISTANCE_CURRENT_CSV_FILE)",
      ]);
    });

    it('fails on an integrity violation without printing a result', async () => {
      const prior = await csv('prior.csv', ['1,a', '1,b']);
      const current = await csv('current.csv', ['1,a', '1,b', '2,a']);

      const code = await run(['compare', '--prior-csv-file', prior, '--current-csv-file', current]);

      expect(code).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual([
        'Error: Current group 2 claims 1 member(s) of prior group 1, but only 0 remain unattributed',
      ]);
    });
  });

  describe('dispatch', () => {
    it('prints usage and succeeds for --help', async () => {
      expect(await run(['--help'])).toBe(0);
      expect(err).toEqual([usage()]);
    });

    it('prints usage and fails without a command', async () => {
      expect(await run([])).toBe(1);
      expect(err).toEqual([usage()]);
    });

    it('rejects an unknown command', async () => {
      expect(await run(['show-entities'])).toBe(1);
      expect(err).toEqual(['Unknown command: show-entities', usage()]);
    });

    it('reports invalid option values', async () => {
      expect(await run(['inspect', '--log-level', 'loud'])).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Error: Config validation error at '--log-level': /);
    });

    it('has a handler for every command', () => {
      for (const name of COMMAND_NAMES) {
        expect(isCommandName(name)).toBe(true);
        expect(typeof COMMANDS[name].run).toBe('function');
      }
      expect(isCommandName('test')).toBe(false);
    });
  });
});
