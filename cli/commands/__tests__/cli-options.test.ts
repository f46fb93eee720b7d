import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { exitCodeForStatus, parseLoadOptions, runLoad } from '../load.js';
import { parseTransformOptions } from '../transform.js';
import { parseSchemaOptions, runSchema } from '../schema.js';
import { buildSchemaQuery } from '../../../src/store/cypher.js';
import { SCHEMA_STATEMENTS } from '../../../src/store/schema.js';
import { buildCubeSnapshot } from '../../../src/__tests__/fixtures/cube-snapshot.js';

describe('parseLoadOptions', () => {
  it('reads the snapshot path and flags in any order', () => {
    expect(
      parseLoadOptions(['--batch-size', '500', 'design.json', '--dry-run', '-c', 'custom.yaml', '--verbose'])
    ).toEqual({
      snapshot: 'design.json',
      batchSize: 500,
      dryRun: true,
      config: 'custom.yaml',
      verbose: true,
    });
    expect(parseLoadOptions(['design.json', '--skip-transform', '--help'])).toEqual({
      snapshot: 'design.json',
      skipTransform: true,
      help: true,
    });
  });

  it('rejects bad input', () => {
    expect(() => parseLoadOptions(['a.json', '--fast'])).toThrow('Unknown option "--fast"');
    expect(() => parseLoadOptions(['a.json', 'b.json'])).toThrow('Unexpected argument "b.json"');
    expect(() => parseLoadOptions(['a.json', '--batch-size'])).toThrow('--batch-size requires a value');
    expect(() => parseLoadOptions(['a.json', '--batch-size', '0'])).toThrow(
      '--batch-size must be a positive integer, got "0"'
    );
    expect(() => parseLoadOptions(['--config', '--dry-run'])).toThrow('--config requires a value');
  });
});

describe('parseTransformOptions and parseSchemaOptions', () => {
  it('accept their own flags only', () => {
    expect(parseTransformOptions(['--batch-size', '20', '--verbose'])).toEqual({ batchSize: 20, verbose: true });
    expect(() => parseTransformOptions(['--dry-run'])).toThrow('Unknown option "--dry-run"');
    expect(parseSchemaOptions(['--print'])).toEqual({ print: true });
    expect(() => parseSchemaOptions(['extra'])).toThrow('Unknown option "extra"');
  });
});

describe('exitCodeForStatus', () => {
  it('maps run status to a process exit code', () => {
    expect(exitCodeForStatus('completed')).toBe(0);
    expect(exitCodeForStatus('failed')).toBe(1);
    expect(exitCodeForStatus('partial')).toBe(2);
  });
});

describe('commands', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cadgraph-cli-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prints the schema statements', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await runSchema({ print: true });
    expect(log.mock.calls.map(call => String(call[0]))).toEqual(SCHEMA_STATEMENTS.map(statement => `${buildSchemaQuery(statement)};`));
  });

  it('loads a snapshot into an in-memory graph on a dry run', async () => {
    const snapshotPath = path.join(dir, 'cube.json');
    await fs.writeFile(snapshotPath, JSON.stringify(buildCubeSnapshot()), 'utf-8');

    const config = path.join(dir, 'cadgraph.yaml');
    await fs.writeFile(config, 'pipeline:\n  maxBatchSize: 50\n', 'utf-8');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await runLoad({ snapshot: snapshotPath, dryRun: true, config });

    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines).toContain('[cadgraph] Snapshot "Cube": 39 entities');
    expect(lines).toContain('[cadgraph] Dry run: writing to an in-memory graph');
    const report = lines.find(line => line.startsWith('Run '));
    expect(report?.split('\n').slice(1, 5)).toEqual([
      '  Entities extracted: 39',
      '  Nodes: 39 created, 0 merged',
      '  Relationships: 130 created, 0 merged',
      '  Batches: 4 committed, 0 failed',
    ]);
    expect(report?.startsWith('Run completed for "Cube"')).toBe(true);
    expect(process.exitCode).toBe(0);
  });

  it('requires a snapshot path', async () => {
    await expect(runLoad({ dryRun: true })).rejects.toThrow(
      'load requires a snapshot file (see: cadgraph help load)'
    );
  });
});
