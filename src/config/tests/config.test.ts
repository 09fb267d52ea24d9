import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, test, expect, afterAll } from '@jest/globals';
import { DEFAULT_POLICY, loadConfig, parseConfig } from '../index.js';
import { ConfigError } from '../../util/errors.js';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'credit-config-'));

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('config', () => {
  test('empty document yields the default policy', () => {
    const cfg = parseConfig({});
    expect(cfg.policy).toEqual(DEFAULT_POLICY);
  });

  test('partial policy merges over defaults', () => {
    const cfg = parseConfig({ policy: { maxBurdenRatio: 0.4, rateCorrection: 'reject' } });
    expect(cfg.policy.maxBurdenRatio).toBe(0.4);
    expect(cfg.policy.rateCorrection).toBe('reject');
    expect(cfg.policy.weights).toEqual(DEFAULT_POLICY.weights);
  });

  test('storage path comes from the document when the environment is silent', () => {
    expect(parseConfig({ storage: { dbPath: ':memory:' } }).storage.dbPath).toBe(':memory:');
  });

  test('DATA_DB_PATH overrides the document', () => {
    process.env.DATA_DB_PATH = '/tmp/elsewhere.db';
    try {
      expect(loadConfig(path.resolve('config', 'config.json')).storage.dbPath).toBe('/tmp/elsewhere.db');
    } finally {
      delete process.env.DATA_DB_PATH;
    }
  });

  test('weights must sum to 100', () => {
    expect(() => parseConfig({ policy: { weights: { paymentHistory: 50, loanCount: 20, currentActivity: 20, volume: 20 } } }))
      .toThrow(/weights must sum to 100/);
  });

  test('bands must be ordered', () => {
    expect(() => parseConfig({ policy: { bands: [{ above: 10, floorRate: 16 }, { above: 30, floorRate: 12 }] } }))
      .toThrow(ConfigError);
  });

  test('unknown keys are rejected', () => {
    expect(() => parseConfig({ policy: { minScore: 3 } })).toThrow(ConfigError);
  });

  test('missing file falls back to defaults', () => {
    const cfg = loadConfig(path.join(tmp, 'absent.json'));
    expect(cfg.policy).toEqual(DEFAULT_POLICY);
  });

  test('reads a file from disk', () => {
    const file = path.join(tmp, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ policy: { limitMultiplier: 24 } }));
    expect(loadConfig(file).policy.limitMultiplier).toBe(24);
  });

  test('malformed JSON is a config error', () => {
    const file = path.join(tmp, 'broken.json');
    fs.writeFileSync(file, '{ "policy": ');
    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  test('the shipped config file is valid', () => {
    expect(loadConfig(path.resolve('config', 'config.json')).policy).toEqual(DEFAULT_POLICY);
  });
});
