#!/usr/bin/env node
import 'dotenv/config';
import { getConfig } from './config/index.js';
import { closeAll, getDb } from './db/connection.js';
import { SqliteCustomerStore } from './customers/store.js';
import { LoanEngine } from './loans/engine.js';
import { SqliteLoanStore } from './loans/store.js';
import { runCommand } from './cli/commands.js';
import { log } from './log.js';
import { normalizeError, shortStack } from './util/errors.js';

async function main() {
  const cfg = getConfig();
  const db = getDb(cfg.storage.dbPath);
  const engine = new LoanEngine(
    { customers: new SqliteCustomerStore(db), loans: new SqliteLoanStore(db) },
    { policy: cfg.policy },
  );
  const argv = process.argv.slice(2).filter((a) => a !== '--no-color');
  const code = await runCommand(argv, { engine, write: (line) => console.log(line) });
  closeAll();
  process.exitCode = code;
}

main().catch((err: unknown) => {
  const info = normalizeError(err);
  log.error({ msg: 'fatal', error: info.message, stack: shortStack(err) });
  console.error(info.message);
  closeAll();
  process.exitCode = 1;
});
