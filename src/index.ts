#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli.js';
import { loadConfig } from './config.js';
import { KBError } from './errors.js';
import { KnowledgeBase } from './knowledge-base.js';

async function main(): Promise<number> {
  const kb = await KnowledgeBase.open(loadConfig());
  try {
    return await runCli(process.argv.slice(2), kb);
  } finally {
    kb.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof KBError) {
      console.error(`Error [${err.code}]: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
