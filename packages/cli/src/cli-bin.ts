#!/usr/bin/env node
/**
 * tenki CLI バイナリエントリーポイント
 */
import { TenkiCli } from './cli.js';

const cli = new TenkiCli();

cli
  .run(process.argv)
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exitCode = 1;
  });
