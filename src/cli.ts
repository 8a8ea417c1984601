#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { main } from './commands';

loadEnv();

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  },
);
