#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { main } from './core/main.js';
import { BenchmarkOrchestrator } from './core/orchestrator.js';

// Load .env file
loadDotenv();

main(new BenchmarkOrchestrator(), process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exitCode = 1;
  });
