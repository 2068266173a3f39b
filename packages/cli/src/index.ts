#!/usr/bin/env node

import {
  Simulator,
  type SimulationResult,
  SUPPORTED_PRESETS,
  getPreset,
  formatReport
} from '@opening-hand/core';
import { buildConfig, type CLIOptions, HELP_TEXT, parseArgs, VERSION } from './options.js';

function printHelp(): void {
  console.log(HELP_TEXT);
}

function printVersion(): void {
  console.log(`Opening Hand Simulator CLI v${VERSION}`);
}

function printPresets(): void {
  for (const name of SUPPORTED_PRESETS) {
    const preset = getPreset(name);
    console.log(`${name.padEnd(10)} ${preset.description}`);
  }
}

async function runSimulation(options: CLIOptions): Promise<void> {
  const config = buildConfig(options);
  const simulator = new Simulator(config);

  // Warnings go out before the run starts
  for (const warning of simulator.getWarnings()) {
    console.warn(`Warning: ${warning.message}`);
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const isTable = options.format === 'table';
  if (isTable) {
    console.log(`\nRunning ${config.trials.toLocaleString()} trials...`);
  }

  let result: SimulationResult;
  try {
    result = await simulator.runAsync({
      signal: controller.signal,
      progressInterval: 5000,
      onProgress: isTable
        ? (completed, total) => {
            const pct = ((completed / total) * 100).toFixed(1);
            process.stdout.write(`\r  Progress: ${pct}% (${completed.toLocaleString()}/${total.toLocaleString()})`);
          }
        : undefined
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (isTable) {
    console.log(`\r  Completed in ${result.metadata.durationMs}ms         \n`);
    for (const line of formatReport(result)) {
      console.log(line);
    }
  } else {
    console.log(JSON.stringify(result, null, 2));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  switch (options.command) {
    case 'help':
      printHelp();
      break;

    case 'version':
      printVersion();
      break;

    case 'presets':
      printPresets();
      break;

    case 'simulate':
      await runSimulation(options);
      break;
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
