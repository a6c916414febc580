#!/usr/bin/env node
import { WatermarkRemover } from '../index.js';
import { describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { USAGE, parseArgs, type CliCommand } from './args.js';
import { BRAND, RULE, formatSummary } from './summary.js';

function printHeader(): void {
  console.log(`\n${RULE}\n  ${BRAND}\n${RULE}`);
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`✗ ${describeError(error)}`);
    console.error(`\n${USAGE}\n`);
    return 1;
  }

  if (command.kind === 'help') {
    console.log(`\n${BRAND}\n\n${USAGE}\n`);
    return 0;
  }

  printHeader();
  const logger = createLogger({ debug: command.config.debug });
  const remover = new WatermarkRemover(command.config, { logger });

  try {
    const { files, report } = await remover.process(command.input);
    const config = remover.getConfig();
    console.log(`\n${formatSummary(report, config.format, config.dpi)}`);

    if (files.length === 1) {
      console.log(`\n✓ Success! Saved: ${files[0]}\n`);
    } else {
      console.log(`\n✓ Success! Created ${files.length} file(s):`);
      for (const file of files) console.log(`  → ${file}`);
      console.log();
    }
    return 0;
  } catch (error) {
    logger.error(describeError(error));
    console.error('\n✗ Failed\n');
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
