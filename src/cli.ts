#!/usr/bin/env node

import { PathsConfig, type PipelinePaths } from './config/paths.js';
import { runExtraction } from './pipeline/extract-sections.js';
import { runRuleChecks } from './pipeline/check-rules.js';
import { runSummarization } from './pipeline/SummaryOrchestrator.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for the Act compliance pipeline
 *
 * Usage:
 *   npm run dev extract      - PDF -> outputs/extracted_sections.json
 *   npm run dev check        - sections -> outputs/report.json + report_debug.json
 *   npm run dev summarize    - sections -> outputs/summary.json (resumable)
 *   npm run dev run-all      - extract, check, summarize
 */

const COMMANDS = ['extract', 'check', 'summarize', 'run-all', 'help'];

async function extract(paths: PipelinePaths): Promise<void> {
  const document = await runExtraction({ paths });
  console.log(`Wrote ${paths.sectionsFile}, sections: ${document.sections.length}`);
}

async function check(paths: PipelinePaths): Promise<void> {
  const report = await runRuleChecks({ paths });

  console.log(`Wrote ${paths.reportFile} and ${paths.debugFile}`);
  console.log('Summary:');
  for (const verdict of report.rule_checks) {
    console.log(` - ${verdict.rule}: ${verdict.status} (confidence ${verdict.confidence})`);
  }
}

async function summarize(paths: PipelinePaths): Promise<void> {
  await runSummarization({ paths });
  console.log(`Summary written to ${paths.summaryFile}`);
}

function printHelp(): void {
  console.log(`
Act Compliance Checker

USAGE:
  npm run dev <command>

COMMANDS:
  extract     Extract text from the Act PDF and split it into sections
  check       Check the sections against the six drafting rules
  summarize   Summarise the Act with the OpenAI API (resumes a partial run)
  run-all     Run extract, check and summarize in order
  help        Show this help message

ENVIRONMENT:
  Configuration is loaded from .env file
    - ACT_PDF_PATH     Source PDF (default: ${PathsConfig.DEFAULT_PDF})
    - OUTPUT_DIR       Output directory (default: ${PathsConfig.DEFAULT_OUTPUT_DIR})
    - OPENAI_API_KEY   Required for summarize
    - OPENAI_MODEL     Model for summarize (default: gpt-4o-mini)
    - LOG_LEVEL        winston log level (default: info)
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];
  // Resolved once so every stage of run-all reads and writes the same directory
  const paths = PathsConfig.getConfig();

  try {
    switch (command) {
      case 'extract':
        await extract(paths);
        break;

      case 'check':
        await check(paths);
        break;

      case 'summarize':
        await summarize(paths);
        break;

      case 'run-all':
        await extract(paths);
        await check(paths);
        await summarize(paths);
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { command, error: errorMessage(error) });
    console.error('\n❌ Command failed:', errorMessage(error));
    process.exitCode = 1;
  }
}

// Run CLI
void main();
