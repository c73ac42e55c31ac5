#!/usr/bin/env node
/**
 * KMZ Survey Export CLI
 *
 * Lists the forms found in a KMZ survey archive and exports the placemarks of
 * one form to CSV.
 *
 * Usage:
 *   tsx src/server/scripts/kmz-survey-export.ts <input.kmz> [options]
 *
 * Options:
 *   --form=<n>              Export the n-th form (1-based) without prompting
 *   --out-dir=<dir>         Output directory (default: KMZ_OUTPUT_DIR or .)
 *   --delimiter=<char>      Field delimiter (default: CSV_DELIMITER or ,)
 *   --drop-unclassified     Leave out placemarks without a form heading
 *   --list                  Only list the forms
 */

import { realpathSync } from 'fs';
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';
import { loadExportConfig, type ExportConfigInput } from '../config/exportConfig.js';
import { SurveyExportPipeline } from '../services/survey/SurveyExportPipeline.js';
import { selectForm } from '../services/survey/formSelection.js';
import { UNCLASSIFIED_FORM } from '../types/survey.js';
import { ConfigurationError, SelectionError, toAppError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface CliOptions {
  config: Partial<ExportConfigInput>;
  form?: string;
  listOnly: boolean;
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws ConfigurationError on unknown options or missing values
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { config: {}, listOnly: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    const takeValue = (): string => {
      if (separator !== -1) {
        return arg.slice(separator + 1);
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`Option --${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case 'form':
        options.form = takeValue();
        break;
      case 'out-dir':
        options.config.outputDir = takeValue();
        break;
      case 'delimiter':
        options.config.delimiter = takeValue().replace(/^\\t$/, '\t');
        break;
      case 'drop-unclassified':
        options.config.dropUnclassified = true;
        break;
      case 'list':
        options.listOnly = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: --${flag}`);
    }
  }

  if (positional.length > 1) {
    throw new ConfigurationError(`Expected one input archive, got ${positional.length}`);
  }
  if (positional.length === 1) {
    options.config.inputPath = positional[0];
  }

  return options;
}

function displayLabel(label: string): string {
  return label === UNCLASSIFIED_FORM ? '(no form heading)' : label;
}

/**
 * Ask for a 1-based form number on the given streams
 *
 * @throws SelectionError if the input ends before an answer arrives
 */
export async function promptForForm(
  count: number,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    return await new Promise<string>((resolve, reject) => {
      rl.once('close', () => {
        reject(new SelectionError('No form selected: input ended before an answer was given'));
      });
      rl.question(`\nEnter the number of the form (1-${count}): `, resolve);
    });
  } finally {
    rl.close();
  }
}

export async function main(args: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const cli = parseCliArgs(args);
    const config = loadExportConfig(cli.config);
    const pipeline = new SurveyExportPipeline(config);

    const archive = await pipeline.readForms(config.inputPath);

    if (archive.labels.length === 0) {
      console.log('No forms (placemarks with a form heading) found.');
      return 0;
    }

    console.log(`\n📋 Forms in ${archive.sourcePath} (${archive.placemarkCount} placemarks):`);
    archive.labels.forEach((label, index) => {
      const count = archive.groups.get(label)?.length ?? 0;
      console.log(`   ${index + 1}: ${displayLabel(label)} (${count})`);
    });

    if (cli.listOnly) {
      return 0;
    }

    const choice = cli.form ?? (await promptForForm(archive.labels.length));
    const form = selectForm(archive.labels, choice);
    const result = await pipeline.exportForm(archive, form);

    console.log(
      `\n✅ ${result.recordCount} placemarks from form '${displayLabel(form)}' written to ${result.outputPath}`
    );
    if (result.droppedKeys.length > 0) {
      console.log(`⚠️  Fields not in the first record were not exported: ${result.droppedKeys.join(', ')}`);
    }
    return 0;
  } catch (error) {
    const failure = toAppError(error);
    if (failure.isOperational) {
      logger.debug({ code: failure.code, context: failure.context }, 'Export aborted');
      console.error(`❌ ${failure.message}`);
    } else {
      logger.error({ error }, 'Unexpected failure');
      console.error(`❌ An error occurred: ${failure.message}`);
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // bin installs reach this file through a symlink
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if called directly
if (isEntryPoint()) {
  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
